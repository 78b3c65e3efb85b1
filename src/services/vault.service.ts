/**
 * OS credential vault (macOS Keychain, Windows Credential Manager,
 * Secret Service on Linux) holding the token store as one opaque string.
 *
 * @napi-rs/keyring is an optional native dependency. When it is missing or
 * cannot load, every call rejects and the token store falls back to its file.
 */

export const VAULT_SERVICE = 'tmcloud';
export const VAULT_ACCOUNT = 'token_store';

export interface SecretVault {
  /** Resolves null when the entry does not exist. */
  get(account: string): Promise<string | null>;
  set(account: string, secret: string): Promise<void>;
  /** Resolves false when there was nothing to delete. */
  delete(account: string): Promise<boolean>;
}

export interface KeyringEntry {
  getPassword(): string | null | undefined;
  setPassword(password: string): void;
  deletePassword(): boolean;
}

export interface KeyringModule {
  Entry: new (service: string, account: string) => KeyringEntry;
}

function isKeyringModule(value: unknown): value is KeyringModule {
  return typeof value === 'object' && value !== null && 'Entry' in value && typeof value.Entry === 'function';
}

// Kept in a variable so the bundler and the type-checker leave the optional
// module alone.
const KEYRING_MODULE = '@napi-rs/keyring';

let keyringPromise: Promise<KeyringModule> | null = null;

function loadKeyring(): Promise<KeyringModule> {
  keyringPromise ??= import(KEYRING_MODULE).then((mod: unknown) => {
    if (isKeyringModule(mod)) return mod;
    // CommonJS exports surface under `default` when imported from ESM
    const fallback = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
    if (!isKeyringModule(fallback)) {
      throw new Error(`${KEYRING_MODULE} does not expose the expected API`);
    }
    return fallback;
  });
  return keyringPromise;
}

export class KeyringVault implements SecretVault {
  constructor(
    private readonly service: string = VAULT_SERVICE,
    private readonly load: () => Promise<KeyringModule> = loadKeyring,
  ) {}

  private async entry(account: string): Promise<KeyringEntry> {
    const { Entry } = await this.load();
    return new Entry(this.service, account);
  }

  async get(account: string): Promise<string | null> {
    const entry = await this.entry(account);
    return entry.getPassword() ?? null;
  }

  async set(account: string, secret: string): Promise<void> {
    const entry = await this.entry(account);
    entry.setPassword(secret);
  }

  async delete(account: string): Promise<boolean> {
    const entry = await this.entry(account);
    return entry.deletePassword();
  }
}
