import * as fs from 'fs/promises';
import * as path from 'path';
import {
  TOKEN_STORE_VERSION,
  TokenStoreSchema,
  type AccessCredential,
  type TokenStore,
} from '../types/auth';
import { NoTokenError, NotFoundError, StorageError, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import { KeyringVault, VAULT_ACCOUNT, type SecretVault } from './vault.service';

const STORE_DIR = 'tmcloud';
const STORE_FILE = 'tokens.json';

export type StoreBackend = 'vault' | 'file';

/** The slice of fs/promises the token store touches. */
export interface StoreFileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, data: string, mode: number): Promise<void>;
  mkdir(dirPath: string, mode: number): Promise<void>;
  chmod(filePath: string, mode: number): Promise<void>;
}

export const nodeFileSystem: StoreFileSystem = {
  readFile: (filePath) => fs.readFile(filePath, 'utf-8'),
  writeFile: (filePath, data, mode) => fs.writeFile(filePath, data, { encoding: 'utf-8', mode }),
  mkdir: async (dirPath, mode) => {
    await fs.mkdir(dirPath, { recursive: true, mode });
  },
  chmod: (filePath, mode) => fs.chmod(filePath, mode),
};

export interface TokenStoreOptions {
  vault?: SecretVault;
  fs?: StoreFileSystem;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  logger?: Pick<Logger, 'warn' | 'debug'>;
}

export interface ResolvedCredential {
  orgId: string;
  credential: AccessCredential;
}

export interface CredentialListing {
  tokens: Record<string, AccessCredential>;
  defaultOrg: string;
}

export function emptyStore(): TokenStore {
  return { version: TOKEN_STORE_VERSION, default_org: '', tokens: {} };
}

/**
 * Fallback file location: $XDG_CONFIG_HOME/tmcloud/tokens.json, else
 * ~/.config/tmcloud/tokens.json. Throws StorageError when no home
 * directory can be determined.
 */
export function getStoreFilePath(env: NodeJS.ProcessEnv = process.env): string {
  let configDir = env.XDG_CONFIG_HOME;
  if (!configDir) {
    const home = env.HOME || env.USERPROFILE;
    if (!home) {
      throw new StorageError('Could not determine home directory for token storage');
    }
    configDir = path.join(home, '.config');
  }
  return path.join(configDir, STORE_DIR, STORE_FILE);
}

/**
 * Decode a serialized store. Anything that is not a version-2 store,
 * including legacy single-token files, decodes to null.
 */
export function decodeStore(raw: string): TokenStore | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = TokenStoreSchema.safeParse(parsed);
  if (!result.success) return null;

  const store = result.data;
  if (store.default_org && !Object.hasOwn(store.tokens, store.default_org)) {
    store.default_org = '';
  }
  return store;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Per-organization credential store. The whole store is one JSON document
 * written to the OS vault, or to the fallback file when the vault fails;
 * it is never split across the two.
 */
export class TokenStoreService {
  private readonly vault: SecretVault;
  private readonly fs: StoreFileSystem;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly logger: Pick<Logger, 'warn' | 'debug'>;

  constructor(options: TokenStoreOptions = {}) {
    this.vault = options.vault ?? new KeyringVault();
    this.fs = options.fs ?? nodeFileSystem;
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? defaultLogger;
  }

  getFilePath(): string {
    return getStoreFilePath(this.env);
  }

  async load(): Promise<TokenStore> {
    try {
      const raw = await this.vault.get(VAULT_ACCOUNT);
      if (raw !== null) {
        const store = decodeStore(raw);
        if (store) return store;
        this.logger.debug('keychain entry is not a readable token store; trying file');
      }
    } catch (err) {
      this.logger.debug(`keychain read failed: ${errorMessage(err)}`);
    }

    let filePath: string;
    try {
      filePath = this.getFilePath();
    } catch {
      return emptyStore();
    }

    let raw: string;
    try {
      raw = await this.fs.readFile(filePath);
    } catch (err) {
      if (isMissingFile(err)) return emptyStore();
      throw new StorageError(`Could not read ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    const store = decodeStore(raw);
    if (!store) {
      this.logger.debug(`${filePath} is not a version ${TOKEN_STORE_VERSION} token store; ignoring it`);
      return emptyStore();
    }
    return store;
  }

  async save(store: TokenStore): Promise<StoreBackend> {
    try {
      await this.vault.set(VAULT_ACCOUNT, JSON.stringify(store));
      return 'vault';
    } catch (vaultErr) {
      this.logger.warn(
        `Could not save to keychain (${errorMessage(vaultErr)}), falling back to file storage`
      );
      try {
        await this.writeFile(store);
        return 'file';
      } catch (fileErr) {
        throw new StorageError(
          `Could not save tokens: keychain failed (${errorMessage(vaultErr)}) and file fallback failed (${errorMessage(fileErr)})`,
          { cause: fileErr }
        );
      }
    }
  }

  private async writeFile(store: TokenStore): Promise<void> {
    const filePath = this.getFilePath();
    await this.fs.mkdir(path.dirname(filePath), 0o700);
    await this.fs.writeFile(filePath, JSON.stringify(store, null, 2), 0o600);
    // chmod is a no-op on Windows: NTFS uses ACLs, not POSIX mode bits
    if (this.platform !== 'win32') {
      await this.fs.chmod(filePath, 0o600);
    }
  }

  async setCredential(
    orgId: string,
    token: string,
    tokenType: string,
    orgName: string,
    expiresAt?: number,
  ): Promise<StoreBackend> {
    const store = await this.load();
    const credential: AccessCredential = {
      access_token: token,
      token_type: tokenType,
      org_name: orgName,
    };
    if (expiresAt !== undefined) credential.expires_at = expiresAt;

    store.tokens[orgId] = credential;
    if (!store.default_org) store.default_org = orgId;
    return this.save(store);
  }

  /** Credential for `orgId`, or for the default organization when empty. */
  async getCredential(orgId = ''): Promise<ResolvedCredential> {
    const store = await this.load();
    const resolved = orgId || resolveDefault(store);
    if (!Object.hasOwn(store.tokens, resolved)) {
      throw new NoTokenError(`No token found for organization ${resolved}`);
    }
    return { orgId: resolved, credential: store.tokens[resolved] };
  }

  async listCredentials(): Promise<CredentialListing> {
    const store = await this.load();
    return { tokens: store.tokens, defaultOrg: store.default_org };
  }

  async removeCredential(orgId: string): Promise<AccessCredential> {
    const store = await this.load();
    if (!Object.hasOwn(store.tokens, orgId)) throw new NotFoundError(orgId);
    const removed = store.tokens[orgId];

    delete store.tokens[orgId];
    if (store.default_org === orgId) store.default_org = '';

    const remaining = Object.keys(store.tokens);
    if (remaining.length === 1) {
      store.default_org = remaining[0];
    } else if (remaining.length === 0) {
      store.default_org = '';
    }

    await this.save(store);
    return removed;
  }

  async removeAll(): Promise<number> {
    const store = await this.load();
    const count = Object.keys(store.tokens).length;
    await this.save(emptyStore());
    return count;
  }

  async getDefault(): Promise<string> {
    return resolveDefault(await this.load());
  }

  async setDefault(orgId: string): Promise<void> {
    const store = await this.load();
    if (!Object.hasOwn(store.tokens, orgId)) throw new NotFoundError(orgId);
    store.default_org = orgId;
    await this.save(store);
  }
}

/**
 * The default organization: the stored pointer, or the only organization
 * when exactly one token exists.
 */
export function resolveDefault(store: TokenStore): string {
  const orgIds = Object.keys(store.tokens);
  if (orgIds.length === 0) {
    throw new NoTokenError('No tokens found. Run `tmcloud login` to authenticate.');
  }
  if (store.default_org) return store.default_org;
  if (orgIds.length === 1) return orgIds[0];
  throw new NoTokenError(
    'Multiple organizations stored and no default set. Run `tmcloud token default <org-id>` or pass --org-id.'
  );
}
