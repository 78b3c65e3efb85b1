import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { requireCredential, resolveCredential, resolveOrgId } from '../auth-guard';
import { TokenStoreService } from '../../services/token-store.service';
import { VAULT_ACCOUNT } from '../../services/vault.service';
import { MemoryFileSystem, MemoryVault, quietLogger } from '../../services/__tests__/fakes';
import { NoTokenError } from '../../errors';
import type { UserInfo } from '../../types/cloud';

const userInfo: UserInfo = {
  user: { id: 'u1', email: 'ci@example.com', full_name: '' },
  organizations: [{ organization: { id: 'org-ci', name: 'CI', slug: 'ci' }, role: 'member' }],
};

function makeStore(contents?: { default_org: string; orgIds: string[] }) {
  const vault = new MemoryVault();
  if (contents) {
    const tokens: Record<string, { access_token: string; token_type: string; org_name: string }> = {};
    for (const id of contents.orgIds) {
      tokens[id] = { access_token: `tok-${id}`, token_type: 'Bearer', org_name: id };
    }
    vault.entries.set(VAULT_ACCOUNT, JSON.stringify({ version: 2, default_org: contents.default_org, tokens }));
  }
  return new TokenStoreService({
    vault,
    fs: new MemoryFileSystem(),
    env: { XDG_CONFIG_HOME: '/cfg' },
    logger: quietLogger,
  });
}

describe('resolveOrgId', () => {
  const lookup = vi.fn((_token: string) => Promise.resolve(userInfo));

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('prefers the --org-id flag', async () => {
    const store = makeStore({ default_org: 'a', orgIds: ['a'] });
    await expect(resolveOrgId('flag', store, lookup, { TMCLOUD_ORG: 'env' })).resolves.toBe('flag');
  });

  it('then TMCLOUD_ORG', async () => {
    const store = makeStore({ default_org: 'a', orgIds: ['a'] });
    await expect(resolveOrgId(undefined, store, lookup, { TMCLOUD_ORG: 'env' })).resolves.toBe('env');
  });

  it('then the stored default', async () => {
    const store = makeStore({ default_org: 'b', orgIds: ['a', 'b'] });
    await expect(resolveOrgId(undefined, store, lookup, {})).resolves.toBe('b');
    expect(lookup).not.toHaveBeenCalled();
  });

  it('asks the API only for an out-of-band token with an empty store', async () => {
    const store = makeStore();
    await expect(
      resolveOrgId(undefined, store, lookup, { TMCLOUD_TOKEN: 'test-ci-token' })
    ).resolves.toBe('org-ci');
    expect(lookup).toHaveBeenCalledWith('test-ci-token');
  });

  it('throws NoTokenError with an empty store and no token', async () => {
    await expect(resolveOrgId(undefined, makeStore(), lookup, {})).rejects.toBeInstanceOf(NoTokenError);
  });

  it('throws NoTokenError when the out-of-band token has no organization', async () => {
    const empty = vi.fn((_token: string) => Promise.resolve({ ...userInfo, organizations: [] }));
    await expect(
      resolveOrgId(undefined, makeStore(), empty, { TMCLOUD_TOKEN: 'test-ci-token' })
    ).rejects.toThrow('does not belong to any organization');
  });
});

describe('resolveCredential', () => {
  it('returns the stored token of the resolved organization', async () => {
    const store = makeStore({ default_org: 'a', orgIds: ['a', 'b'] });
    await expect(resolveCredential({ orgId: 'b', store, env: {} })).resolves.toEqual({
      orgId: 'b',
      token: 'tok-b',
    });
  });

  it('uses TMCLOUD_TOKEN over the stored token', async () => {
    const store = makeStore({ default_org: 'a', orgIds: ['a'] });
    await expect(resolveCredential({ store, env: { TMCLOUD_TOKEN: 'test-ci-token' } })).resolves.toEqual({
      orgId: 'a',
      token: 'test-ci-token',
    });
  });
});

describe('requireCredential', () => {
  let mockExit: MockInstance<typeof process.exit>;
  let mockConsoleError: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    mockExit = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    mockExit.mockRestore();
    mockConsoleError.mockRestore();
  });

  it('returns the credential when logged in', async () => {
    const store = makeStore({ default_org: 'a', orgIds: ['a'] });

    await expect(requireCredential({ store, env: {} })).resolves.toEqual({ orgId: 'a', token: 'tok-a' });
    expect(mockExit).not.toHaveBeenCalled();
  });

  it('exits with code 1 and prints message when not logged in', async () => {
    await requireCredential({ store: makeStore(), env: {} }).catch(() => undefined);

    expect(mockExit).toHaveBeenCalledWith(1);
    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('Not logged in'));
  });
});
