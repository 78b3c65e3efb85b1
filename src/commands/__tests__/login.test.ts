import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
  })),
}));

vi.mock('../../services/auth.service', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../services/auth.service')>()),
  requestAuthorization: vi.fn(),
  pollForCredential: vi.fn(),
}));

vi.mock('../../services/api.service', () => ({
  fetchUserInfo: vi.fn(),
}));

const { storeMock } = vi.hoisted(() => ({
  storeMock: {
    setCredential: vi.fn(),
    getFilePath: vi.fn(() => '/cfg/tmcloud/tokens.json'),
  },
}));

vi.mock('../../services/token-store.service', () => ({
  TokenStoreService: vi.fn(function () {
    return storeMock;
  }),
}));

vi.mock('../../logger', () => ({
  logger: { warn: vi.fn(), debug: vi.fn(), info: vi.fn(), error: vi.fn() },
}));

import { requestAuthorization, pollForCredential } from '../../services/auth.service';
import { fetchUserInfo } from '../../services/api.service';
import { ProtocolError } from '../../errors';
import { logger } from '../../logger';
import { loginCommand } from '../login';

const mockSession = {
  deviceCode: 'device-code-123',
  userCode: 'ABCD-1234',
  verificationUrl: 'https://tmcloud.dev/device',
  issuedAt: 0,
  expiresAt: 600_000,
  interval: 5,
  expiresIn: 600,
};

const mockPayload = {
  access_token: 'new-access-token',
  token_type: 'Bearer',
  organization_id: 'org-1',
  expires_at: 2_000_000_000,
};

const mockUserInfo = {
  user: { id: 'u1', email: 'dev@example.com', full_name: 'Dev' },
  organizations: [{ organization: { id: 'org-1', name: 'Acme', slug: 'acme' }, role: 'admin' }],
};

describe('loginCommand', () => {
  let mockExit: MockInstance<typeof process.exit>;
  let mockConsoleLog: ReturnType<typeof vi.spyOn>;
  let mockConsoleError: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();

    mockExit = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    mockConsoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

    vi.mocked(requestAuthorization).mockResolvedValue(mockSession);
    vi.mocked(pollForCredential).mockResolvedValue(mockPayload);
    vi.mocked(fetchUserInfo).mockResolvedValue(mockUserInfo);
    storeMock.setCredential.mockResolvedValue('vault');
  });

  afterEach(() => {
    mockExit.mockRestore();
    mockConsoleLog.mockRestore();
    mockConsoleError.mockRestore();
  });

  it('prints the verification URL and user code', async () => {
    await loginCommand.parseAsync(['node', 'login']);

    const output = mockConsoleLog.mock.calls.flat().join('\n');
    expect(output).toContain('https://tmcloud.dev/device');
    expect(output).toContain('ABCD-1234');
  });

  it('stores the credential for the identified organization', async () => {
    await loginCommand.parseAsync(['node', 'login']);

    expect(storeMock.setCredential).toHaveBeenCalledWith(
      'org-1',
      'new-access-token',
      'Bearer',
      'Acme',
      2_000_000_000
    );
    expect(mockExit).toHaveBeenCalledWith(0);
  });

  it('mentions the token file when the keychain was unavailable', async () => {
    storeMock.setCredential.mockResolvedValue('file');

    await loginCommand.parseAsync(['node', 'login']);

    const output = mockConsoleLog.mock.calls.flat().join('\n');
    expect(output).toContain('/cfg/tmcloud/tokens.json');
  });

  it('still stores the token when account details cannot be fetched', async () => {
    vi.mocked(fetchUserInfo).mockRejectedValue(new Error('offline'));

    await loginCommand.parseAsync(['node', 'login']);

    expect(logger.warn).toHaveBeenCalledWith('Could not fetch account details: offline');
    expect(storeMock.setCredential).toHaveBeenCalledWith('org-1', 'new-access-token', 'Bearer', '', 2_000_000_000);
  });

  it('exits 1 without storing anything when polling fails', async () => {
    vi.mocked(pollForCredential).mockRejectedValue(
      new ProtocolError('API error: User denied access (code: access_denied)', 403, 'access_denied')
    );

    await loginCommand.parseAsync(['node', 'login']);

    expect(mockExit).toHaveBeenCalledWith(1);
    expect(mockExit).not.toHaveBeenCalledWith(0);
    expect(storeMock.setCredential).not.toHaveBeenCalled();
    expect(mockConsoleError).toHaveBeenCalledWith(
      expect.stringContaining('User denied access')
    );
  });

  it('exits 1 when the account has no organization', async () => {
    vi.mocked(pollForCredential).mockResolvedValue({ access_token: 'tok', token_type: 'Bearer' });
    vi.mocked(fetchUserInfo).mockResolvedValue({ ...mockUserInfo, organizations: [] });

    await loginCommand.parseAsync(['node', 'login']);

    expect(mockExit).toHaveBeenCalledWith(1);
    expect(storeMock.setCredential).not.toHaveBeenCalled();
  });

  it('removes its SIGINT handler once polling ends', async () => {
    const before = process.listenerCount('SIGINT');

    await loginCommand.parseAsync(['node', 'login']);

    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('exits 1 with the error when the device code request fails', async () => {
    vi.mocked(requestAuthorization).mockRejectedValue(new ProtocolError('API returned status 500: boom', 500));

    await loginCommand.parseAsync(['node', 'login']);

    expect(mockExit).toHaveBeenCalledWith(1);
    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('API returned status 500: boom'));
  });
});
