import { getApiUrl } from '../config';
import {
  DeviceCodeResponseSchema,
  DeviceCredentialSchema,
  PollErrorSchema,
  type AccessCredential,
  type DeviceAuthorizationSession,
  type DeviceCodeResponse,
  type DeviceCredentialPayload,
} from '../types/auth';
import type { UserInfo } from '../types/cloud';
import {
  ConnectivityError,
  DecodeError,
  ProtocolError,
  TimeoutError,
  errorMessage,
} from '../errors';

const REQUEST_TIMEOUT_MS = 10_000;
const MIN_INTERVAL_SECONDS = 1;

export const AUTHORIZATION_PENDING = 'authorization_pending';

export function toSession(data: DeviceCodeResponse, issuedAt: number): DeviceAuthorizationSession {
  return {
    deviceCode: data.device_code,
    userCode: data.user_code,
    verificationUrl: data.verification_url,
    issuedAt,
    expiresAt: issuedAt + data.expires_in * 1000,
    interval: Math.max(MIN_INTERVAL_SECONDS, data.interval),
    expiresIn: data.expires_in,
  };
}

/** Step 1 of the device flow: ask the server for a device and user code. */
export async function requestAuthorization(
  now: () => number = Date.now
): Promise<DeviceAuthorizationSession> {
  let res: Response;
  try {
    res = await fetch(`${getApiUrl()}/auth/device`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new ConnectivityError(`Failed to connect to API: ${errorMessage(err)}`, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new ProtocolError(`API returned status ${res.status}: ${text}`, res.status);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new DecodeError(`Failed to parse device code response: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = DeviceCodeResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DecodeError('Device code response is missing required fields');
  }
  return toSession(parsed.data, now());
}

export interface PollOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Receives one "." per retried poll. Defaults to stdout. */
  progress?: (marker: string) => void;
}

function decodeCredential(text: string): DeviceCredentialPayload {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`Failed to parse token response: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = DeviceCredentialSchema.safeParse(body);
  if (!parsed.success) {
    throw new DecodeError('Token response is missing access_token');
  }
  return parsed.data;
}

function parsePollError(text: string): { code: string; message: string } | null {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = PollErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.error : null;
}

/**
 * Step 2: poll until the user authorizes the device, the session expires,
 * or the server reports a fatal error. Transport failures, unreadable bodies,
 * `authorization_pending` and unstructured error responses are retried after
 * one interval; nothing else is.
 */
export async function pollForCredential(
  session: DeviceAuthorizationSession,
  options: PollOptions = {}
): Promise<DeviceCredentialPayload> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const progress = options.progress ?? ((marker: string) => process.stdout.write(marker));

  const url = `${getApiUrl()}/auth/device/poll`;
  const payload = JSON.stringify({ device_code: session.deviceCode });
  const intervalMs = Math.max(MIN_INTERVAL_SECONDS, session.interval) * 1000;

  // Never sleep past the deadline, so the loop ends within expires_in.
  const retryLater = async (): Promise<void> => {
    progress('.');
    const remaining = session.expiresAt - now();
    await wait(Math.max(0, Math.min(intervalMs, remaining)));
  };

  for (;;) {
    if (now() >= session.expiresAt) {
      throw new TimeoutError(
        `Authentication timed out after ${session.expiresIn} seconds. Run \`tmcloud login\` to try again.`
      );
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: payload,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch {
      await retryLater();
      continue;
    }

    let text: string;
    try {
      text = await res.text();
    } catch {
      await retryLater();
      continue;
    }

    if (res.ok) {
      return decodeCredential(text);
    }

    const pollError = parsePollError(text);
    if (pollError) {
      if (pollError.code === AUTHORIZATION_PENDING) {
        await retryLater();
        continue;
      }
      throw new ProtocolError(
        `API error: ${pollError.message} (code: ${pollError.code})`,
        res.status,
        pollError.code
      );
    }

    await retryLater();
  }
}

/** Absolute expiry in unix seconds, if the server gave one. */
export function credentialExpiry(
  payload: DeviceCredentialPayload,
  nowMs: number = Date.now()
): number | undefined {
  if (payload.expires_at !== undefined) return payload.expires_at;
  if (payload.expires_in !== undefined) {
    return Math.floor(nowMs / 1000) + payload.expires_in;
  }
  return undefined;
}

export function hasExpired(
  credential: Pick<AccessCredential, 'expires_at'>,
  nowMs: number = Date.now()
): boolean {
  return credential.expires_at !== undefined && credential.expires_at * 1000 < nowMs;
}

export interface CredentialOrganization {
  orgId: string;
  orgName: string;
}

/**
 * Which organization a fresh token belongs to: the id the token endpoint
 * returned, else the one the API reports for the token, else the caller's
 * first membership. Null when the caller has no organization at all.
 */
export function identifyOrganization(
  payload: Pick<DeviceCredentialPayload, 'organization_id'>,
  userInfo: UserInfo | null
): CredentialOrganization | null {
  const orgs = userInfo?.organizations ?? [];

  if (payload.organization_id) {
    const match = orgs.find((m) => m.organization.id === payload.organization_id);
    return { orgId: payload.organization_id, orgName: match?.organization.name ?? '' };
  }
  if (userInfo?.api_token_organization_id) {
    return {
      orgId: userInfo.api_token_organization_id,
      orgName: userInfo.api_token_organization_name ?? '',
    };
  }
  if (orgs.length > 0) {
    return { orgId: orgs[0].organization.id, orgName: orgs[0].organization.name };
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
