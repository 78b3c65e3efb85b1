// Typed failures surfaced by the auth, token-store and sync services.
// Commands check `err instanceof XxxError` (or `err.kind`) to pick a message
// and exit code; the services themselves never exit the process.

export type CloudErrorKind =
  | 'connectivity'
  | 'protocol'
  | 'decode'
  | 'timeout'
  | 'auth'
  | 'no-token'
  | 'not-found'
  | 'storage'
  | 'configuration'
  | 'membership'
  | 'document-not-found'
  | 'document'
  | 'already-set'
  | 'upload-after-create';

export abstract class CloudError extends Error {
  abstract readonly kind: CloudErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport-level failure: DNS, refused connection, aborted request. */
export class ConnectivityError extends CloudError {
  readonly kind = 'connectivity' as const;
}

/** Unexpected HTTP status, or a structured error body from the server. */
export class ProtocolError extends CloudError {
  readonly kind = 'protocol' as const;

  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string,
  ) {
    super(message);
  }
}

/** Response body did not match the expected shape. */
export class DecodeError extends CloudError {
  readonly kind = 'decode' as const;
}

/** The device-flow session expired before the user authorized it. */
export class TimeoutError extends CloudError {
  readonly kind = 'timeout' as const;
}

/** 401 from the API: the stored token is invalid or expired. */
export class AuthError extends CloudError {
  readonly kind = 'auth' as const;

  constructor(message = 'Authentication failed: the token may be invalid or expired. Run `tmcloud login` again.') {
    super(message);
  }
}

export class NoTokenError extends CloudError {
  readonly kind = 'no-token' as const;
}

export class NotFoundError extends CloudError {
  readonly kind = 'not-found' as const;

  constructor(public readonly orgId: string) {
    super(`No token found for organization ${orgId}`);
  }
}

/** Neither the keychain nor the fallback file could persist the token store. */
export class StorageError extends CloudError {
  readonly kind = 'storage' as const;
}

export type ConfigurationReason =
  | 'none'
  | 'multiple'
  | 'wrong-name'
  | 'missing-organization';

/** The document's backend block violates one of the sync invariants. */
export class ConfigurationError extends CloudError {
  readonly kind = 'configuration' as const;

  constructor(
    public readonly reason: ConfigurationReason,
    message: string,
  ) {
    super(message);
  }
}

export interface AvailableOrganization {
  name: string;
  slug: string;
  role: string;
}

export class MembershipError extends CloudError {
  readonly kind = 'membership' as const;

  constructor(
    public readonly organization: string,
    public readonly available: AvailableOrganization[],
  ) {
    super(`You are not a member of organization '${organization}'.`);
  }
}

/** The backend block names a document the organization does not have. */
export class DocumentNotFoundError extends CloudError {
  readonly kind = 'document-not-found' as const;

  constructor(
    public readonly slug: string,
    public readonly orgId: string,
  ) {
    super(`Backend document '${slug}' not found`);
  }
}

/** The local file could not be read or parsed. */
export class DocumentError extends CloudError {
  readonly kind = 'document' as const;
}

export class AlreadySetError extends CloudError {
  readonly kind = 'already-set' as const;

  constructor(public readonly existing: string) {
    super(`document is already set in the backend block ('${existing}')`);
  }
}

/** push created the cloud document but could not upload the file to it. */
export class UploadAfterCreateError extends CloudError {
  readonly kind = 'upload-after-create' as const;

  constructor(
    public readonly slug: string,
    cause: unknown,
  ) {
    super(`Threat model '${slug}' was created, but the upload failed: ${errorMessage(cause)}`, { cause });
  }
}

export function isCloudError(err: unknown): err is CloudError {
  return err instanceof CloudError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
