import { BACKEND_NAME } from '../config';
import {
  ConfigurationError,
  DocumentError,
  DocumentNotFoundError,
  MembershipError,
  UploadAfterCreateError,
} from '../errors';
import type { LibraryItem, ReconciliationOutcome, RemoteDocument } from '../types/cloud';
import {
  ApiError,
  createDocument,
  fetchControlLibraryItemsByRefs,
  fetchDocument,
  fetchDocumentVersions,
  fetchThreatLibraryItemsByRefs,
  fetchUserInfo,
  uploadDocument,
} from './api.service';
import { rewriteBackendBlock } from './backend-rewriter.service';
import { readDocument, type BackendDeclaration, type LocalDocument } from './document.service';

/** The catalog calls the reconciler makes; api.service in production. */
export interface CatalogClient {
  fetchUserInfo: typeof fetchUserInfo;
  fetchDocument: typeof fetchDocument;
  fetchDocumentVersions: typeof fetchDocumentVersions;
  createDocument: typeof createDocument;
  uploadDocument: typeof uploadDocument;
  fetchControlLibraryItemsByRefs: typeof fetchControlLibraryItemsByRefs;
  fetchThreatLibraryItemsByRefs: typeof fetchThreatLibraryItemsByRefs;
}

export interface ReconcileDeps {
  catalog: CatalogClient;
  readDocument: (filePath: string) => Promise<LocalDocument>;
  rewriteBackendBlock: (filePath: string, slug: string) => Promise<void>;
}

export const defaultDeps: ReconcileDeps = {
  catalog: {
    fetchUserInfo,
    fetchDocument,
    fetchDocumentVersions,
    createDocument,
    uploadDocument,
    fetchControlLibraryItemsByRefs,
    fetchThreatLibraryItemsByRefs,
  },
  readDocument,
  rewriteBackendBlock: (filePath, slug) => rewriteBackendBlock(filePath, slug),
};

export const PUBLISHED_STATUS = 'PUBLISHED';

/** How the document's references into the cloud library resolved. */
export interface LibraryRefCheck {
  kind: 'control' | 'threat';
  refs: string[];
  /** Refs with no library item. */
  missing: string[];
  /** Refs whose library item is not published. */
  unpublished: Array<{ ref: string; status: string }>;
  published: number;
  /** The lookup itself failed; the other fields are empty. */
  error?: Error;
}

export interface ValidationResult {
  outcome: ReconciliationOutcome;
  document: LocalDocument;
  /** One entry per kind of ref the document uses. */
  libraryRefs: LibraryRefCheck[];
  remote?: RemoteDocument;
  /** Version whose hash matches the file but which is no longer current. */
  staleVersion?: string;
}

/**
 * Check the backend block without touching the network. Returns the single
 * valid declaration or throws ConfigurationError.
 */
export function checkBackend(backends: BackendDeclaration[]): BackendDeclaration {
  if (backends.length === 0) {
    throw new ConfigurationError('none', 'no backend block found');
  }
  if (backends.length > 1) {
    throw new ConfigurationError('multiple', `multiple backend blocks found (${backends.length})`);
  }
  const [backend] = backends;
  if (backend.name !== BACKEND_NAME) {
    throw new ConfigurationError(
      'wrong-name',
      `backend name is '${backend.name}', expected '${BACKEND_NAME}'`
    );
  }
  if (!backend.organization) {
    throw new ConfigurationError('missing-organization', 'backend organization is not specified');
  }
  return backend;
}

async function checkRefs(
  kind: LibraryRefCheck['kind'],
  refs: string[],
  lookup: () => Promise<LibraryItem[]>
): Promise<LibraryRefCheck> {
  const check: LibraryRefCheck = { kind, refs, missing: [], unpublished: [], published: 0 };
  let items: LibraryItem[];
  try {
    items = await lookup();
  } catch (err) {
    check.error = err instanceof Error ? err : new Error(String(err));
    return check;
  }

  const found = new Map(items.map((item) => [item.referenceId, item]));
  for (const ref of refs) {
    const item = found.get(ref);
    if (!item) {
      check.missing.push(ref);
    } else if (item.status !== PUBLISHED_STATUS) {
      check.unpublished.push({ ref, status: item.status });
    } else {
      check.published++;
    }
  }
  return check;
}

/**
 * Resolve the document's control and threat refs against the organization's
 * library. Lookup failures are recorded on the check, not thrown: refs only
 * ever produce warnings.
 */
export async function checkLibraryRefs(
  token: string,
  orgId: string,
  document: Pick<LocalDocument, 'controlRefs' | 'threatRefs'>,
  catalog: Pick<CatalogClient, 'fetchControlLibraryItemsByRefs' | 'fetchThreatLibraryItemsByRefs'>
): Promise<LibraryRefCheck[]> {
  const checks: LibraryRefCheck[] = [];
  const { controlRefs, threatRefs } = document;
  if (controlRefs.length > 0) {
    checks.push(
      await checkRefs('control', controlRefs, () =>
        catalog.fetchControlLibraryItemsByRefs(token, orgId, controlRefs)
      )
    );
  }
  if (threatRefs.length > 0) {
    checks.push(
      await checkRefs('threat', threatRefs, () =>
        catalog.fetchThreatLibraryItemsByRefs(token, orgId, threatRefs)
      )
    );
  }
  return checks;
}

/**
 * Compare a local threat-model file with the cloud: membership of the
 * declared organization, existence of the declared document, and whether
 * its current version carries the same fingerprint.
 */
export async function validateDocument(
  token: string,
  filePath: string,
  deps: ReconcileDeps = defaultDeps
): Promise<ValidationResult> {
  const document = await deps.readDocument(filePath);
  const backend = checkBackend(document.backends);

  const userInfo = await deps.catalog.fetchUserInfo(token);
  const membership = userInfo.organizations.find(
    (m) => m.organization.slug === backend.organization
  );
  if (!membership) {
    throw new MembershipError(
      backend.organization,
      userInfo.organizations.map((m) => ({
        name: m.organization.name,
        slug: m.organization.slug,
        role: m.role,
      }))
    );
  }

  const orgId = membership.organization.id;
  const libraryRefs = await checkLibraryRefs(token, orgId, document, deps.catalog);
  if (!backend.document) {
    return { outcome: { orgId, documentSlug: '', matchedVersion: '' }, document, libraryRefs };
  }

  let remote: RemoteDocument;
  try {
    remote = await deps.catalog.fetchDocument(token, orgId, backend.document);
  } catch (err) {
    if (err instanceof ApiError && err.statusCode === 404) {
      throw new DocumentNotFoundError(backend.document, orgId);
    }
    throw err;
  }

  const versions = await deps.catalog.fetchDocumentVersions(token, orgId, remote.id);
  const match = versions.find((v) => v.spec_file_hash === document.fingerprint);

  const result: ValidationResult = {
    outcome: {
      orgId,
      documentSlug: backend.document,
      matchedVersion: match?.is_current ? match.version : '',
    },
    document,
    libraryRefs,
    remote,
  };
  if (match && !match.is_current) result.staleVersion = match.version;
  return result;
}

export interface PushOptions {
  /** Do not create a cloud document when the backend block names none. */
  noCreate?: boolean;
  /** Create the document but leave the local file (and the upload) alone. */
  noUpdateLocal?: boolean;
  ignoreLinkedControls?: boolean;
}

export type PushAction = 'up-to-date' | 'uploaded' | 'created' | 'created-not-uploaded' | 'skipped';

export interface PushResult {
  action: PushAction;
  orgId: string;
  slug: string;
  version?: string;
  created?: RemoteDocument;
  /** Set when the local backend block could not be updated after create. */
  rewriteError?: Error;
  /** Library ref checks, when the document uses any refs. */
  libraryRefs?: LibraryRefCheck[];
}

export async function pushDocument(
  token: string,
  filePath: string,
  options: PushOptions = {},
  deps: ReconcileDeps = defaultDeps
): Promise<PushResult> {
  const { outcome, document, libraryRefs } = await validateDocument(token, filePath, deps);
  const result = await pushValidated(token, filePath, outcome, document, options, deps);
  if (libraryRefs.length > 0) result.libraryRefs = libraryRefs;
  return result;
}

async function pushValidated(
  token: string,
  filePath: string,
  outcome: ReconciliationOutcome,
  document: LocalDocument,
  options: PushOptions,
  deps: ReconcileDeps
): Promise<PushResult> {
  const { orgId, documentSlug, matchedVersion } = outcome;
  const uploadOptions = { ignoreLinkedControls: options.ignoreLinkedControls };

  if (documentSlug) {
    if (matchedVersion) {
      return { action: 'up-to-date', orgId, slug: documentSlug, version: matchedVersion };
    }
    await deps.catalog.uploadDocument(token, orgId, documentSlug, filePath, uploadOptions);
    return { action: 'uploaded', orgId, slug: documentSlug };
  }

  if (options.noCreate) {
    return { action: 'skipped', orgId, slug: '' };
  }

  if (document.threatModels.length !== 1) {
    throw new DocumentError(
      `expected exactly one threatmodel block to create a cloud document, found ${document.threatModels.length}`
    );
  }
  const [model] = document.threatModels;
  const created = await deps.catalog.createDocument(token, orgId, model.name, model.description);

  if (options.noUpdateLocal) {
    return { action: 'created-not-uploaded', orgId, slug: created.slug, created };
  }

  try {
    await deps.rewriteBackendBlock(filePath, created.slug);
  } catch (err) {
    return {
      action: 'created-not-uploaded',
      orgId,
      slug: created.slug,
      created,
      rewriteError: err instanceof Error ? err : new Error(String(err)),
    };
  }

  try {
    await deps.catalog.uploadDocument(token, orgId, created.slug, filePath, uploadOptions);
  } catch (err) {
    throw new UploadAfterCreateError(created.slug, err);
  }
  return { action: 'created', orgId, slug: created.slug, created };
}
