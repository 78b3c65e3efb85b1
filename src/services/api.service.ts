import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { getApiUrl } from '../config';
import {
  DocumentVersionsResponseSchema,
  GraphQLResponseSchema,
  LibraryItemSchema,
  RemoteDocumentSchema,
  UserInfoSchema,
  type LibraryItem,
  type RemoteDocument,
  type RemoteDocumentVersion,
  type UserInfo,
} from '../types/cloud';
import {
  AuthError,
  ConnectivityError,
  DecodeError,
  DocumentError,
  ProtocolError,
  errorMessage,
} from '../errors';

const RETRY_DELAY_MS = 2_000;
const REQUEST_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Typed API error: callers can check `err instanceof ApiError` + statusCode
// ---------------------------------------------------------------------------
export class ApiError extends ProtocolError {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message, statusCode);
  }
}

function friendlyHttpError(status: number, body: string): string {
  switch (status) {
    case 403:
      return 'You do not have permission. Check your organization membership or run `tmcloud login`.';
    case 404:
      return 'Resource not found. Check the ID and try again.';
    case 429:
      return 'Rate limited. Wait a moment and try again.';
    default:
      return `API returned status ${status}${body ? `: ${body}` : ''}`;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function buildUrl(segments: string[]): string {
  return `${getApiUrl()}/${segments.map(encodeURIComponent).join('/')}`;
}

async function makeRequest(
  url: string,
  token: string,
  options: { method: string; body?: string | FormData }
): Promise<Response> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${token}`,
  };
  // fetch sets the multipart boundary itself
  if (!(options.body instanceof FormData)) {
    headers['Content-Type'] = 'application/json';
  }
  return fetch(url, {
    method: options.method,
    body: options.body,
    headers,
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function send(url: string, token: string, options: { method: string; body?: string | FormData }) {
  try {
    return await makeRequest(url, token, options);
  } catch (err) {
    throw new ConnectivityError(
      'Cannot reach the tmcloud server. Check your connection or try again later.',
      { cause: err }
    );
  }
}

// ---------------------------------------------------------------------------
// Shared request pipeline: network → 401 → 5xx retry → typed error
// ---------------------------------------------------------------------------

interface RawRequestOptions {
  segments: string[];
  token: string;
  method?: string;
  body?: string | FormData;
}

interface RequestOptions<S extends z.ZodTypeAny> extends RawRequestOptions {
  schema: S;
}

async function requestRaw(opts: RawRequestOptions): Promise<Response> {
  const { segments, token, body } = opts;
  const method = opts.method ?? 'GET';
  const url = buildUrl(segments);

  // 1. Network error handling
  let res = await send(url, token, { method, body });

  // 2. No refresh flow for device tokens: a 401 means log in again
  if (res.status === 401) {
    throw new AuthError();
  }

  // 3. 5xx on GET: retry once after delay
  if (res.status >= 500 && method === 'GET') {
    await sleep(RETRY_DELAY_MS);
    res = await send(url, token, { method, body });
  }
  if (res.status >= 500) {
    throw new ProtocolError(
      `tmcloud server error (${res.status}). Try again in a moment.`,
      res.status
    );
  }

  // 4. Other non-OK: throw typed ApiError
  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new ApiError(res.status, friendlyHttpError(res.status, text));
  }

  return res;
}

async function request<S extends z.ZodTypeAny>(opts: RequestOptions<S>): Promise<z.infer<S>> {
  const res = await requestRaw(opts);

  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    throw new DecodeError(`Failed to parse response: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = opts.schema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(`Unexpected response shape from ${opts.method ?? 'GET'} /${opts.segments.join('/')}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Public API: thin wrappers around request()
// ---------------------------------------------------------------------------

export async function fetchUserInfo(token: string): Promise<UserInfo> {
  return request({ segments: ['users', 'me'], token, schema: UserInfoSchema });
}

export async function fetchDocuments(token: string, orgId: string): Promise<RemoteDocument[]> {
  return request({
    segments: ['org', orgId, 'models'],
    token,
    schema: z.array(RemoteDocumentSchema),
  });
}

export async function fetchDocument(
  token: string,
  orgId: string,
  idOrSlug: string
): Promise<RemoteDocument> {
  try {
    return await request({
      segments: ['org', orgId, 'models', idOrSlug],
      token,
      schema: RemoteDocumentSchema,
    });
  } catch (err) {
    if (err instanceof ApiError && err.statusCode === 404) {
      throw new ApiError(404, `Threat model not found: ${idOrSlug}`);
    }
    throw err;
  }
}

export async function fetchDocumentVersions(
  token: string,
  orgId: string,
  documentId: string
): Promise<RemoteDocumentVersion[]> {
  const res = await request({
    segments: ['org', orgId, 'models', documentId, 'versions'],
    token,
    schema: DocumentVersionsResponseSchema,
  });
  return res.versions;
}

export async function createDocument(
  token: string,
  orgId: string,
  name: string,
  description: string
): Promise<RemoteDocument> {
  return request({
    segments: ['org', orgId, 'models'],
    token,
    schema: RemoteDocumentSchema,
    method: 'POST',
    body: JSON.stringify({ name, description }),
  });
}

export interface UploadOptions {
  ignoreLinkedControls?: boolean;
}

/** Upload a file as the newest version of a cloud threat model. */
export async function uploadDocument(
  token: string,
  orgId: string,
  idOrSlug: string,
  filePath: string,
  options: UploadOptions = {}
): Promise<void> {
  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (err) {
    throw new DocumentError(`Failed to read file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const form = new FormData();
  form.append('file', new Blob([new Uint8Array(content)]), path.basename(filePath));
  if (options.ignoreLinkedControls) {
    form.append('ignore-linked-controls', '1');
  }

  try {
    await requestRaw({
      segments: ['org', orgId, 'models', idOrSlug, 'upload'],
      token,
      method: 'POST',
      body: form,
    });
  } catch (err) {
    if (err instanceof ApiError && err.statusCode === 404) {
      throw new ApiError(404, `Threat model not found: ${idOrSlug}`);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Library lookups go through the GraphQL endpoint
// ---------------------------------------------------------------------------

async function graphql<S extends z.ZodTypeAny>(
  token: string,
  query: string,
  variables: Record<string, unknown>,
  schema: S
): Promise<z.infer<S>> {
  const res = await request({
    segments: ['graphql'],
    token,
    schema: GraphQLResponseSchema,
    method: 'POST',
    body: JSON.stringify({ query, variables }),
  });
  if (res.errors && res.errors.length > 0) {
    throw new ProtocolError(`GraphQL error: ${res.errors[0].message}`);
  }

  const parsed = schema.safeParse(res.data);
  if (!parsed.success) {
    throw new DecodeError('Unexpected response shape from POST /graphql');
  }
  return parsed.data;
}

const CONTROL_ITEMS_QUERY = `query controlLibraryItemsByRefs($orgId: ID!, $referenceIds: [String!]!) {
  controlLibraryItemsByRefs(orgId: $orgId, referenceIds: $referenceIds) {
    id
    referenceId
    name
    status
  }
}`;

const THREAT_ITEMS_QUERY = `query threatLibraryItemsByRefs($orgId: ID!, $referenceIds: [String!]!) {
  threatLibraryItemsByRefs(orgId: $orgId, referenceIds: $referenceIds) {
    id
    referenceId
    name
    status
  }
}`;

/** Library controls with the given reference IDs; unknown refs are simply absent. */
export async function fetchControlLibraryItemsByRefs(
  token: string,
  orgId: string,
  refs: string[]
): Promise<LibraryItem[]> {
  const data = await graphql(
    token,
    CONTROL_ITEMS_QUERY,
    { orgId, referenceIds: refs },
    z.object({ controlLibraryItemsByRefs: z.array(LibraryItemSchema.nullable()).default([]) })
  );
  return data.controlLibraryItemsByRefs.filter((item): item is LibraryItem => item !== null);
}

export async function fetchThreatLibraryItemsByRefs(
  token: string,
  orgId: string,
  refs: string[]
): Promise<LibraryItem[]> {
  const data = await graphql(
    token,
    THREAT_ITEMS_QUERY,
    { orgId, referenceIds: refs },
    z.object({ threatLibraryItemsByRefs: z.array(LibraryItemSchema.nullable()).default([]) })
  );
  return data.threatLibraryItemsByRefs.filter((item): item is LibraryItem => item !== null);
}
