import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ApiError } from '../api.service';
import { fingerprint, readDocument } from '../document.service';
import { rewriteBackendBlock } from '../backend-rewriter.service';
import {
  checkBackend,
  checkLibraryRefs,
  pushDocument,
  validateDocument,
  type CatalogClient,
  type ReconcileDeps,
} from '../reconcile.service';
import {
  AuthError,
  ConfigurationError,
  DocumentError,
  DocumentNotFoundError,
  MembershipError,
  UploadAfterCreateError,
} from '../../errors';
import type { UserInfo } from '../../types/cloud';

const TOKEN = 'test-token';

const userInfo: UserInfo = {
  user: { id: 'u1', email: 'dev@example.com', full_name: 'Dev' },
  organizations: [
    { organization: { id: 'org-1', name: 'Acme', slug: 'acme' }, role: 'admin' },
    { organization: { id: 'org-2', name: 'Beta', slug: 'beta' }, role: 'member' },
  ],
};

const remote = { id: 'doc-1', name: 'Payments', slug: 'payments' };

function source(attrs: string): string {
  return `backend "tmcloud" {\n${attrs}}\n\nthreatmodel "Payments" {\n  description = "Card flows"\n}\n`;
}

function makeCatalog() {
  return {
    fetchUserInfo: vi.fn<CatalogClient['fetchUserInfo']>().mockResolvedValue(userInfo),
    fetchDocument: vi.fn<CatalogClient['fetchDocument']>().mockResolvedValue(remote),
    fetchDocumentVersions: vi.fn<CatalogClient['fetchDocumentVersions']>().mockResolvedValue([]),
    createDocument: vi.fn<CatalogClient['createDocument']>().mockResolvedValue({
      id: 'doc-9',
      name: 'Payments',
      slug: 'payments-x1',
    }),
    uploadDocument: vi.fn<CatalogClient['uploadDocument']>().mockResolvedValue(undefined),
    fetchControlLibraryItemsByRefs: vi
      .fn<CatalogClient['fetchControlLibraryItemsByRefs']>()
      .mockResolvedValue([]),
    fetchThreatLibraryItemsByRefs: vi
      .fn<CatalogClient['fetchThreatLibraryItemsByRefs']>()
      .mockResolvedValue([]),
  };
}

const REFERENCING_MODEL = `backend "tmcloud" {
  organization = "acme"
}

threatmodel "Payments" {
  threat {
    ref = "THR-001"
    control {
      ref = "CTL-010"
    }
    control {
      ref = "CTL-020"
    }
    control {
      ref = "CTL-030"
    }
  }
}
`;

describe('reconcile.service', () => {
  let dir: string;
  let file: string;
  let catalog: ReturnType<typeof makeCatalog>;
  let deps: ReconcileDeps;

  async function writeModel(text: string): Promise<string> {
    await fs.writeFile(file, text);
    return fingerprint(text);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tmcloud-reconcile-'));
    file = path.join(dir, 'model.hcl');
    catalog = makeCatalog();
    deps = {
      catalog,
      readDocument,
      rewriteBackendBlock: (filePath, slug) => rewriteBackendBlock(filePath, slug),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('checkBackend', () => {
    const backend = { name: 'tmcloud', organization: 'acme', document: '', line: 1 };

    it('accepts exactly one tmcloud block with an organization', () => {
      expect(checkBackend([backend])).toBe(backend);
    });

    it.each([
      [[], 'none', 'no backend block found'],
      [[backend, backend], 'multiple', 'multiple backend blocks found (2)'],
      [[{ ...backend, name: 'other' }], 'wrong-name', "backend name is 'other', expected 'tmcloud'"],
      [[{ ...backend, organization: '' }], 'missing-organization', 'backend organization is not specified'],
    ])('rejects %j', (backends, reason, message) => {
      const err = (() => {
        try {
          checkBackend(backends);
        } catch (e) {
          return e;
        }
        return null;
      })();
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ reason, message });
    });
  });

  describe('validateDocument', () => {
    it('makes no network calls when the backend block is invalid', async () => {
      await writeModel('threatmodel "x" {}\n');

      await expect(validateDocument(TOKEN, file, deps)).rejects.toThrow('no backend block found');
      expect(catalog.fetchUserInfo).not.toHaveBeenCalled();
    });

    it('makes no network calls for multiple backend blocks', async () => {
      await writeModel('backend "tmcloud" {\n  organization = "acme"\n}\nbackend "tmcloud" {\n  organization = "acme"\n}\n');

      await expect(validateDocument(TOKEN, file, deps)).rejects.toThrow('multiple backend blocks found (2)');
      expect(catalog.fetchUserInfo).not.toHaveBeenCalled();
    });

    it('throws MembershipError listing the available organizations', async () => {
      await writeModel(source('  organization = "gamma"\n'));

      const err = await validateDocument(TOKEN, file, deps).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MembershipError);
      expect(err).toMatchObject({
        organization: 'gamma',
        available: [
          { name: 'Acme', slug: 'acme', role: 'admin' },
          { name: 'Beta', slug: 'beta', role: 'member' },
        ],
      });
      expect(catalog.fetchDocument).not.toHaveBeenCalled();
    });

    it('returns only the org id when no document is declared', async () => {
      await writeModel(source('  organization = "beta"\n'));

      const { outcome } = await validateDocument(TOKEN, file, deps);

      expect(outcome).toEqual({ orgId: 'org-2', documentSlug: '', matchedVersion: '' });
      expect(catalog.fetchDocument).not.toHaveBeenCalled();
    });

    it('matches the current version by fingerprint', async () => {
      const hash = await writeModel(source('  organization = "acme"\n  document = "payments"\n'));
      catalog.fetchDocumentVersions.mockResolvedValue([
        { id: 'v2', version: '2.0', spec_file_hash: 'other', is_current: false },
        { id: 'v3', version: '3.0', spec_file_hash: hash, is_current: true },
      ]);

      const { outcome } = await validateDocument(TOKEN, file, deps);

      expect(outcome).toEqual({ orgId: 'org-1', documentSlug: 'payments', matchedVersion: '3.0' });
      expect(catalog.fetchDocument).toHaveBeenCalledWith(TOKEN, 'org-1', 'payments');
      expect(catalog.fetchDocumentVersions).toHaveBeenCalledWith(TOKEN, 'org-1', 'doc-1');
    });

    it('reports a matching but stale version without matching it', async () => {
      const hash = await writeModel(source('  organization = "acme"\n  document = "payments"\n'));
      catalog.fetchDocumentVersions.mockResolvedValue([
        { id: 'v1', version: '1.0', spec_file_hash: hash, is_current: false },
        { id: 'v2', version: '2.0', spec_file_hash: 'other', is_current: true },
      ]);

      const result = await validateDocument(TOKEN, file, deps);

      expect(result.outcome.matchedVersion).toBe('');
      expect(result.staleVersion).toBe('1.0');
    });

    it('throws DocumentNotFoundError when the declared document is missing', async () => {
      await writeModel(source('  organization = "acme"\n  document = "ghost"\n'));
      catalog.fetchDocument.mockRejectedValue(new ApiError(404, 'Threat model not found: ghost'));

      const err = await validateDocument(TOKEN, file, deps).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DocumentNotFoundError);
      expect(err).toMatchObject({ slug: 'ghost', orgId: 'org-1', message: "Backend document 'ghost' not found" });
    });

    it('propagates other catalog failures', async () => {
      await writeModel(source('  organization = "acme"\n'));
      catalog.fetchUserInfo.mockRejectedValue(new AuthError());

      await expect(validateDocument(TOKEN, file, deps)).rejects.toBeInstanceOf(AuthError);
    });
  });

  describe('pushDocument', () => {
    it('does nothing when the current version matches', async () => {
      const hash = await writeModel(source('  organization = "acme"\n  document = "payments"\n'));
      catalog.fetchDocumentVersions.mockResolvedValue([
        { id: 'v3', version: '3.0', spec_file_hash: hash, is_current: true },
      ]);

      const result = await pushDocument(TOKEN, file, {}, deps);

      expect(result).toEqual({ action: 'up-to-date', orgId: 'org-1', slug: 'payments', version: '3.0' });
      expect(catalog.uploadDocument).not.toHaveBeenCalled();
    });

    it('uploads a new version when the content changed', async () => {
      await writeModel(source('  organization = "acme"\n  document = "payments"\n'));

      const result = await pushDocument(TOKEN, file, { ignoreLinkedControls: true }, deps);

      expect(result).toEqual({ action: 'uploaded', orgId: 'org-1', slug: 'payments' });
      expect(catalog.uploadDocument).toHaveBeenCalledWith(TOKEN, 'org-1', 'payments', file, {
        ignoreLinkedControls: true,
      });
    });

    it('creates, rewrites the backend block, then uploads', async () => {
      await writeModel(source('  organization = "acme"\n'));
      let uploadedContent = '';
      catalog.uploadDocument.mockImplementation(async (_token, _org, _slug, filePath) => {
        uploadedContent = await fs.readFile(filePath, 'utf-8');
      });

      const result = await pushDocument(TOKEN, file, {}, deps);

      expect(result).toMatchObject({ action: 'created', orgId: 'org-1', slug: 'payments-x1' });
      expect(catalog.createDocument).toHaveBeenCalledWith(TOKEN, 'org-1', 'Payments', 'Card flows');
      expect(catalog.uploadDocument).toHaveBeenCalledWith(TOKEN, 'org-1', 'payments-x1', file, {
        ignoreLinkedControls: undefined,
      });
      const expected = source('  organization = "acme"\n  document = "payments-x1"\n');
      expect(uploadedContent).toBe(expected);
      expect(await fs.readFile(file, 'utf-8')).toBe(expected);
      expect(await fs.readdir(dir)).toEqual(['model.hcl']);
    });

    it('skips creation with noCreate', async () => {
      await writeModel(source('  organization = "acme"\n'));

      const result = await pushDocument(TOKEN, file, { noCreate: true }, deps);

      expect(result).toEqual({ action: 'skipped', orgId: 'org-1', slug: '' });
      expect(catalog.createDocument).not.toHaveBeenCalled();
    });

    it('creates without touching the file or uploading with noUpdateLocal', async () => {
      const text = source('  organization = "acme"\n');
      await writeModel(text);

      const result = await pushDocument(TOKEN, file, { noUpdateLocal: true }, deps);

      expect(result).toMatchObject({ action: 'created-not-uploaded', slug: 'payments-x1' });
      expect(result.rewriteError).toBeUndefined();
      expect(await fs.readFile(file, 'utf-8')).toBe(text);
      expect(catalog.uploadDocument).not.toHaveBeenCalled();
    });

    it('skips the upload and records the error when the rewrite fails', async () => {
      await writeModel(source('  organization = "acme"\n'));
      deps.rewriteBackendBlock = () => Promise.reject(new Error('EACCES: permission denied'));

      const result = await pushDocument(TOKEN, file, {}, deps);

      expect(result.action).toBe('created-not-uploaded');
      expect(result.rewriteError?.message).toBe('EACCES: permission denied');
      expect(catalog.uploadDocument).not.toHaveBeenCalled();
    });

    it('reports that the document was created when the upload fails', async () => {
      await writeModel(source('  organization = "acme"\n'));
      catalog.uploadDocument.mockRejectedValue(new Error('socket hang up'));

      const err = await pushDocument(TOKEN, file, {}, deps).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(UploadAfterCreateError);
      expect(err).toMatchObject({
        slug: 'payments-x1',
        message: "Threat model 'payments-x1' was created, but the upload failed: socket hang up",
      });
    });

    it('requires exactly one threatmodel block to create', async () => {
      await writeModel('backend "tmcloud" {\n  organization = "acme"\n}\n');

      await expect(pushDocument(TOKEN, file, {}, deps)).rejects.toBeInstanceOf(DocumentError);
      expect(catalog.createDocument).not.toHaveBeenCalled();
    });

    it('aborts on a missing declared document without creating one', async () => {
      await writeModel(source('  organization = "acme"\n  document = "ghost"\n'));
      catalog.fetchDocument.mockRejectedValue(new ApiError(404, 'Threat model not found: ghost'));

      await expect(pushDocument(TOKEN, file, {}, deps)).rejects.toBeInstanceOf(DocumentNotFoundError);
      expect(catalog.createDocument).not.toHaveBeenCalled();
      expect(catalog.uploadDocument).not.toHaveBeenCalled();
    });
  });

  describe('checkLibraryRefs', () => {
    it('makes no lookups when the document has no refs', async () => {
      const checks = await checkLibraryRefs(TOKEN, 'org-1', { controlRefs: [], threatRefs: [] }, catalog);

      expect(checks).toEqual([]);
      expect(catalog.fetchControlLibraryItemsByRefs).not.toHaveBeenCalled();
      expect(catalog.fetchThreatLibraryItemsByRefs).not.toHaveBeenCalled();
    });

    it('splits refs into published, unpublished and missing', async () => {
      catalog.fetchControlLibraryItemsByRefs.mockResolvedValue([
        { id: 'c1', referenceId: 'CTL-010', name: 'Tokenize', status: 'PUBLISHED' },
        { id: 'c2', referenceId: 'CTL-020', name: 'Rate limit', status: 'DRAFT' },
      ]);

      const checks = await checkLibraryRefs(
        TOKEN,
        'org-1',
        { controlRefs: ['CTL-010', 'CTL-020', 'CTL-030'], threatRefs: [] },
        catalog
      );

      expect(catalog.fetchControlLibraryItemsByRefs).toHaveBeenCalledWith(TOKEN, 'org-1', [
        'CTL-010',
        'CTL-020',
        'CTL-030',
      ]);
      expect(checks).toEqual([
        {
          kind: 'control',
          refs: ['CTL-010', 'CTL-020', 'CTL-030'],
          missing: ['CTL-030'],
          unpublished: [{ ref: 'CTL-020', status: 'DRAFT' }],
          published: 1,
        },
      ]);
    });

    it('records a failed lookup instead of throwing', async () => {
      const failure = new Error('GraphQL error: forbidden');
      catalog.fetchThreatLibraryItemsByRefs.mockRejectedValue(failure);

      const checks = await checkLibraryRefs(
        TOKEN,
        'org-1',
        { controlRefs: [], threatRefs: ['THR-001'] },
        catalog
      );

      expect(checks).toEqual([
        { kind: 'threat', refs: ['THR-001'], missing: [], unpublished: [], published: 0, error: failure },
      ]);
    });
  });

  describe('library refs during validate and push', () => {
    it('validates the refs of a document without a slug', async () => {
      await writeModel(REFERENCING_MODEL);
      catalog.fetchThreatLibraryItemsByRefs.mockResolvedValue([
        { id: 't1', referenceId: 'THR-001', name: 'Skimming', status: 'PUBLISHED' },
      ]);

      const { libraryRefs } = await validateDocument(TOKEN, file, deps);

      expect(catalog.fetchControlLibraryItemsByRefs).toHaveBeenCalledWith(TOKEN, 'org-1', [
        'CTL-010',
        'CTL-020',
        'CTL-030',
      ]);
      expect(libraryRefs).toEqual([
        {
          kind: 'control',
          refs: ['CTL-010', 'CTL-020', 'CTL-030'],
          missing: ['CTL-010', 'CTL-020', 'CTL-030'],
          unpublished: [],
          published: 0,
        },
        { kind: 'threat', refs: ['THR-001'], missing: [], unpublished: [], published: 1 },
      ]);
    });

    it('returns no checks for a document without refs', async () => {
      await writeModel(source('  organization = "acme"\n'));

      const { libraryRefs } = await validateDocument(TOKEN, file, deps);

      expect(libraryRefs).toEqual([]);
    });

    it('still pushes when refs are unknown', async () => {
      await writeModel(REFERENCING_MODEL);

      const result = await pushDocument(TOKEN, file, { noUpdateLocal: true }, deps);

      expect(result.action).toBe('created-not-uploaded');
      expect(result.libraryRefs?.map((check) => check.missing)).toEqual([
        ['CTL-010', 'CTL-020', 'CTL-030'],
        ['THR-001'],
      ]);
    });

    it('leaves libraryRefs unset on a push without refs', async () => {
      await writeModel(source('  organization = "acme"\n'));

      const result = await pushDocument(TOKEN, file, { noUpdateLocal: true }, deps);

      expect(result).not.toHaveProperty('libraryRefs');
    });
  });
});
