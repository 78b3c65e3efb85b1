import { z } from 'zod';

export const OrganizationSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
  subscription_tier: z.string().optional(),
});

export const OrgMembershipSchema = z.object({
  organization: OrganizationSchema,
  role: z.string().default(''),
  joined_at: z.string().optional(),
});

export type OrgMembership = z.infer<typeof OrgMembershipSchema>;

export const UserInfoSchema = z.object({
  user: z
    .object({
      id: z.string().default(''),
      email: z.string().default(''),
      full_name: z.string().default(''),
    })
    .default({}),
  organizations: z.array(OrgMembershipSchema).default([]),
  api_token_organization_id: z.string().optional(),
  api_token_organization_name: z.string().optional(),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

export const RemoteDocumentSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
  description: z.string().optional(),
  status: z.string().optional(),
  version: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type RemoteDocument = z.infer<typeof RemoteDocumentSchema>;

export const RemoteDocumentVersionSchema = z.object({
  id: z.string(),
  version: z.string(),
  spec_file_hash: z.string().default(''),
  is_current: z.boolean().default(false),
  created_by: z.string().optional(),
  created_at: z.string().optional(),
});

export type RemoteDocumentVersion = z.infer<typeof RemoteDocumentVersionSchema>;

export const DocumentVersionsResponseSchema = z.object({
  versions: z.array(RemoteDocumentVersionSchema).default([]),
});

/**
 * Result of comparing a local file with the cloud. Empty strings mean
 * "not established": no membership, no remote document, or no current
 * version with the same fingerprint.
 */
export interface ReconciliationOutcome {
  orgId: string;
  documentSlug: string;
  matchedVersion: string;
}

/** Control or threat from the organization's cloud library. */
export const LibraryItemSchema = z.object({
  id: z.string(),
  referenceId: z.string(),
  name: z.string().default(''),
  status: z.string().default(''),
});

export type LibraryItem = z.infer<typeof LibraryItemSchema>;

export const GraphQLResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});
