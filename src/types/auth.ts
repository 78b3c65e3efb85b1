// Auth types for CLI Device Flow and per-organization token storage

import { z } from 'zod';

export const DeviceCodeResponseSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_url: z.string().min(1),
  expires_in: z.number().int().positive(),
  interval: z.number().int().nonnegative().default(5),
});

export type DeviceCodeResponse = z.infer<typeof DeviceCodeResponseSchema>;

export interface DeviceAuthorizationSession {
  deviceCode: string;
  userCode: string;
  verificationUrl: string;
  /** Epoch milliseconds. */
  issuedAt: number;
  /** Epoch milliseconds; polling never runs past this. */
  expiresAt: number;
  /** Seconds between polls, at least 1. */
  interval: number;
  /** Lifetime advertised by the server, in seconds. */
  expiresIn: number;
}

export const DeviceCredentialSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  organization_id: z.string().optional(),
  expires_in: z.number().optional(),
  /** Unix seconds. */
  expires_at: z.number().optional(),
});

export type DeviceCredentialPayload = z.infer<typeof DeviceCredentialSchema>;

export const PollErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string().default(''),
    status: z.number().optional(),
  }),
});

export const AccessCredentialSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  org_name: z.string(),
  /** Unix seconds. */
  expires_at: z.number().optional(),
});

export type AccessCredential = z.infer<typeof AccessCredentialSchema>;

export const TOKEN_STORE_VERSION = 2;

export const TokenStoreSchema = z.object({
  version: z.literal(TOKEN_STORE_VERSION),
  default_org: z.string(),
  tokens: z.record(z.string(), AccessCredentialSchema),
});

export type TokenStore = z.infer<typeof TokenStoreSchema>;
