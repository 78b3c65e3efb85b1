import chalk from 'chalk';
import { ENV_ORG, ENV_TOKEN } from '../config';
import { NoTokenError } from '../errors';
import { fetchUserInfo } from '../services/api.service';
import { TokenStoreService } from '../services/token-store.service';
import type { UserInfo } from '../types/cloud';

export type UserInfoLookup = (token: string) => Promise<UserInfo>;

export interface CommandCredential {
  orgId: string;
  token: string;
}

export interface GuardOptions {
  /** Value of the command's --org-id flag. */
  orgId?: string;
  store?: TokenStoreService;
  lookup?: UserInfoLookup;
  env?: NodeJS.ProcessEnv;
}

/**
 * Organization a command acts on: --org-id, then TMCLOUD_ORG, then the stored
 * default. With an empty store and a TMCLOUD_TOKEN, the token's first
 * organization from /users/me.
 */
export async function resolveOrgId(
  flagOrgId: string | undefined,
  store: TokenStoreService,
  lookup: UserInfoLookup = fetchUserInfo,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  if (flagOrgId) return flagOrgId;
  const envOrg = env[ENV_ORG];
  if (envOrg) return envOrg;

  const { tokens } = await store.listCredentials();
  if (Object.keys(tokens).length > 0) {
    return store.getDefault();
  }

  const envToken = env[ENV_TOKEN];
  if (!envToken) {
    throw new NoTokenError('No tokens found. Run `tmcloud login` to authenticate.');
  }
  const info = await lookup(envToken);
  const [first] = info.organizations;
  if (!first) {
    throw new NoTokenError(`The token in ${ENV_TOKEN} does not belong to any organization.`);
  }
  return first.organization.id;
}

/** Token and organization for a command, or NoTokenError. */
export async function resolveCredential(options: GuardOptions = {}): Promise<CommandCredential> {
  const store = options.store ?? new TokenStoreService();
  const env = options.env ?? process.env;

  const orgId = await resolveOrgId(options.orgId, store, options.lookup, env);
  const envToken = env[ENV_TOKEN];
  if (envToken) return { orgId, token: envToken };

  const { credential } = await store.getCredential(orgId);
  return { orgId, token: credential.access_token };
}

/**
 * Resolves the credential a command needs.
 * Exits with code 1 and a friendly message if not logged in.
 */
export async function requireCredential(options: GuardOptions = {}): Promise<CommandCredential> {
  try {
    return await resolveCredential(options);
  } catch (err) {
    if (err instanceof NoTokenError) {
      console.error(chalk.red(`Not logged in. ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}
