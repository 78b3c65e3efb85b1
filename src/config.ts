import * as dotenv from 'dotenv';
import * as path from 'path';
import chalk from 'chalk';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.resolve(process.cwd(), '.env.development') });
}

// Warn if TLS certificate validation has been disabled.
if (process.env.NODE_TLS_REJECT_UNAUTHORIZED === '0') {
  process.stderr.write(
    chalk.yellow(
      '⚠  WARNING: NODE_TLS_REJECT_UNAUTHORIZED=0 disables TLS certificate validation.\n' +
      '   Your auth tokens may be exposed to interception. Unset this variable in production.\n'
    )
  );
}

export const DEFAULT_API_URL = 'https://api.tmcloud.dev';

/** Backend name a document must declare to sync with the cloud. */
export const BACKEND_NAME = 'tmcloud';

export const ENV_API_URL = 'TMCLOUD_API_URL';
export const ENV_ORG = 'TMCLOUD_ORG';
export const ENV_TOKEN = 'TMCLOUD_TOKEN';
export const ENV_LOG_LEVEL = 'TMCLOUD_LOG_LEVEL';

// In production, only allow HTTPS URLs to prevent token interception.
function validateUrl(url: string, envName: string): string {
  if (process.env.NODE_ENV !== 'production') return url;
  if (!url.startsWith('https://')) {
    process.stderr.write(
      chalk.yellow(
        `⚠  WARNING: ${envName}=${url} is not HTTPS. ` +
        `Auth tokens may be sent over an insecure connection.\n`
      )
    );
  }
  return url;
}

/**
 * Base URL of the cloud service, without the `/api/v1` prefix.
 * Read on every call so tests and long-lived shells can change the override.
 */
export function getBaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[ENV_API_URL];
  if (!raw) return DEFAULT_API_URL;
  return validateUrl(raw.replace(/\/+$/, ''), ENV_API_URL);
}

export function getApiUrl(env: NodeJS.ProcessEnv = process.env): string {
  return `${getBaseUrl(env)}/api/v1`;
}
