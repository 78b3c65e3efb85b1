import chalk from 'chalk';
import { BACKEND_NAME } from '../config';
import {
  ConfigurationError,
  DocumentNotFoundError,
  MembershipError,
  UploadAfterCreateError,
  errorMessage,
  isCloudError,
} from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import { hasExpired } from '../services/auth.service';
import type { LibraryRefCheck } from '../services/reconcile.service';
import type { AccessCredential } from '../types/auth';

/** Expiry column text: "never", or the ISO date and time in UTC. */
export function formatExpiry(expiresAt: number | undefined): string {
  if (expiresAt === undefined) return 'never';
  return new Date(expiresAt * 1000).toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC');
}

export function credentialStatus(credential: AccessCredential, nowMs: number = Date.now()): string {
  return hasExpired(credential, nowMs) ? chalk.red('Expired') : chalk.green('Valid');
}

const COLUMNS = [
  { title: 'ORG ID', width: 38 },
  { title: 'ORG NAME', width: 24 },
  { title: 'DEFAULT', width: 8 },
  { title: 'STATUS', width: 8 },
];

// padEnd on the raw text, then colour, so ANSI codes don't skew alignment
function cell(text: string, width: number, colour?: (s: string) => string): string {
  const padded = text.length >= width ? `${text.slice(0, width - 1)} ` : text.padEnd(width);
  return colour ? colour(padded) : padded;
}

export function formatTokenTable(
  tokens: Record<string, AccessCredential>,
  defaultOrg: string,
  nowMs: number = Date.now()
): string[] {
  const header = COLUMNS.map((c) => cell(c.title, c.width)).join('') + 'EXPIRES';
  const lines = [chalk.bold(header)];

  for (const orgId of Object.keys(tokens).sort()) {
    const credential = tokens[orgId];
    const expired = hasExpired(credential, nowMs);
    lines.push(
      cell(orgId, COLUMNS[0].width) +
        cell(credential.org_name || '-', COLUMNS[1].width) +
        cell(orgId === defaultOrg ? '*' : '', COLUMNS[2].width) +
        cell(expired ? 'Expired' : 'Valid', COLUMNS[3].width, expired ? chalk.red : chalk.green) +
        formatExpiry(credential.expires_at)
    );
  }
  return lines;
}

/** Extra guidance printed under an error message. */
export function errorHints(err: unknown): string[] {
  if (err instanceof MembershipError) {
    if (err.available.length === 0) {
      return ['Your account does not belong to any organization.'];
    }
    return [
      'Available organizations:',
      ...err.available.map((o) => `  ${o.slug}  ${chalk.dim(`${o.name}${o.role ? `, ${o.role}` : ''}`)}`),
    ];
  }
  if (err instanceof DocumentNotFoundError) {
    return [
      `Create it first, or fix the slug. Removing the document attribute lets \`${BACKEND_NAME} push\` create it.`,
    ];
  }
  if (err instanceof ConfigurationError) {
    return [
      'Expected exactly one backend block, for example:',
      chalk.dim(`  backend "${BACKEND_NAME}" {`),
      chalk.dim('    organization = "your-org-slug"'),
      chalk.dim('  }'),
    ];
  }
  if (err instanceof UploadAfterCreateError) {
    return [
      `The threat model was created and the local file updated. Run \`${BACKEND_NAME} push\` again to upload it.`,
    ];
  }
  return [];
}

/**
 * Print an error with its hints to stderr and return the exit code:
 * 1 for known failures, 2 for anything unexpected.
 */
export function reportError(err: unknown): number {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  for (const line of errorHints(err)) {
    console.error(line);
  }
  return isCloudError(err) ? 1 : 2;
}

/**
 * Warn about refs that are unknown or not published in the organization's
 * library, and confirm the ones that are. Never fails the command.
 */
export function reportLibraryRefs(
  checks: LibraryRefCheck[],
  log: Pick<Logger, 'warn'> = defaultLogger
): void {
  for (const check of checks) {
    if (check.error) {
      log.warn(`Could not validate ${check.kind} refs: ${check.error.message}`);
      continue;
    }
    if (check.missing.length > 0) {
      log.warn(`Unknown ${check.kind} refs: ${check.missing.join(', ')}`);
    }
    if (check.unpublished.length > 0) {
      const list = check.unpublished.map(({ ref, status }) => `${ref} (${status})`).join(', ');
      log.warn(`Non-PUBLISHED ${check.kind} refs: ${list}`);
    }
    if (check.published > 0) {
      console.log(chalk.green(`✓ ${check.published} ${check.kind} ref(s) validated (PUBLISHED)`));
    }
  }
}
