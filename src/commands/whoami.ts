import { Command } from 'commander';
import chalk from 'chalk';
import { requireCredential } from '../middleware/auth-guard';
import { fetchUserInfo } from '../services/api.service';
import { TokenStoreService } from '../services/token-store.service';
import { credentialStatus, formatExpiry, reportError } from '../ui/formatters';

export const whoamiCommand = new Command('whoami')
  .description('Show the authenticated user and organization')
  .option('--org-id <id>', 'Organization to check (defaults to the default organization)')
  .action(async (options: { orgId?: string }) => {
    try {
      const store = new TokenStoreService();
      const { orgId, token } = await requireCredential({ orgId: options.orgId, store });
      const info = await fetchUserInfo(token);

      const { user } = info;
      const membership = info.organizations.find((m) => m.organization.id === orgId);

      console.log(`${chalk.bold(user.full_name || user.email)}${user.full_name ? ` (${user.email})` : ''}`);
      console.log(
        `${chalk.dim('Org:')}     ${membership ? `${membership.organization.name} (${membership.organization.slug})` : orgId}`
      );
      if (membership?.role) {
        console.log(`${chalk.dim('Role:')}    ${membership.role}`);
      }

      const { tokens } = await store.listCredentials();
      const credential = tokens[orgId];
      if (credential) {
        console.log(`${chalk.dim('Token:')}   ${credentialStatus(credential)}`);
        console.log(`${chalk.dim('Expires:')} ${formatExpiry(credential.expires_at)}`);
      }

      if (info.organizations.length > 1) {
        console.log();
        console.log(chalk.dim('Other organizations:'));
        for (const m of info.organizations) {
          if (m.organization.id === orgId) continue;
          console.log(chalk.dim(`  ${m.organization.slug}  ${m.organization.name}`));
        }
      }
    } catch (err) {
      process.exit(reportError(err));
    }
  });
