import { Command } from 'commander';
import chalk from 'chalk';
import { identifyOrganization } from '../services/auth.service';
import { fetchUserInfo } from '../services/api.service';
import { TokenStoreService } from '../services/token-store.service';
import { formatTokenTable, reportError } from '../ui/formatters';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

const addCommand = new Command('add')
  .description('Store an API token created in the web app (read from stdin unless --token is given)')
  .option('--token <token>', 'API token')
  .option('--org-id <id>', 'Organization the token belongs to')
  .action(async (options: { token?: string; orgId?: string }) => {
    try {
      const token = options.token ?? (await readStdin());
      if (!token) {
        console.error(chalk.red('Error: no token given. Pass --token or pipe it on stdin.'));
        process.exit(1);
        return;
      }

      const info = await fetchUserInfo(token);
      const org = options.orgId
        ? identifyOrganization({ organization_id: options.orgId }, info)
        : identifyOrganization({}, info);
      if (!org) {
        console.error(chalk.red('Error: this token does not belong to any organization.'));
        process.exit(1);
        return;
      }

      const store = new TokenStoreService();
      await store.setCredential(org.orgId, token, 'Bearer', org.orgName);
      console.log(
        chalk.green(`Token stored for ${chalk.bold(org.orgName || org.orgId)} ${chalk.dim(`(${org.orgId})`)}`)
      );
    } catch (err) {
      process.exit(reportError(err));
    }
  });

const listCommand = new Command('list')
  .description('List stored tokens')
  .action(async () => {
    try {
      const { tokens, defaultOrg } = await new TokenStoreService().listCredentials();
      if (Object.keys(tokens).length === 0) {
        console.log(chalk.dim('No tokens stored. Run `tmcloud login` to authenticate.'));
        return;
      }
      for (const line of formatTokenTable(tokens, defaultOrg)) {
        console.log(line);
      }
    } catch (err) {
      process.exit(reportError(err));
    }
  });

const removeCommand = new Command('remove')
  .description('Remove the token for one organization')
  .argument('<org-id>', 'Organization id')
  .action(async (orgId: string) => {
    try {
      const removed = await new TokenStoreService().removeCredential(orgId);
      console.log(chalk.green(`Removed token for ${removed.org_name || orgId}.`));
    } catch (err) {
      process.exit(reportError(err));
    }
  });

const defaultCommand = new Command('default')
  .description('Show the default organization, or set it')
  .argument('[org-id]', 'Organization to make the default')
  .action(async (orgId: string | undefined) => {
    try {
      const store = new TokenStoreService();
      if (orgId) {
        await store.setDefault(orgId);
        console.log(chalk.green(`Default organization set to ${orgId}.`));
        return;
      }
      console.log(await store.getDefault());
    } catch (err) {
      process.exit(reportError(err));
    }
  });

export const tokenCommand = new Command('token')
  .description('Manage stored API tokens')
  .addCommand(addCommand)
  .addCommand(listCommand)
  .addCommand(removeCommand)
  .addCommand(defaultCommand);
