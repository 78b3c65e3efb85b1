import { Command } from 'commander';
import chalk from 'chalk';
import { TokenStoreService } from '../services/token-store.service';
import { NoTokenError } from '../errors';
import { reportError } from '../ui/formatters';

export const logoutCommand = new Command('logout')
  .description('Remove stored credentials (the default organization unless told otherwise)')
  .option('--org-id <id>', 'Log out of this organization')
  .option('--all', 'Log out of every organization')
  .action(async (options: { orgId?: string; all?: boolean }) => {
    try {
      const store = new TokenStoreService();

      if (options.all) {
        const count = await store.removeAll();
        if (count === 0) {
          console.log(chalk.yellow('You are not logged in.'));
        } else {
          console.log(chalk.green(`Logged out of ${count} organization${count === 1 ? '' : 's'}.`));
        }
        process.exit(0);
        return;
      }

      let orgId = options.orgId;
      if (!orgId) {
        try {
          orgId = await store.getDefault();
        } catch (err) {
          if (!(err instanceof NoTokenError)) throw err;
          console.log(chalk.yellow(err.message));
          process.exit(0);
          return;
        }
      }

      const removed = await store.removeCredential(orgId);
      const label = removed.org_name ? `${removed.org_name} (${orgId})` : orgId;
      console.log(chalk.green(`Logged out of ${label}.`));
      process.exit(0);
    } catch (err) {
      process.exit(reportError(err));
    }
  });
