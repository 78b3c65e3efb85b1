import { Command } from 'commander';
import chalk from 'chalk';
import { requireCredential } from '../middleware/auth-guard';
import { fetchDocuments } from '../services/api.service';
import { reportError } from '../ui/formatters';

export const modelsCommand = new Command('models')
  .description('List the threat models of an organization')
  .option('--org-id <id>', 'Organization to list (defaults to the default organization)')
  .action(async (options: { orgId?: string }) => {
    try {
      const { orgId, token } = await requireCredential({ orgId: options.orgId });
      const documents = await fetchDocuments(token, orgId);

      // Non-TTY: plain output for piping/scripting
      if (!process.stdout.isTTY) {
        for (const d of documents) {
          console.log(`${d.slug}\t${d.name}\t${d.version ?? ''}`);
        }
        return;
      }

      if (documents.length === 0) {
        console.log(chalk.dim('No threat models yet. Run `tmcloud push <file>` to create one.'));
        return;
      }
      for (const d of documents) {
        const version = d.version ? chalk.dim(` v${d.version}`) : '';
        const status = d.status ? chalk.dim(`  [${d.status}]`) : '';
        console.log(`${chalk.bold(d.slug.padEnd(32))} ${d.name}${version}${status}`);
      }
    } catch (err) {
      process.exit(reportError(err));
    }
  });
