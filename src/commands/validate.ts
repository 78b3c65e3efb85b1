import { Command } from 'commander';
import chalk from 'chalk';
import { requireCredential } from '../middleware/auth-guard';
import { validateDocument } from '../services/reconcile.service';
import { reportError, reportLibraryRefs } from '../ui/formatters';

export const validateCommand = new Command('validate')
  .description('Check a threat-model file against its cloud counterpart without changing anything')
  .argument('<file>', 'Threat-model file')
  .option('--org-id <id>', 'Use the token stored for this organization')
  .action(async (file: string, options: { orgId?: string }) => {
    try {
      const { token } = await requireCredential({ orgId: options.orgId });
      const { outcome, document, remote, staleVersion, libraryRefs } = await validateDocument(token, file);
      const backend = document.backends[0];

      console.log(chalk.green('✓ Backend configuration is valid'));
      console.log(`${chalk.dim('Organization:')} ${backend.organization} ${chalk.dim(`(${outcome.orgId})`)}`);
      reportLibraryRefs(libraryRefs);

      if (!outcome.documentSlug) {
        console.log(chalk.dim('No document set in the backend block. `tmcloud push` will create one.'));
        return;
      }

      console.log(`${chalk.dim('Document:')}     ${remote?.name ?? outcome.documentSlug} ${chalk.dim(`(${outcome.documentSlug})`)}`);
      if (outcome.matchedVersion) {
        console.log(chalk.green(`✓ In sync with version ${outcome.matchedVersion}`));
      } else if (staleVersion) {
        console.log(
          chalk.yellow(`Local file matches version ${staleVersion}, which is not the current version.`)
        );
      } else {
        console.log(
          chalk.yellow('Local file differs from the current cloud version. Run `tmcloud push` to upload it.')
        );
      }
    } catch (err) {
      process.exit(reportError(err));
    }
  });
