import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { requireCredential } from '../middleware/auth-guard';
import { pushDocument, type PushResult } from '../services/reconcile.service';
import { logger } from '../logger';
import { reportError, reportLibraryRefs } from '../ui/formatters';

interface PushCommandOptions {
  orgId?: string;
  create: boolean;
  updateLocal: boolean;
  ignoreLinkedControls?: boolean;
}

function manualStep(result: PushResult): string {
  return `Add ${chalk.bold(`document = "${result.slug}"`)} to the backend block, then run \`tmcloud push\` again.`;
}

/** Prints the outcome and returns the exit code. */
function printResult(file: string, result: PushResult): number {
  switch (result.action) {
    case 'up-to-date':
      console.log(chalk.green(`Already up to date (version ${result.version ?? '?'}).`));
      return 0;
    case 'uploaded':
      console.log(chalk.green(`Uploaded ${file} to ${chalk.bold(result.slug)}.`));
      return 0;
    case 'created':
      console.log(chalk.green(`Created threat model ${chalk.bold(result.slug)} and uploaded ${file}.`));
      console.log(chalk.dim(`  Backend block updated with document = "${result.slug}"`));
      return 0;
    case 'created-not-uploaded':
      console.log(chalk.green(`Created threat model ${chalk.bold(result.slug)}.`));
      if (result.rewriteError) {
        logger.warn(`Could not update ${file}: ${result.rewriteError.message}. The file was left unchanged.`);
        console.log(manualStep(result));
        return 1;
      }
      console.log(manualStep(result));
      return 0;
    case 'skipped':
      console.log(
        chalk.yellow('No document set in the backend block and --no-create given. Nothing was pushed.')
      );
      return 0;
  }
}

export const pushCommand = new Command('push')
  .description('Upload a threat-model file, creating its cloud document when the backend block names none')
  .argument('<file>', 'Threat-model file')
  .option('--org-id <id>', 'Use the token stored for this organization')
  .option('--no-create', 'Do not create a cloud document when none is set')
  .option('--no-update-local', 'Do not write the new document slug back to the file (skips the upload)')
  .option('--ignore-linked-controls', 'Ask the server to ignore linked controls in this version')
  .action(async (file: string, options: PushCommandOptions) => {
    try {
      const { token } = await requireCredential({ orgId: options.orgId });

      const spinner = ora(`Pushing ${file}…`).start();
      let result: PushResult;
      try {
        result = await pushDocument(token, file, {
          noCreate: !options.create,
          noUpdateLocal: !options.updateLocal,
          ignoreLinkedControls: options.ignoreLinkedControls,
        });
      } finally {
        spinner.stop();
      }

      if (result.libraryRefs) reportLibraryRefs(result.libraryRefs);
      const code = printResult(file, result);
      if (code !== 0) process.exit(code);
    } catch (err) {
      process.exit(reportError(err));
    }
  });
