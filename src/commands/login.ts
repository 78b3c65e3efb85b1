import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as AuthService from '../services/auth.service';
import { fetchUserInfo } from '../services/api.service';
import { TokenStoreService } from '../services/token-store.service';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { reportError } from '../ui/formatters';
import type { DeviceCredentialPayload } from '../types/auth';
import type { UserInfo } from '../types/cloud';

export const loginCommand = new Command('login')
  .description('Authenticate with tmcloud using a device code')
  .action(async () => {
    try {
      const session = await AuthService.requestAuthorization();

      console.log();
      console.log(chalk.bold('Open this URL in your browser:'));
      console.log(chalk.cyan(`  ${session.verificationUrl}`));
      console.log();
      console.log(chalk.bold('Enter this code:'));
      console.log(chalk.green.bold(`  ${session.userCode}`));
      console.log();

      const spinner = ora('Waiting for authorization…').start();

      // Ctrl+C exits without writing a credential
      const onSigint = () => {
        spinner.stop();
        console.log('\nCancelled.');
        process.exit(0);
      };
      process.on('SIGINT', onSigint);

      let checks = 0;
      let payload: DeviceCredentialPayload;
      try {
        payload = await AuthService.pollForCredential(session, {
          progress: () => {
            checks += 1;
            spinner.text = `Waiting for authorization… (${checks} checks)`;
          },
        });
      } catch (err) {
        spinner.fail('Authorization failed.');
        console.error(chalk.red(errorMessage(err)));
        process.exit(1);
        return;
      } finally {
        process.removeListener('SIGINT', onSigint);
      }

      let userInfo: UserInfo | null = null;
      try {
        userInfo = await fetchUserInfo(payload.access_token);
      } catch (err) {
        logger.warn(`Could not fetch account details: ${errorMessage(err)}`);
      }

      const org = AuthService.identifyOrganization(payload, userInfo);
      if (!org) {
        spinner.fail('Authorization succeeded, but no organization was found for this account.');
        process.exit(1);
        return;
      }

      const store = new TokenStoreService();
      const backend = await store.setCredential(
        org.orgId,
        payload.access_token,
        payload.token_type,
        org.orgName,
        AuthService.credentialExpiry(payload)
      );

      spinner.succeed(
        `${chalk.green('Logged in to')} ${chalk.bold(org.orgName || org.orgId)} ${chalk.dim(`(${org.orgId})`)}`
      );
      if (backend === 'file') {
        console.log(chalk.dim(`  Token stored in ${store.getFilePath()}`));
      }

      process.exit(0);
    } catch (err) {
      process.exit(reportError(err));
    }
  });
