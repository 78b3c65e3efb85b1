import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseUrl } from '../config';
import { errorMessage } from '../errors';
import { resolveCredential } from '../middleware/auth-guard';
import { fetchUserInfo } from '../services/api.service';
import { hasExpired } from '../services/auth.service';
import { TokenStoreService } from '../services/token-store.service';
import { KeyringVault, VAULT_ACCOUNT } from '../services/vault.service';
import { formatExpiry } from '../ui/formatters';

interface CheckResult {
  ok: boolean;
  detail: string;
}

interface Check {
  label: string;
  run: () => Promise<CheckResult>;
}

const PASS = chalk.green('PASS');
const FAIL = chalk.red('FAIL');

export function buildChecks(store: TokenStoreService = new TokenStoreService()): Check[] {
  return [
    {
      label: 'Keychain available',
      run: async () => {
        try {
          await new KeyringVault().get(VAULT_ACCOUNT);
          return { ok: true, detail: 'OS keychain is used for token storage' };
        } catch (err) {
          return {
            ok: false,
            detail: `${errorMessage(err)}. Tokens fall back to ${store.getFilePath()}.`,
          };
        }
      },
    },
    {
      label: 'Token store readable',
      run: async () => {
        try {
          const { tokens } = await store.listCredentials();
          const count = Object.keys(tokens).length;
          return { ok: true, detail: `${count} organization${count === 1 ? '' : 's'} stored` };
        } catch (err) {
          return { ok: false, detail: errorMessage(err) };
        }
      },
    },
    {
      label: 'API reachable',
      run: async () => {
        const baseUrl = getBaseUrl();
        try {
          await fetch(baseUrl, { method: 'HEAD', signal: AbortSignal.timeout(5_000) });
          return { ok: true, detail: baseUrl };
        } catch {
          return {
            ok: false,
            detail: `Cannot reach ${baseUrl}. Check your internet connection.`,
          };
        }
      },
    },
    {
      label: 'Authenticated',
      run: async () => {
        try {
          const { orgId, token } = await resolveCredential({ store });
          const info = await fetchUserInfo(token);
          return { ok: true, detail: `${info.user.email || 'token accepted'} (${orgId})` };
        } catch (err) {
          return {
            ok: false,
            detail: `${errorMessage(err)} Run ${chalk.bold('tmcloud login')}.`,
          };
        }
      },
    },
    {
      label: 'Token not expired',
      run: async () => {
        const { tokens, defaultOrg } = await store.listCredentials();
        const credential = tokens[defaultOrg];
        if (!credential) {
          return { ok: false, detail: 'No default organization token.' };
        }
        if (!hasExpired(credential)) {
          return { ok: true, detail: `Expires ${formatExpiry(credential.expires_at)}` };
        }
        return {
          ok: false,
          detail: `Expired at ${formatExpiry(credential.expires_at)}. Run ${chalk.bold('tmcloud login')}.`,
        };
      },
    },
  ];
}

export const doctorCommand = new Command('doctor')
  .description('Run diagnostic checks on your tmcloud setup')
  .action(async () => {
    console.log();
    console.log(chalk.bold('tmcloud doctor'));
    console.log(chalk.dim('─'.repeat(50)));
    console.log();

    let allPassed = true;

    for (const check of buildChecks()) {
      let result: CheckResult;
      try {
        result = await check.run();
      } catch (err) {
        result = { ok: false, detail: errorMessage(err) };
      }
      const badge = result.ok ? PASS : FAIL;
      console.log(`  ${badge}  ${check.label}`);
      console.log(`         ${chalk.dim(result.detail)}`);
      if (!result.ok) allPassed = false;
    }

    console.log();
    if (allPassed) {
      console.log(chalk.green('All checks passed. You are good to go.'));
    } else {
      console.log(
        chalk.yellow('Some checks failed. Follow the instructions above to fix them.')
      );
    }
    console.log();

    process.exit(allPassed ? 0 : 1);
  });
