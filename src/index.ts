import { createRequire } from 'module';
import { Command } from 'commander';
import { loginCommand } from './commands/login';
import { logoutCommand } from './commands/logout';
import { whoamiCommand } from './commands/whoami';
import { tokenCommand } from './commands/token';
import { validateCommand } from './commands/validate';
import { pushCommand } from './commands/push';
import { modelsCommand } from './commands/models';
import { doctorCommand } from './commands/doctor';

const require = createRequire(import.meta.url);
const { version } = require('../package.json') as { version: string };

const program = new Command();

program
  .name('tmcloud')
  .version(version)
  .description('CLI for tmcloud: authenticate, and keep local threat-model files in sync with the cloud');

program.addCommand(loginCommand);
program.addCommand(logoutCommand);
program.addCommand(whoamiCommand);
program.addCommand(tokenCommand);
program.addCommand(validateCommand);
program.addCommand(pushCommand);
program.addCommand(modelsCommand);
program.addCommand(doctorCommand);

program.addHelpText('after', `
Getting started:
  $ tmcloud login              Authenticate with a device code
  $ tmcloud validate model.hcl Compare a threat model with the cloud
  $ tmcloud push model.hcl     Upload it, creating the cloud document if needed

Troubleshooting:
  $ tmcloud doctor             Run diagnostic checks on your setup
  $ tmcloud whoami             Show current user and organization
`);

program.parse(process.argv);
