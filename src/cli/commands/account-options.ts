import { Command } from 'commander';
import { AccountOptions } from '../credentials';
import { GlobalOptions } from '../global-options';

export function withAccountOptions(command: Command): Command {
  return command
    .option('-p, --password <password>', 'archive account password')
    .option('--password-file <path>', 'file whose first line is the password');
}

export function accountOf(options: AccountOptions): AccountOptions {
  return { password: options.password, passwordFile: options.passwordFile };
}

export function globalsOf(command: Command): GlobalOptions {
  const { archive, pollInterval, deadline, logLevel } = command.optsWithGlobals<GlobalOptions>();
  return { archive, pollInterval, deadline, logLevel };
}
