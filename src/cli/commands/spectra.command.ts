import { Command } from 'commander';
import { SpectraWorkflow } from '../../workflows/spectra.workflow';
import { SpectraOptionsSchema, validateOptions } from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface SpectraCommandOptions extends AccountOptions {
  radius: string;
}

export function registerSpectraCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('spectra'))
    .description('extract spectra at a list of positions from every spectral cube covering them')
    .argument('<username>', 'archive account user name')
    .argument('<sourceFile>', 'file with one "ra dec" pair per line')
    .argument('<destination>', 'directory to write the files to')
    .option('--radius <degrees>', 'extraction radius', '1.0')
    .action(
      async (
        username: string,
        sourceFile: string,
        destination: string,
        options: SpectraCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(SpectraOptionsSchema, { sourceFile, radius: options.radius });
        await runner.run(
          {
            username,
            destinationDir: destination,
            account: accountOf(options),
            global: globalsOf(command),
          },
          (app, context) => app.get(SpectraWorkflow).execute(context, dto),
        );
      },
    );
}
