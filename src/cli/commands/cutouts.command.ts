import { Command } from 'commander';
import { CutoutsWorkflow } from '../../workflows/cutouts.workflow';
import { CutoutsOptionsSchema, validateOptions } from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface CutoutsCommandOptions extends AccountOptions {
  fullFiles?: boolean;
  radius: string;
  minFlux: string;
}

export function registerCutoutsCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('cutouts'))
    .description('cut the bright continuum components of a scheduling block out of its images and cubes')
    .argument('<username>', 'archive account user name')
    .argument('<sbid>', 'scheduling block id')
    .argument('<destination>', 'directory to write the files to')
    .option('--full-files', 'download whole images and cubes instead of cutouts')
    .option('--radius <degrees>', 'cutout radius', '0.1')
    .option('--min-flux <mJy>', 'minimum component peak flux', '500')
    .action(
      async (
        username: string,
        sbid: string,
        destination: string,
        options: CutoutsCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(CutoutsOptionsSchema, {
          sbid,
          fullFiles: options.fullFiles ?? false,
          radius: options.radius,
          minFlux: options.minFlux,
        });
        await runner.run(
          {
            username,
            destinationDir: destination,
            account: accountOf(options),
            global: globalsOf(command),
          },
          (app, context) => app.get(CutoutsWorkflow).execute(context, dto),
        );
      },
    );
}
