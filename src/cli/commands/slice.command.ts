import { Command } from 'commander';
import { SliceWorkflow } from '../../workflows/slice.workflow';
import { SliceOptionsSchema, validateOptions } from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface SliceCommandOptions extends AccountOptions {
  type: string;
}

export function registerSliceCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('slice'))
    .description('split the cubes of a scheduling block into cubes of fewer channels')
    .argument('<username>', 'archive account user name')
    .argument('<sbid>', 'scheduling block id')
    .argument('<numChannels>', 'channels per output cube')
    .argument('<destination>', 'directory to write the files to')
    .option('--type <subtype>', 'data product subtype of the cubes', 'spectral.restored.3d')
    .action(
      async (
        username: string,
        sbid: string,
        numChannels: string,
        destination: string,
        options: SliceCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(SliceOptionsSchema, { sbid, numChannels, type: options.type });
        await runner.run(
          {
            username,
            destinationDir: destination,
            account: accountOf(options),
            global: globalsOf(command),
          },
          (app, context) => app.get(SliceWorkflow).execute(context, dto),
        );
      },
    );
}
