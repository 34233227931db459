import { Command } from 'commander';
import { SourcesWorkflow } from '../../workflows/sources.workflow';
import { SourcesOptionsSchema, validateOptions } from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface SourcesCommandOptions extends AccountOptions {
  radius: string;
}

export function registerSourcesCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('sources'))
    .description('cut a list of sources out of one cube')
    .argument('<username>', 'archive account user name')
    .argument('<imageId>', 'publisher DID of the cube')
    .argument('<sourceFile>', 'file with one "ra dec" pair per line')
    .argument('<destination>', 'directory to write the files to')
    .option('--radius <degrees>', 'cutout radius', '0.1')
    .action(
      async (
        username: string,
        imageId: string,
        sourceFile: string,
        destination: string,
        options: SourcesCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(SourcesOptionsSchema, {
          imageId,
          sourceFile,
          radius: options.radius,
        });
        await runner.run(
          {
            username,
            destinationDir: destination,
            account: accountOf(options),
            global: globalsOf(command),
          },
          (app, context) => app.get(SourcesWorkflow).execute(context, dto),
        );
      },
    );
}
