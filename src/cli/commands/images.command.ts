import { Command } from 'commander';
import { ImagesWorkflow } from '../../workflows/images.workflow';
import { ImagesOptionsSchema, validateOptions } from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface ImagesCommandOptions extends AccountOptions {
  radius: string;
}

export function registerImagesCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('images'))
    .description('download every image and cube covering a sky position')
    .argument('<username>', 'archive account user name')
    .argument('<ra>', 'right ascension, degrees or h:m:s')
    .argument('<dec>', 'declination, degrees or d:m:s')
    .argument('<destination>', 'directory to write the files to')
    .option('--radius <degrees>', 'search radius', '0.1')
    .action(
      async (
        username: string,
        ra: string,
        dec: string,
        destination: string,
        options: ImagesCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(ImagesOptionsSchema, { ra, dec, radius: options.radius });
        await runner.run(
          {
            username,
            destinationDir: destination,
            account: accountOf(options),
            global: globalsOf(command),
          },
          (app, context) => app.get(ImagesWorkflow).execute(context, dto),
        );
      },
    );
}
