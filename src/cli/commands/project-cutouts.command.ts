import { Command } from 'commander';
import { ProjectCutoutsWorkflow } from '../../workflows/project-cutouts.workflow';
import {
  ProjectCutoutsOptionsSchema,
  validateOptions,
} from '../../workflows/dto/workflow-options.dto';
import { CommandRunner } from '../command-runner';
import { AccountOptions } from '../credentials';
import { accountOf, globalsOf, withAccountOptions } from './account-options';

interface ProjectCutoutsCommandOptions extends AccountOptions {
  radius: string;
}

export function registerProjectCutoutsCommand(program: Command, runner: CommandRunner): void {
  withAccountOptions(program.command('project-cutouts'))
    .description('cut each source out of every continuum image of a project that covers it')
    .argument('<username>', 'archive account user name')
    .argument('<project>', 'project code, matched against the observation collection')
    .argument('<sourceFile>', 'file with one "ra dec" pair per line')
    .argument('<destination>', 'directory to write the files to')
    .option('--radius <degrees>', 'cutout radius', '0.1')
    .action(
      async (
        username: string,
        project: string,
        sourceFile: string,
        destination: string,
        options: ProjectCutoutsCommandOptions,
        command: Command,
      ) => {
        const dto = validateOptions(ProjectCutoutsOptionsSchema, {
          project,
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
          (app, context) => app.get(ProjectCutoutsWorkflow).execute(context, dto),
        );
      },
    );
}
