import { Command, Option } from 'commander';
import { ARCHIVE_ENVIRONMENTS, LOG_LEVELS } from '../config/validation.schema';
import { CommandRunner, NestCommandRunner } from './command-runner';
import {
  registerCutoutsCommand,
  registerImagesCommand,
  registerProjectCutoutsCommand,
  registerSliceCommand,
  registerSourcesCommand,
  registerSpectraCommand,
} from './commands';

export function buildProgram(runner: CommandRunner = new NestCommandRunner()): Command {
  const program = new Command('vo-extract')
    .description('Query the archive and retrieve cutouts, cube slices, spectra and images')
    .version('0.1.0')
    .addOption(
      new Option('--archive <environment>', 'archive deployment to use').choices(ARCHIVE_ENVIRONMENTS),
    )
    .option('--poll-interval <seconds>', 'wait between job status checks')
    .option('--deadline <minutes>', 'give up waiting for a job after this long')
    .addOption(new Option('--log-level <level>', 'log verbosity').choices(LOG_LEVELS))
    .showHelpAfterError();

  registerImagesCommand(program, runner);
  registerCutoutsCommand(program, runner);
  registerSliceCommand(program, runner);
  registerSourcesCommand(program, runner);
  registerSpectraCommand(program, runner);
  registerProjectCutoutsCommand(program, runner);

  return program;
}
