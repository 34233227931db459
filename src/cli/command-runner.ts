import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { v4 as uuidv4 } from 'uuid';
import { AppModule } from '../app.module';
import { RunSummary } from '../application/ports/input';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  WorkflowContext,
  WorkflowRunnerService,
  exitCodeFor,
} from '../workflows/workflow-runner.service';
import { AccountOptions, resolveCredentials } from './credentials';
import { GlobalOptions, toEnvironmentOverrides } from './global-options';

export interface CommandInvocation {
  username: string;
  destinationDir: string;
  account: AccountOptions;
  global: GlobalOptions;
}

export type WorkflowExecution = (
  app: INestApplicationContext,
  context: WorkflowContext,
) => Promise<RunSummary>;

/**
 * Runs one workflow for a parsed command. Throws when the run aborts.
 */
export interface CommandRunner {
  run(invocation: CommandInvocation, execute: WorkflowExecution): Promise<void>;
}

/**
 * Command Runner backed by a Nest application context, created per invocation
 * with the command line overrides applied to configuration
 */
export class NestCommandRunner implements CommandRunner {
  async run(invocation: CommandInvocation, execute: WorkflowExecution): Promise<void> {
    const credentials = await resolveCredentials(invocation.username, invocation.account);

    const app = await NestFactory.createApplicationContext(
      AppModule.register(toEnvironmentOverrides(invocation.global)),
      { bufferLogs: true, abortOnError: false },
    );

    const runId = uuidv4();
    const logger = (await app.resolve(PinoLoggerService)).withRunId(runId);
    app.useLogger(logger);
    logger.setContext('Cli');
    app.enableShutdownHooks();

    try {
      logger.info({ destinationDir: invocation.destinationDir }, 'Run started');

      const summary = await execute(app, {
        credentials,
        destinationDir: invocation.destinationDir,
      });

      app.get(WorkflowRunnerService).report(summary);
      process.exitCode = exitCodeFor(summary);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, 'Run aborted');
      throw error;
    } finally {
      await app.close();
    }
  }
}
