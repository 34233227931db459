#!/usr/bin/env node
import 'reflect-metadata';
import { buildProgram } from './cli/program';
import { EXIT_ABORTED } from './workflows/workflow-runner.service';

/**
 * Entry point. Each command builds its own application context, runs one
 * workflow and sets the exit code: 0 done (or nothing to do), 2 partial, 1 aborted.
 */
async function bootstrap(): Promise<void> {
  process.on('uncaughtException', (error) => {
    console.error(`vo-extract: uncaught exception: ${error.stack ?? error.message}`);
    process.exit(EXIT_ABORTED);
  });

  process.on('unhandledRejection', (reason) => {
    console.error(`vo-extract: unhandled rejection: ${String(reason)}`);
    process.exit(EXIT_ABORTED);
  });

  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`vo-extract: ${message}`);
    process.exitCode = EXIT_ABORTED;
  }
}

void bootstrap();
