import { Inject, Injectable, LoggerService, Optional, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';
import { AppConfig } from '../../config/configuration';

/** Where log lines go when not stdout; tests bind a collecting stream. */
export const LOG_DESTINATION = Symbol('LogDestination');

export type LogFields = Record<string, unknown>;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Pino-backed logger. Two call shapes reach it:
 * - Nest `Logger` instances, once installed with `app.useLogger`, pass
 *   `(message, context)` (and `(message, stack, context)` for errors)
 * - adapters holding it directly pass `(fields, message)`
 *
 * Transient so that every consumer owns its context; `setContext` on one
 * adapter must not relabel another adapter's lines.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    @Optional() @Inject(LOG_DESTINATION) destination?: DestinationStream,
  ) {
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });
    const options: LoggerOptions = {
      level: this.configService.get('logLevel', { infer: true }) || 'info',
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'vo-extract',
        env: nodeEnv,
      },
    };

    this.logger = destination
      ? pino(options, destination)
      : pino({
          ...options,
          ...(nodeEnv === 'development' && {
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname,service,env',
              },
            },
          }),
        });
  }

  setContext(context: string): void {
    this.context = context;
  }

  /**
   * Copy of this logger whose lines all carry the run id. Context is shared
   * until the copy sets its own.
   */
  withRunId(runId: string): PinoLoggerService {
    const scoped: PinoLoggerService = Object.create(this);
    scoped.logger = this.logger.child({ runId });
    return scoped;
  }

  log(message: string, context?: string): void {
    this.write('info', {}, message, context);
  }

  info(fields: LogFields, message: string): void {
    this.write('info', fields, message);
  }

  warn(fields: LogFields, message: string): void;
  warn(message: string, context?: string): void;
  warn(first: LogFields | string, second?: string): void {
    this.dispatch('warn', first, second);
  }

  debug(fields: LogFields, message: string): void;
  debug(message: string, context?: string): void;
  debug(first: LogFields | string, second?: string): void {
    this.dispatch('debug', first, second);
  }

  error(fields: LogFields, message: string): void;
  error(message: string, stack?: string, context?: string): void;
  error(first: LogFields | string, second?: string, context?: string): void {
    if (typeof first === 'string') {
      this.write('error', second ? { stack: second } : {}, first, context);
    } else {
      this.write('error', first, second ?? '');
    }
  }

  private dispatch(level: LogLevel, first: LogFields | string, second?: string): void {
    if (typeof first === 'string') {
      this.write(level, {}, first, second);
    } else {
      this.write(level, first, second ?? '');
    }
  }

  private write(level: LogLevel, fields: LogFields, message: string, context?: string): void {
    this.logger[level]({ ...fields, context: context ?? this.context }, message);
  }
}
