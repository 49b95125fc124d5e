/**
 * @fileoverview Pino-backed singleton logger. Implements RFC5424 level
 * mapping and structured request context. Diagnostic output goes to stderr
 * so it never interleaves with the git output on stdout; `LOGS_DIR` adds
 * `combined.log` and `error.log` files.
 * @module src/utils/internal/logger
 */
import { mkdirSync } from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import type { Level, Logger as PinoLogger } from 'pino';
import pino from 'pino';

import type { AppConfig } from '../../config/index.js';
import {
  requestContextService,
  type RequestContext,
} from './requestContext.js';

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit'
  | 'alert'
  | 'emerg';

const toPinoLevel: Record<LogLevel, Level> = {
  emerg: 'fatal',
  alert: 'fatal',
  crit: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'info',
  info: 'info',
  debug: 'debug',
};

/** Options the logger needs from the application config. */
export type LoggerOptions = Pick<
  AppConfig,
  'logLevel' | 'logsPath' | 'environment'
> & { version?: string };

export class Logger {
  private static readonly instance: Logger = new Logger();
  private pinoLogger?: PinoLogger;
  private initialized = false;

  private constructor() {}

  public static getInstance(): Logger {
    return Logger.instance;
  }

  private createPinoLogger(options: LoggerOptions): PinoLogger {
    const pinoOptions: pino.LoggerOptions = {
      level: options.logLevel,
      base: {
        env: options.environment,
        version: options.version,
        pid: process.pid,
      },
    };

    const transports: pino.TransportTargetOptions[] = [];

    if (options.environment === 'development') {
      try {
        const require = createRequire(import.meta.url);
        transports.push({
          target: require.resolve('pino-pretty'),
          options: {
            colorize: true,
            destination: 2,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
          },
        });
      } catch (err) {
        console.warn(
          `[Logger Init] Pretty transport unavailable (${err instanceof Error ? err.message : String(err)}); falling back to stderr JSON.`,
        );
        transports.push({ target: 'pino/file', options: { destination: 2 } });
      }
    } else if (options.environment !== 'testing') {
      transports.push({ target: 'pino/file', options: { destination: 2 } });
    }

    if (options.logsPath) {
      try {
        mkdirSync(options.logsPath, { recursive: true });
        transports.push({
          level: options.logLevel,
          target: 'pino/file',
          options: {
            destination: path.join(options.logsPath, 'combined.log'),
            mkdir: true,
          },
        });
        transports.push({
          level: 'error',
          target: 'pino/file',
          options: {
            destination: path.join(options.logsPath, 'error.log'),
            mkdir: true,
          },
        });
      } catch (err) {
        console.error(
          `[Logger Init] Failed to configure file logging: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    if (transports.length === 0) {
      return pino({ ...pinoOptions, enabled: false });
    }

    return pino({ ...pinoOptions, transport: { targets: transports } });
  }

  public initialize(options: LoggerOptions): void {
    if (this.initialized) {
      this.warning(
        'Logger already initialized.',
        requestContextService.createRequestContext({
          operation: 'loggerReinit',
        }),
      );
      return;
    }
    this.pinoLogger = this.createPinoLogger(options);
    this.initialized = true;
    this.debug(
      `Logger initialized. Level: ${options.logLevel}.`,
      requestContextService.createRequestContext({ operation: 'loggerInit' }),
    );
  }

  public async close(): Promise<void> {
    if (!this.initialized) return;
    const pinoLogger = this.pinoLogger;

    await new Promise<void>((resolve) => {
      if (!pinoLogger) {
        resolve();
        return;
      }
      pinoLogger.flush((err) => {
        if (err) console.error('Error flushing logger:', err);
        resolve();
      });
    });

    this.pinoLogger = undefined;
    this.initialized = false;
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  private log(
    level: LogLevel,
    msg: string,
    context?: RequestContext,
    error?: Error,
  ): void {
    if (!this.pinoLogger || !this.initialized) return;

    const logObject: Record<string, unknown> = { ...context };
    if (error) logObject.err = pino.stdSerializers.err(error);

    this.pinoLogger[toPinoLevel[level]](logObject, msg);
  }

  public debug(msg: string, context?: RequestContext): void {
    this.log('debug', msg, context);
  }
  public info(msg: string, context?: RequestContext): void {
    this.log('info', msg, context);
  }
  public notice(msg: string, context?: RequestContext): void {
    this.log('notice', msg, context);
  }
  public warning(msg: string, context?: RequestContext): void {
    this.log('warning', msg, context);
  }

  public error(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('error', msg, actualContext, errorObj);
  }

  public fatal(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('emerg', msg, actualContext, errorObj);
  }
}

export const logger = Logger.getInstance();
