/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Process-scoped debug logger.
 *
 * Components log through `debugLogger` with a `Component: message` prefix.
 * The underlying winston logger is created on first use and can be
 * reconfigured or closed explicitly by the host process.
 */

import winston from 'winston';

export type DebugLogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface DebugLoggerOptions {
  /** Minimum level to emit (default: LOG_LEVEL env var, else 'info') */
  level?: DebugLogLevel;
  /** Replace the console transport, mostly for tests */
  transports?: winston.LoggerOptions['transports'];
}

const LEVELS: readonly DebugLogLevel[] = ['error', 'warn', 'info', 'debug'];

function resolveLevel(level: string | undefined): DebugLogLevel {
  return LEVELS.find((l) => l === level) ?? 'info';
}

function createWinstonLogger(options: DebugLoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level ?? resolveLevel(process.env['LOG_LEVEL']),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json(),
    ),
    defaultMeta: { service: 'graph-context' },
    transports: options.transports ?? [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn'],
      }),
    ],
  });
}

class DebugLogger {
  private logger: winston.Logger | null = null;

  configure(options: DebugLoggerOptions = {}): void {
    this.logger?.close();
    this.logger = createWinstonLogger(options);
  }

  close(): void {
    this.logger?.close();
    this.logger = null;
  }

  log(message: string): void {
    this.get().info(message);
  }

  debug(message: string): void {
    this.get().debug(message);
  }

  warn(message: string): void {
    this.get().warn(message);
  }

  error(message: string): void {
    this.get().error(message);
  }

  private get(): winston.Logger {
    if (!this.logger) {
      this.logger = createWinstonLogger({});
    }
    return this.logger;
  }
}

export const debugLogger = new DebugLogger();

export function configureDebugLogger(options?: DebugLoggerOptions): void {
  debugLogger.configure(options);
}

export function closeDebugLogger(): void {
  debugLogger.close();
}
