/**
 * Logger Module
 *
 * Pino-based structured logging, written to stderr so stdout stays free for
 * command output. Components take a logger through their options; the
 * defaults below are children of a root logger configured from the env.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv !== 'production' && nodeEnv !== 'test';

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: string;
  /** Pretty-print to the terminal (default: outside production and tests) */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? (nodeEnv === 'test' ? 'silent' : 'info');
  const pretty = options.pretty ?? isDev;

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss',
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

// Library default; the CLI builds its own pretty logger from flags
export const logger = createLogger({ pretty: false });

export const orchestratorLogger = logger.child({ module: 'orchestrator' });
export const gitLogger = logger.child({ module: 'git' });
export const summaryLogger = logger.child({ module: 'summary' });
