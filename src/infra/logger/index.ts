/**
 * Logger factory using Pino
 * Provides structured logging on stderr so stdout stays free for the wordlist
 */

import { destination, pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR_FD = 2;

const defaultConfig: LoggerConfig = {
  level: 'warn',
  name: 'fback',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        destination: STDERR_FD,
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
    return pino(options);
  }

  return pino(options, destination(STDERR_FD));
};

export { type Logger } from 'pino';
