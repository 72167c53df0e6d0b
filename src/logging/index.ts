/**
 * Logger construction
 *
 * The library never creates a logger on its own. Hosts that want to see
 * rejected references build one here (or pass their own pino instance) and
 * hand it to the factory.
 */

import pino, { DestinationStream, Level, Logger } from 'pino';

export type { Logger } from 'pino';

export interface ILoggerOptions {
  /**
   * @default 'silent'
   */
  level?: Level | 'silent';

  /**
   * @default 'pushdown-sql'
   */
  name?: string;

  /**
   * Where log lines are written; stdout when omitted
   */
  destination?: DestinationStream;
}

export function createLogger(options: ILoggerOptions = {}): Logger {
  const config = {
    name: options.name ?? 'pushdown-sql',
    level: options.level ?? 'silent',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      }
    }
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
