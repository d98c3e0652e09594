import pino, { type Logger } from 'pino';
import { config } from './config';

export const logger: Logger = pino({
  name: 'artrie',
  level: config.logLevel,
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
