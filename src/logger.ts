import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
