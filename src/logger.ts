import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  if (process.env.LOG_PRETTY === '1') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    });
  }

  return pino({ level });
}

// For tests and embedding
export const silentLogger: Logger = pino({ level: 'silent' });
