import { pino, type Logger } from 'pino';

export const LOG_LEVEL_ENV = 'QUICKWIT_INGEST_LOG_LEVEL';

export function createLogger(level: string = process.env[LOG_LEVEL_ENV] ?? 'info'): Logger {
  return pino({ name: 'quickwit-ingest', level });
}
