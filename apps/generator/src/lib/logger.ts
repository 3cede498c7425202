import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'clinical-synth',
    level,
    base: { pid: process.pid },
  });
}

/** Logger that discards everything; the default for services under test. */
export const silentLogger: Logger = pino({ level: 'silent' });
