import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

// LOG_LEVEL wins, tests are quiet unless asked otherwise
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  const known = LOG_LEVELS.find(l => l === level);
  if (known) return known;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

// JSON logs, one line per event
const baseLogger = pino({
  name: 'dns-proxy',
  level: getLogLevel(),
  formatters: {
    level: label => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

// child logger tagged with the component name
export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
