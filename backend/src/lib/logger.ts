/**
 * Structured Logger
 * One pino root for the service, child loggers per module
 */

import pino from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // Keep test output readable unless a level is asked for explicitly
  return process.env.VITEST ? 'silent' : 'info';
}

export const logger = pino({
  level: defaultLevel(),
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: ['slackBotToken', 'anthropicApiKey', '*.slackBotToken', '*.anthropicApiKey', 'headers.authorization'],
    censor: '[redacted]',
  },
  base: {
    service: 'sme-hunt',
    version: process.env.npm_package_version || '0.1.0',
  },
});

/**
 * Child logger tagged with the module name, plus any fixed bindings
 * (e.g. the ticket a hunt task works on)
 */
export function createLogger(module: string, bindings: Record<string, unknown> = {}): pino.Logger {
  return logger.child({ module, ...bindings });
}

export default logger;
