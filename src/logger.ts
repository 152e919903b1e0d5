import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.log.level,
  base: { symbol: config.okx.symbol },
  redact: {
    paths: ['apiKey', 'secret', 'password', 'botToken', '*.apiKey', '*.secret', '*.password', '*.botToken'],
    censor: '[redacted]',
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
