import pino from 'pino';

function resolveLevel() {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  name: 'lm-score',
  level: resolveLevel(),
  formatters: {
    level: (label: string) => ({ level: label })
  }
});

export type Logger = typeof logger;

export default logger;
