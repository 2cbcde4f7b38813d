import pino from 'pino';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

function resolveLevel(value: string | undefined): string {
  const level = value?.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
}

export const logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'SYS:standard',
    },
  },
  base: {
    service: 'txwatch',
  },
});
