import pino from 'pino';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.VITEST !== undefined;

/**
 * Pino logger shared by every manager and route.
 * Components derive a child logger so entries can be filtered per subsystem.
 */
const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info'),
  transport: isDevelopment && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'pushgate',
  },
});

export const executorLogger = logger.child({ component: 'executor' });
export const supervisorLogger = logger.child({ component: 'supervisor' });
export const triggerLogger = logger.child({ component: 'trigger' });
export const proxyLogger = logger.child({ component: 'proxy' });
export const socketLogger = logger.child({ component: 'socket' });

export default logger;
