import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
  name: 'rulebench',
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,name',
          destination: 2,
        },
      }
    : undefined,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return logger.child({ module: name });
}
