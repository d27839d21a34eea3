import pino, { type Logger, type LoggerOptions } from 'pino';
import { config } from '../config/env';
import { getRequestContext } from './requestContext';

export type { Logger };

export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  redact: ['req.headers.authorization', 'req.headers.cookie'],
  // Every line written while a submission is in flight carries who sent it.
  mixin() {
    const ctx = getRequestContext();
    return ctx ? { submissionId: ctx.submissionId, userId: ctx.userId, chatId: ctx.chatId } : {};
  },
};

export const logger: Logger = pino(loggerOptions);
