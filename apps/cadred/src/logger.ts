import pino from 'pino';
import { config } from './config.js';
import { getTaskId } from './correlation.js';

export const logger = pino({
  level: config.logLevel,
  mixin() {
    const taskId = getTaskId();
    return taskId ? { taskId } : {};
  },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      }
    : undefined,
});

export function createChildLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}
