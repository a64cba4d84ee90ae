import pino, { type Logger, type LoggerOptions } from 'pino';
import { errorCode } from './net/outcome';

export type { Logger };

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  return { type: err.name, message: err.message, code: errorCode(err), stack: err.stack };
}

export function createLogger(name = 'subdomain-radar'): Logger {
  const options: LoggerOptions = {
    name,
    level: resolveLevel(),
    serializers: { err: serializeError },
  };
  if (process.env.LOG_FORMAT === 'pretty') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
    };
  }
  return pino(options);
}

const logger = createLogger();

/** Child logger bound to a module name. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
