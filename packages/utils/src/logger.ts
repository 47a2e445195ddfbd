import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  service?: string;
  requestId?: string;
  messageId?: string;
  attachmentId?: string;
  attachmentRecordId?: string;
  invoiceId?: string;
}

export interface LoggerSettings {
  level: string;
  serviceName: string;
  version: string;
  pretty: boolean;
}

export type Logger = PinoLogger;

/** Options shared by the root logger and the HTTP server's request logger. */
export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  const options: LoggerOptions = {
    level: settings.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: settings.serviceName,
      version: settings.version,
    },
  };

  if (settings.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

const baseLogger = pino(
  buildLoggerOptions({
    level: process.env['LOG_LEVEL'] ?? 'info',
    serviceName: process.env['SERVICE_NAME'] ?? 'invoice-intake',
    version: process.env['APP_VERSION'] ?? '1.0.0',
    pretty: process.env['NODE_ENV'] === 'development',
  })
);

export const logger: Logger = baseLogger;

export function createLogger(context: LogContext): Logger {
  return baseLogger.child(context);
}

export async function withTiming<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = performance.now();
  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);
    log.info({ operation, durationMs }, `${operation} completed`);
    return result;
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);
    log.error({ operation, durationMs, error }, `${operation} failed`);
    throw error;
  }
}
