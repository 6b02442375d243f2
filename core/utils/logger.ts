import winston from 'winston';
import { loggingConfig } from '@core/config/logging';
import type { LoggerServiceName } from '@core/config/logging';

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

/**
 * Resolves the level for a logger. Explicit LOG_LEVEL wins, then the test
 * level, then debug mode, then the configured fallback.
 */
export function resolveLogLevel(fallback: string = loggingConfig.defaultLevel): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.TRIALKIT_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function createTransports(level: string): LogTransport[] {
  const transports: LogTransport[] = [];

  // Only use console transport outside of tests
  if (process.env.NODE_ENV !== 'test' || process.env.TEST_LOG_LEVEL) {
    transports.push(new winston.transports.Console({ format: consoleFormat, level }));
  }

  const logFile = process.env.TRIALKIT_LOG_FILE;
  if (logFile) {
    transports.push(new winston.transports.File({
      filename: logFile,
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    }));
  }

  return transports;
}

/**
 * Factory for per-service winston loggers
 */
export class LoggerFactory {
  private readonly loggers = new Map<LoggerServiceName, winston.Logger>();

  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = resolveLogLevel(loggingConfig.services[serviceName].level);
    const transports = createTransports(level);
    const serviceLogger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      // winston warns on every write to a logger without transports
      silent: transports.length === 0,
      transports
    });

    this.loggers.set(serviceName, serviceLogger);
    return serviceLogger;
  }

  /**
   * Applies one level to every service logger, e.g. from the CLI's
   * --verbose flag or the config file.
   */
  setLevel(level: string): void {
    logger.level = level;
    for (const serviceLogger of this.loggers.values()) {
      serviceLogger.level = level;
      serviceLogger.transports.forEach(transport => {
        transport.level = level;
      });
    }
  }
}

export const loggerFactory = new LoggerFactory();

const rootTransports = createTransports(resolveLogLevel());

export const logger = winston.createLogger({
  level: resolveLogLevel(),
  levels: loggingConfig.levels,
  silent: rootTransports.length === 0,
  transports: rootTransports
});

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const expressionLogger = createServiceLogger('expression');
export const namespaceLogger = createServiceLogger('namespace');
export const choiceLogger = createServiceLogger('choice');
export const controllerLogger = createServiceLogger('controller');
export const paradigmLogger = createServiceLogger('paradigm');
export const selectorLogger = createServiceLogger('selector');
export const dataLogger = createServiceLogger('data');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

export default logger;
