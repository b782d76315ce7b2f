import winston from 'winston';
import path from 'path';
import { loggingConfig, type ServiceName } from '@core/config/logging';

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const isDebugMode = (): boolean => process.env.FRAGMERGE_DEBUG === 'true';
const isTestRun = (): boolean => process.env.NODE_ENV === 'test';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output outside debug mode
    if (!isDebugMode()) {
      return level.includes('error') ? `Error: ${String(message)}` : String(message);
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

/**
 * Resolve the level for a logger. LOG_LEVEL wins, then the test level, then
 * debug mode, then the configured fallback.
 */
export function resolveLogLevel(fallback: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (isTestRun()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (isDebugMode()) {
    return 'debug';
  }

  return fallback;
}

function createTransports(level: string): winston.transport[] {
  const transports: winston.transport[] = [];

  // Console stays quiet under test unless a test level was asked for
  if (!isTestRun() || process.env.TEST_LOG_LEVEL) {
    transports.push(new winston.transports.Console({
      format: consoleFormat,
      level,
      stderrLevels: Object.keys(loggingConfig.levels)
    }));
  }

  if (process.env.NODE_ENV === 'production') {
    transports.push(
      new winston.transports.File({
        filename: path.join(loggingConfig.files.directory, loggingConfig.files.mainLog),
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      }),
      new winston.transports.File({
        filename: path.join(loggingConfig.files.directory, loggingConfig.files.errorLog),
        level: 'error',
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      })
    );
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory {
  /**
   * Create a logger tagged with the given service name
   */
  createServiceLogger(serviceName: ServiceName): winston.Logger {
    const level = resolveLogLevel(loggingConfig.services[serviceName].level);

    return winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      transports: createTransports(level),
      // A logger without transports would otherwise warn on every write
      silent: isTestRun() && !process.env.TEST_LOG_LEVEL
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: ServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Change the level of every service logger, e.g. for --verbose / --debug.
 */
export function setLogLevel(level: string): void {
  for (const serviceLogger of serviceLoggers) {
    serviceLogger.level = level;
    serviceLogger.transports.forEach(transport => {
      transport.level = level;
    });
  }
}

export const scannerLogger = createServiceLogger('scanner');
export const graphLogger = createServiceLogger('graph');
export const orderLogger = createServiceLogger('order');
export const substitutionLogger = createServiceLogger('substitution');
export const engineLogger = createServiceLogger('engine');
export const loaderLogger = createServiceLogger('loader');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

const serviceLoggers: winston.Logger[] = [
  scannerLogger,
  graphLogger,
  orderLogger,
  substitutionLogger,
  engineLogger,
  loaderLogger,
  configLogger,
  cliLogger
];

export default engineLogger;
