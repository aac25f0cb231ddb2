import * as winston from 'winston';
import * as path from 'path';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define log colors
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

function stringifyMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.splat()
);

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, stack, ...meta } = info;

  let logMessage = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    logMessage += ` ${stringifyMeta(meta)}`;
  }

  if (typeof stack === 'string') {
    logMessage += `\n${stack}`;
  }

  return logMessage;
});

const consoleLevel =
  process.env.LOG_LEVEL || (process.env.NODE_ENV === 'development' ? 'debug' : 'info');

// File transports only when a log directory is configured
const logDir = process.env.LOG_DIR;

const transports = [
  new winston.transports.Console({
    level: consoleLevel,
    format: winston.format.combine(winston.format.colorize(), lineFormat),
  }),
  ...(logDir
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'lottery.log'),
          level: 'info',
          maxsize: 10485760, // 10MB
          maxFiles: 5,
          tailable: true,
        }),
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 10485760, // 10MB
          maxFiles: 5,
          tailable: true,
        }),
      ]
    : []),
];

export const logger = winston.createLogger({
  levels,
  level: 'debug',
  format: winston.format.combine(baseFormat, lineFormat),
  transports,
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};
