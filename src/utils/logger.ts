import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Stringify metadata, dropping repeated object references and rendering BigInt
export const safeStringify = (obj: unknown, indent = 2): string => {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (_key, value: unknown) => {
      if (typeof value === 'bigint') {
        return value.toString();
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return undefined;
        seen.add(value);
      }
      return value;
    },
    indent
  );
};

const simplifyError = (error: Error, includeStack: boolean): Record<string, unknown> => ({
  message: error.message,
  name: error.name,
  ...('kind' in error ? { kind: error.kind } : {}),
  ...(includeStack && error.stack ? { stack: error.stack.split('\n').slice(0, 5).join('\n') } : {}),
});

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    if (metadata.error instanceof Error) {
      metadata.error = simplifyError(metadata.error, !stack);
    }
    msg += ` ${safeStringify(metadata)}`;
  }

  if (stack) {
    msg += `\n${stack}`;
  }

  return msg;
});

const consoleFormat = combine(
  colorize({ all: true }),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  logFormat
);

const fileFormat = combine(
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  logFormat
);

const logsDir = path.join(process.cwd(), 'logs');
const writeFiles = process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
  }),
];

if (writeFiles) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(logsDir, 'app-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      format: fileFormat,
    }),
    new DailyRotateFile({
      filename: path.join(logsDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: fileFormat,
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: fileFormat,
  transports,
  ...(writeFiles
    ? {
        exceptionHandlers: [
          new winston.transports.File({
            filename: path.join(logsDir, 'exceptions.log'),
            format: fileFormat,
          }),
        ],
        rejectionHandlers: [
          new winston.transports.File({
            filename: path.join(logsDir, 'rejections.log'),
            format: fileFormat,
          }),
        ],
      }
    : {}),
});

export const createLogger = (module: string) => {
  return logger.child({ module });
};

export const setLogLevel = (level: string): void => {
  logger.level = level;
};

export default logger;
