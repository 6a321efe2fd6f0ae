import winston from 'winston';
import path from 'path';

// File transports are opt-in; the engine is embedded in other processes
const logDir = process.env.LOG_DIR;

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

function formatMeta(meta: Record<string, unknown>): string {
  const entries = Object.entries(meta).filter(
    ([key]) => key !== 'timestamp' && key !== 'level' && key !== 'message',
  );
  if (entries.length === 0) return '';
  return ` ${JSON.stringify(Object.fromEntries(entries), (_key, value: unknown) =>
    value instanceof Error ? { message: value.message, stack: value.stack } : value,
  )}`;
}

const line = winston.format.printf(
  ({ timestamp, level, message, ...meta }) =>
    `${String(timestamp)} ${level}: ${String(message)}${formatMeta(meta)}`,
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize({ all: true }), line),
  }),
];

if (logDir) {
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'errors.log'),
      level: 'error',
      format: line,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      format: line,
    }),
  );
}

const logger = winston.createLogger({
  level:
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  levels,
  format: winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  transports,
  silent: process.env.NODE_ENV === 'test',
});

export default logger;
