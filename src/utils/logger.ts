import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';

export const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'chainreach' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
          return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''}`;
        })
      ),
    }),
  ],
});

if (process.env.NODE_ENV === 'production') {
  logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error' }));
  logger.add(new winston.transports.File({ filename: 'logs/combined.log' }));
}

export type Logger = winston.Logger;

/**
 * Child logger carrying worker / account / target labels on every line
 */
export function createScopedLogger(scope: {
  workerId?: number;
  account?: string;
  target?: string;
}): Logger {
  const bindings: Record<string, string | number> = {};
  if (scope.workerId !== undefined) bindings.workerId = scope.workerId;
  if (scope.account) bindings.account = scope.account;
  if (scope.target) bindings.target = scope.target;
  return logger.child(bindings);
}
