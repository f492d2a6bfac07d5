import winston from 'winston';
import { env } from './env';

const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  env.LOG_FORMAT === 'json' ? winston.format.json() : winston.format.simple()
);

// Console lines read `<time> [level] (component): message {meta}`
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const tag = typeof component === 'string' ? ` (${component})` : '';
    const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]${tag}: ${String(message)}${rest}`;
  })
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: baseFormat,
  defaultMeta: {
    service: 'agent-dispatch',
    environment: env.NODE_ENV
  },
  transports: [new winston.transports.Console({ format: consoleFormat })]
});

if (env.NODE_ENV === 'production') {
  for (const [filename, level] of [
    ['logs/error.log', 'error'],
    ['logs/combined.log', undefined]
  ] as const) {
    logger.add(new winston.transports.File({ filename, level, maxsize: MAX_LOG_FILE_BYTES, maxFiles: 5 }));
  }
}

/**
 * Child logger tagged with a component name, e.g. `session-registry`.
 */
export const componentLogger = (component: string): winston.Logger =>
  logger.child({ component });

// Morgan writes access lines through the `http` level
export const stream = {
  write: (message: string): void => {
    logger.http(message.trim());
  }
};
