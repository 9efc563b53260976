/**
 * Logger utility
 * winston logger shared by the pipeline and the API, tagged per component
 */

import 'dotenv/config';
import winston from 'winston';
import path from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack, context }) => {
  const scope = context ? ` [${context}]` : '';
  return `${timestamp} [${level}]${scope}: ${stack || message}`;
});

const level = (process.env.LOG_LEVEL || 'info').toLowerCase();

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), logFormat)
  })
];

if (process.env.LOG_DIR) {
  transports.push(
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'combined.log')
    })
  );
}

export const logger = winston.createLogger({
  level: level === 'silent' ? 'error' : level,
  silent: level === 'silent',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports
});

/**
 * Child logger whose lines carry the component name
 */
export function createLogger(context: string): winston.Logger {
  return logger.child({ context });
}
