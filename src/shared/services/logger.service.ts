/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by every module. Human-readable lines in
 * development, one JSON object per line in production, silent under test.
 *
 * SECURITY:
 * - Credentials and hashes are redacted from metadata at any depth
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

// Matched case-insensitively as substrings of metadata keys
const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'authorization'];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lower.includes(field));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove sensitive fields from log data
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map(item => (isPlainRecord(item) ? sanitizeLogData(item) : item));
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

const redact = winston.format(info => {
  for (const key of Object.keys(info)) {
    const value = info[key];
    if (isSensitiveKey(key)) {
      info[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      info[key] = sanitizeLogData(value);
    }
  }
  return info;
});

const readableFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let line = `${timestamp} [${level}]: ${message}`;

    const sanitizedMeta = sanitizeLogData(meta);
    if (Object.keys(sanitizedMeta).length > 0) {
      line += ` ${JSON.stringify(sanitizedMeta)}`;
    }
    if (stack) {
      line += `\n${stack}`;
    }
    return line;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  redact(),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.isTest,
  defaultMeta: config.isProduction ? { service: 'loadboard-api' } : undefined,
  format: config.isProduction ? jsonFormat : readableFormat,
  transports: [new winston.transports.Console()]
});
