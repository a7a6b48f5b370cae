import winston from 'winston';
import type { AppConfig } from './config.js';

/**
 * Structured logger with secret redaction
 * Logs to console in development, file + console in production
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /secret[=:]\s*["']?([^"'\s]+)/gi,
  /signature=([^&\s"']+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

const SECRET_KEYS = ['password', 'secret', 'signingSecret', 'token', 'signature', 'accessHandle'];

/**
 * Redacts sensitive information from log messages and metadata
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: redactSecrets(obj.message) };
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level') {
      info[key] = redactSecrets(info[key]);
    }
  }
  return info;
})();

export function createLogger(config: Pick<AppConfig, 'nodeEnv' | 'logging'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (config.nodeEnv === 'production' && config.logging.file) {
    transports.push(
      new winston.transports.File({
        filename: config.logging.file,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: config.logging.level,
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Process-wide logger; silent until the entry point installs the real one
 */
export let logger: winston.Logger = winston.createLogger({
  silent: true,
  transports: [new winston.transports.Console()],
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
