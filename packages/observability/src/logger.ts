import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'apiKey', 'api_key', 'authorization'];

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Secrets passed through transfer metadata
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `metadata.${key}`),
];

const BEARER_PATTERN = /Bearer\s+[A-Za-z0-9._~+/=-]+/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively scrub Bearer tokens from string fields.
 * Only plain objects and arrays are copied; errors and class instances pass
 * through untouched so the pino serializers still see them.
 */
export function scrubBearerTokens(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(BEARER_PATTERN, 'Bearer [REDACTED]');
  }
  if (Array.isArray(value)) {
    return value.map(scrubBearerTokens);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = scrubBearerTokens(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL, default info)
 * - Automatic redaction of sensitive data
 * - Structured JSON output with ISO 8601 timestamps
 *
 * An explicit destination is mostly useful in tests.
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          args[i] = scrubBearerTokens(args[i]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
