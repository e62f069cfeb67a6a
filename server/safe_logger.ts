/**
 * Safe Logger - credential and upload-data redaction
 *
 * Console logger used by every server module. Messages and metadata pass
 * through redaction so API keys, session tokens, grower contact details and
 * inline image payloads never reach log output.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | LogValue[]
  | { [key: string]: LogValue };

interface RedactionPattern {
  name: string;
  pattern: RegExp;
  replacement: string;
}

const REDACTION_PATTERNS: RedactionPattern[] = [
  {
    name: 'email',
    pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/gi,
    replacement: '[EMAIL_REDACTED]'
  },
  // JWT before bearer so "Bearer eyJ..." collapses to a single marker
  {
    name: 'jwt',
    pattern: /eyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g,
    replacement: '[JWT_REDACTED]'
  },
  {
    name: 'bearer',
    pattern: /Bearer\s+[A-Za-z0-9_-]+/gi,
    replacement: '[BEARER_REDACTED]'
  },
  // OpenAI-style secret keys
  {
    name: 'api_key',
    pattern: /\bsk-[A-Za-z0-9_-]{16,}/g,
    replacement: '[API_KEY_REDACTED]'
  },
  // Inline image uploads
  {
    name: 'base64_data',
    pattern: /data:[a-z]+\/[a-z0-9.+-]+;base64,[A-Za-z0-9+/=]{50,}/g,
    replacement: '[BASE64_DATA_REDACTED]'
  },
  {
    name: 'password_json',
    pattern: /"password"\s*:\s*"[^"]+"/gi,
    replacement: '"password": "[REDACTED]"'
  }
];

const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
  'email',
  'sessionid',
  'session_id'
]);

const MAX_META_LENGTH = 500;
const MAX_DEPTH = 10;

function redactString(input: string): string {
  if (!input) return input;

  let result = input;
  for (const { pattern, replacement } of REDACTION_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function redactObject(value: unknown, depth: number = 0): LogValue {
  if (depth > MAX_DEPTH) return '[MAX_DEPTH_REACHED]';

  if (value === null || value === undefined) return value;
  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();

  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }

  if (value instanceof Date) return value.toISOString();

  if (Buffer.isBuffer(value)) return `[BUFFER ${value.length} bytes]`;

  if (Array.isArray(value)) {
    return value.map(item => redactObject(item, depth + 1));
  }

  if (typeof value === 'object') {
    const redacted: { [key: string]: LogValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
        redacted[key] = '[FIELD_REDACTED]';
      } else {
        redacted[key] = redactObject(entry, depth + 1);
      }
    }
    return redacted;
  }

  return String(value);
}

function formatMessage(level: LogLevel, message: string, meta?: unknown): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const safeMessage = redactString(message);

  if (meta !== undefined) {
    const metaStr = JSON.stringify(redactObject(meta));
    const truncatedMeta = metaStr.length > MAX_META_LENGTH
      ? metaStr.slice(0, MAX_META_LENGTH - 3) + '...'
      : metaStr;
    return `${prefix} ${safeMessage} ${truncatedMeta}`;
  }

  return `${prefix} ${safeMessage}`;
}

export const safeLogger = {
  debug(message: string, meta?: unknown): void {
    if (process.env.NODE_ENV === 'development' || process.env.DEBUG === 'true') {
      console.log(formatMessage('debug', message, meta));
    }
  },

  info(message: string, meta?: unknown): void {
    console.log(formatMessage('info', message, meta));
  },

  warn(message: string, meta?: unknown): void {
    console.warn(formatMessage('warn', message, meta));
  },

  error(message: string, meta?: unknown): void {
    console.error(formatMessage('error', message, meta));
  },

  redact(input: unknown): LogValue {
    return redactObject(input);
  },

  // Logs method, path, status and duration for /api calls; never bodies
  createRequestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const path = req.path;

      res.on('finish', () => {
        if (path.startsWith('/api')) {
          const duration = Date.now() - start;
          safeLogger.info(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
        }
      });

      next();
    };
  }
};

export { redactString, redactObject, formatMessage, REDACTION_PATTERNS, SENSITIVE_FIELDS };

export default safeLogger;
