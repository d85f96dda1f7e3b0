/**
 * Log sanitization utilities
 *
 * Serializers that keep Matrix user IDs and access tokens out of the logs
 * while leaving enough to correlate entries.
 */

import { createHash } from 'node:crypto';

/**
 * Hash an identifier for logging purposes
 *
 * Preserves the first 4 characters for human identification and hashes the
 * rest. Format: "@ali...a1b2c3d4"
 */
export function hashId(id: string | null | undefined): string | null {
  if (!id || typeof id !== 'string') {
    return null;
  }

  const prefix = id.slice(0, 4);
  const hash = createHash('sha256').update(id).digest('hex').slice(0, 8);
  return `${prefix}...${hash}`;
}

export function redact(): string {
  return '[REDACTED]';
}

export function truncate(value: string | null | undefined, maxLength: number = 100): string | null {
  if (!value || typeof value !== 'string') {
    return null;
  }

  if (value.length <= maxLength) {
    return value;
  }

  return `${value.slice(0, maxLength)}...[truncated]`;
}

/**
 * Pino serializers for log sanitization
 *
 * ```typescript
 * const logger = pino({
 *   serializers: { ...pino.stdSerializers, ...logSerializers },
 * });
 * ```
 */
export const logSerializers = {
  // Hash Matrix user identifiers
  userId: (id: string | null | undefined): string | null => hashId(id),
  sender: (id: string | null | undefined): string | null => hashId(id),

  // Redact tokens and secrets
  token: (): string => redact(),
  accessToken: (): string => redact(),
  authorization: (): string => redact(),

  // Sanitize error objects
  error: (err: unknown): Record<string, unknown> | null => sanitizeError(err),
  err: (err: unknown): Record<string, unknown> | null => sanitizeError(err),

  // Message bodies are user content
  body: (b: string | null | undefined): string | null => truncate(b, 50),
};

/**
 * Sanitize an error for safe logging
 *
 * Extracts only safe properties so stack traces and tokens embedded in
 * messages stay out of the logs.
 */
export function sanitizeError(error: unknown): Record<string, unknown> | null {
  if (!error) {
    return null;
  }

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      name: error.name,
      message: sanitizeErrorMessage(error.message),
    };

    if ('code' in error && typeof error.code === 'string') {
      sanitized['code'] = error.code;
    }

    if ('status' in error && typeof error.status === 'number') {
      sanitized['status'] = error.status;
    }

    if ('errcode' in error && typeof error.errcode === 'string') {
      sanitized['errcode'] = error.errcode;
    }

    // Include stack trace only in development
    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      sanitized['stack'] = sanitizeStackTrace(error.stack);
    }

    return sanitized;
  }

  if (typeof error === 'string') {
    return {
      message: sanitizeErrorMessage(error),
    };
  }

  return { type: typeof error };
}

function sanitizeErrorMessage(message: string): string {
  if (!message) {
    return 'Unknown error';
  }

  const sensitivePatterns = [
    // File paths
    /\/home\/[^\s]+/g,
    /\/Users\/[^\s]+/g,
    // Access tokens
    /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
    /access_token=[^\s&]+/gi,
    /syt_[A-Za-z0-9_]+/g,
  ];

  let sanitized = message;
  for (const pattern of sensitivePatterns) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return truncate(sanitized, 500) ?? 'Unknown error';
}

function sanitizeStackTrace(stack: string): string {
  const sanitized = stack
    .replace(/\/home\/[^/]+\//g, '/~/')
    .replace(/\/Users\/[^/]+\//g, '/~/');

  return sanitized.split('\n').slice(0, 10).join('\n');
}
