/**
 * Security utilities for protecting sensitive data.
 * Form answers carry personal data (names, e-mail addresses), so anything
 * that reaches the logs goes through these helpers first.
 */

import { logger } from '../core/logger';

const SENSITIVE_PATTERNS = {
  // API keys and bearer tokens in "key=value" form
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key|authorization)\s*[:=]\s*['"]?(?:bearer\s+)?([a-zA-Z0-9_\-]{16,})['"]?/gi,
  // MongoDB ObjectIds (24 hex characters), used as session ids
  objectId: /\b[0-9a-fA-F]{24}\b/g,
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  mongoUri: /mongodb(?:\+srv)?:\/\/[^\s"'<>]+/gi,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

// Keys whose values are always masked in logs
const SENSITIVE_FIELDS = ['apikey', 'api_key', 'token', 'secret', 'password', 'authorization', 'mongouri'];

const MAX_INPUT_LENGTH = 2000;

/**
 * Mask sensitive data in strings
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) {
    return text;
  }

  return text
    .replace(SENSITIVE_PATTERNS.apiKey, (match, key: string) => match.replace(key, maskChar.repeat(key.length)))
    .replace(SENSITIVE_PATTERNS.mongoUri, match => {
      const [protocol] = match.split('://');
      return `${protocol}://${maskChar.repeat(20)}`;
    })
    .replace(SENSITIVE_PATTERNS.email, match => {
      const [local, domain] = match.split('@');
      return `${maskChar.repeat(Math.min(local.length, 3))}***@${domain}`;
    })
    .replace(SENSITIVE_PATTERNS.objectId, match => `${match.slice(0, 4)}${maskChar.repeat(20)}`)
    .replace(SENSITIVE_PATTERNS.phone, match => maskChar.repeat(match.length));
}

/**
 * Recursively masks sensitive keys and patterns in a value destined for the logs.
 */
export function sanitizeForLog(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSensitiveData(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => sanitizeForLog(item));
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    sanitized[key] = SENSITIVE_FIELDS.some(field => lowerKey.includes(field)) ? '***MASKED***' : sanitizeForLog(entry);
  }
  return sanitized;
}

/**
 * Strips control characters and bounds the length of free-text user input.
 */
export function sanitizeInput(input: string): string {
  let sanitized = input
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/[\r\n\t]+/g, ' ')
    .trim();

  if (sanitized.length > MAX_INPUT_LENGTH) {
    secureLog('Input truncated due to length', { originalLength: input.length, maxLength: MAX_INPUT_LENGTH }, 'warn');
    sanitized = sanitized.substring(0, MAX_INPUT_LENGTH);
  }

  return sanitized;
}

/**
 * Secure logging - masks sensitive data before logging
 */
export function secureLog(
  message: string,
  meta: Record<string, unknown> = {},
  level: 'info' | 'warn' | 'error' | 'debug' = 'info'
): void {
  const sanitized = sanitizeForLog(meta);
  logger.log(level, maskSensitiveData(message), typeof sanitized === 'object' && sanitized !== null ? sanitized : {});
}

/**
 * Session ids are 24-character hex ObjectIds or other opaque ids of 16+ safe characters.
 */
export function isValidSessionId(sessionId: unknown): sessionId is string {
  return typeof sessionId === 'string' && /^[a-zA-Z0-9_\-]{16,64}$/.test(sessionId);
}
