/**
 * winmaint security helpers
 *
 * Provides:
 * - Log sanitization
 * - Error message sanitization for persisted outcomes
 * - Atomic file writes
 * - Schema-validated JSON file reads
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

// ===========================================
// LOG SANITIZATION
// ===========================================

const SENSITIVE_PATTERNS = [
  // API keys and tokens
  { pattern: /Bearer\s+[A-Za-z0-9\-_]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["']?\s*[:=]\s*["']?[A-Za-z0-9\-_]+/gi, replacement: 'apiKey: [REDACTED]' },

  // Passwords and secrets
  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },
  { pattern: /secret["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'secret: [REDACTED]' },

  // Email addresses
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },

  // Windows paths with usernames
  { pattern: /C:\\Users\\[^\\]+/gi, replacement: 'C:\\Users\\[USER]' },
];

const SENSITIVE_KEYS = ['apikey', 'api_key', 'password', 'secret', 'token', 'authorization'];

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (data instanceof Set) {
    return [...data].map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}

// ===========================================
// ERROR SANITIZATION
// ===========================================

const MAX_ERROR_LENGTH = 300;

/**
 * Redacts sensitive fragments and truncates tool output before it is stored
 * in an outcome, audit artifact or run history row.
 */
export function sanitizeErrorMessage(error: string | undefined, context: string): string {
  if (!error || !error.trim()) {
    return `${context} failed`;
  }

  const sanitized = String(sanitizeLogData(error.trim())).replace(/\s+/g, ' ');

  if (sanitized.length > MAX_ERROR_LENGTH) {
    return `${sanitized.substring(0, MAX_ERROR_LENGTH)}... (truncated)`;
  }
  return sanitized;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ===========================================
// SECURE FILE OPERATIONS
// ===========================================

/**
 * Atomic file write - writes to temp file first, then renames
 */
export function atomicWriteFileSync(filePath: string, data: string, mode: number = 0o600): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(8).toString('hex')}`);

  try {
    fs.writeFileSync(tempPath, data, { encoding: 'utf8', mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

/**
 * Safe JSON parse with schema validation
 */
export function safeParseJSON<T>(
  jsonString: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ValidationResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (error) {
    return { success: false, error: `Invalid JSON: ${errorMessage(error)}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${where}${issue ? issue.message : 'Invalid data'}` };
  }
  return { success: true, data: result.data };
}

/**
 * Safe file read with JSON validation
 */
export function safeReadJSONFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ValidationResult<T> {
  try {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File not found' };
    }

    const stats = fs.lstatSync(filePath);
    if (stats.isSymbolicLink()) {
      return { success: false, error: 'Symlinks not allowed' };
    }

    const content = fs.readFileSync(filePath, 'utf8');
    return safeParseJSON(content, schema);
  } catch (error) {
    return { success: false, error: `File read error: ${errorMessage(error)}` };
  }
}
