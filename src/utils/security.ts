import crypto from 'crypto';
import { ZodError } from 'zod';

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

export interface SanitizedError {
  message: string;
  details?: { path: string; message: string }[];
}

/**
 * Sanitize error messages for client responses.
 * Full details stay in the server logs.
 */
export function sanitizeError(error: unknown, isProduction: boolean = false): SanitizedError {
  if (error instanceof ZodError) {
    return {
      message: 'Invalid request body',
      details: error.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    };
  }

  if (isProduction) {
    return { message: 'An error occurred. Please try again later.' };
  }

  return { message: error instanceof Error && error.message ? error.message : 'An error occurred' };
}
