import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { constantTimeCompare } from '../utils/security';

/**
 * API key authentication for the mutating endpoints.
 * Accepts `Authorization: Bearer <key>` or an `X-API-Key` header.
 */
export function createAuthMiddleware(apiKey: string): RequestHandler {
  if (!apiKey || apiKey.length < 16) {
    throw new Error('API key must be at least 16 characters long for security');
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    const apiKeyHeader = req.headers['x-api-key'];

    let providedKey: string | undefined;
    if (authHeader && authHeader.startsWith('Bearer ')) {
      providedKey = authHeader.substring(7);
    } else if (typeof apiKeyHeader === 'string') {
      providedKey = apiKeyHeader;
    }

    if (!providedKey || !constantTimeCompare(providedKey, apiKey)) {
      logger.warn('Unauthorized API access attempt', {
        ip: req.ip,
        path: req.path,
        method: req.method,
        hasAuthHeader: !!authHeader,
        hasApiKeyHeader: !!apiKeyHeader,
        requestId: req.requestId
      });

      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid or missing API key. Use Authorization: Bearer <key> or X-API-Key header.'
      });
      return;
    }

    next();
  };
}

export const allowAll: RequestHandler = (_req, _res, next) => next();
