import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger } from '../log';

const log = createLogger('Auth');

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require an `X-API-Key` header equal to the configured key.
 * The key is resolved on every request so it can be rotated through the environment.
 */
export function createApiKeyGuard(resolveKey: () => string | undefined = () => process.env.API_KEY): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expected = resolveKey();

    if (!expected) {
      log.error('API_KEY is not configured, rejecting request');
      res.status(500).json({ error: 'Server configuration error' });
      return;
    }

    const provided = req.headers['x-api-key'];

    if (typeof provided !== 'string' || provided.length === 0) {
      res.status(401).json({ error: 'Missing X-API-Key header' });
      return;
    }

    if (!keysMatch(provided, expected)) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
