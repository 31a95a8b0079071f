import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../logging/logger';

const log = createLogger('Auth');

/** Read-only requests pass without a key. */
const READ_ONLY_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export const validateApiKey = (req: Request, res: Response, next: NextFunction): void => {
  if (READ_ONLY_METHODS.has(req.method)) {
    next();
    return;
  }

  const apiKey = req.headers['x-api-key'];
  const expectedApiKey = process.env.API_KEY;

  if (!expectedApiKey) {
    log.error('API_KEY not configured in environment variables');
    res.status(500).json({ error: 'Server configuration error' });
    return;
  }

  if (!apiKey) {
    res.status(401).json({ error: 'Missing X-API-Key header' });
    return;
  }

  if (apiKey !== expectedApiKey) {
    res.status(403).json({ error: 'Invalid API key' });
    return;
  }

  next();
};
