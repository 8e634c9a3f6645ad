import rateLimit from 'express-rate-limit';
import type { AppConfig } from '../config';
import { TooManyRequestsError } from '../errors';
import { apiLogger } from '../logger';

export function createApiRateLimiter(config: Pick<AppConfig, 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX'>) {
  const retryAfterSeconds = Math.ceil(config.RATE_LIMIT_WINDOW_MS / 1000);

  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res) => {
      apiLogger.warn({ ip: req.ip, path: req.path, method: req.method }, 'Rate limit exceeded');
      const error = new TooManyRequestsError(
        'You have exceeded the rate limit. Please wait before making more requests.',
        retryAfterSeconds
      );
      res.status(error.status).json(error.toRFC7807(req));
    },
  });
}
