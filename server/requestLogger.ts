import { randomUUID } from 'node:crypto';
import type { RequestHandler } from 'express';
import type { Logger } from './logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** One log line per request, written when the response finishes or the client goes away. */
export const requestLogger =
  (logger: Logger): RequestHandler =>
  (req, res, next) => {
    const requestId = randomUUID();
    const startedAt = Date.now();
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on('close', () => {
      const fields = {
        requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt
      };
      if (!res.writableFinished) {
        logger.warn('Request aborted by client', fields);
      } else if (res.statusCode >= 500) {
        logger.error('Request failed', fields);
      } else {
        logger.info('Request completed', fields);
      }
    });

    next();
  };
