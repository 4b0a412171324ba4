/**
 * Request Logger Middleware
 *
 * Tags every request with a request id and logs the request and its
 * response (status and duration) through winston.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = req.get(REQUEST_ID_HEADER) || uuidv4();
  const startTime = Date.now();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  logger.info('API Request', {
    requestId,
    method: req.method,
    path: req.path,
    query: req.query,
    ipAddress: req.ip || req.socket.remoteAddress || 'unknown',
    userAgent: req.get('user-agent') || 'unknown'
  });

  res.on('finish', () => {
    logger.info('API Response', {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime
    });
  });

  next();
};
