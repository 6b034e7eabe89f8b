import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

const REDACTED_FIELDS = new Set(['password', 'otp', 'token']);

export function redact(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return body;

  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [key, REDACTED_FIELDS.has(key) ? '[redacted]' : value])
  );
}

/**
 * Request logging middleware
 *
 * Logs incoming requests and outgoing responses
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  // Log request
  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    body: redact(req.body),
    ip: req.ip,
  });

  // Capture response
  res.on('finish', () => {
    const duration = Date.now() - startTime;

    logger.info('Outgoing response', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      adminId: req.staff?.adminId,
    });
  });

  next();
};
