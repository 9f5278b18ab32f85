import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types.js';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

export function resolveRequestId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : uuidv4();
}

export function loggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.headers['x-request-id']);
  const startTime = Date.now();

  req.metadata = { request_id: requestId };
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    console.log(`[Request] ${requestId} ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms`);
  });

  next();
}
