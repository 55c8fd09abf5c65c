import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '../lib/requestContext';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  errorCode?: string;
  sku?: string;
  userAgent?: string;
  ip?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);
  // Handlers fill the SKU in on this same store object.
  const context = getRequestContext();

  res.on('finish', () => {
    const errorCode: unknown = res.locals.errorCode;
    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl.split('?')[0] ?? req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
      bytesIn,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      errorCode: typeof errorCode === 'string' ? errorCode : undefined,
      sku: context?.sku ?? undefined,
      userAgent: req.header('user-agent') ?? undefined,
      ip: req.ip,
      timestamp: new Date().toISOString()
    };

    console.log(JSON.stringify(entry));
  });

  next();
}
