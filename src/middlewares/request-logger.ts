import { Request, Response, NextFunction } from 'express';
import logger from '../config/logger.js';

interface RequestBody {
  [key: string]: unknown;
}

interface LogData {
  method: string;
  url: string;
  path: string;
  statusCode: number;
  duration: string;
  timestamp: string;
  ip: string | undefined;
  sessionId?: string;
  request?: {
    params: Record<string, string>;
    query: unknown;
    body: RequestBody | undefined;
  };
}

const sanitizeRequestBody = (body: RequestBody | undefined): RequestBody | undefined => {
  if (!body || typeof body !== 'object') return undefined;
  const sanitized = { ...body };
  const sensitiveFields = ['password', 'apiKey', 'token', 'authorization'];
  sensitiveFields.forEach((field) => {
    if (sanitized[field]) {
      sanitized[field] = '[REDACTED]';
    }
  });
  return sanitized;
};

/** Negotiation requests name their session in the body or the path. */
const sessionIdOf = (req: Request): string | undefined => {
  if (typeof req.params?.sessionId === 'string') return req.params.sessionId;
  const body: unknown = req.body;
  if (body && typeof body === 'object' && 'sessionId' in body && typeof body.sessionId === 'string') {
    return body.sessionId;
  }
  return undefined;
};

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData: LogData = {
      method: req.method,
      url: req.originalUrl,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      timestamp: new Date().toISOString(),
      ip: req.ip || req.socket.remoteAddress,
      sessionId: sessionIdOf(req),
    };

    // Include request details for errors
    if (res.statusCode >= 400) {
      logData.request = {
        params: req.params,
        query: req.query,
        body: sanitizeRequestBody(req.body),
      };
    }

    const message = `${req.method} ${req.originalUrl} ${res.statusCode} - ${duration}ms`;

    if (res.statusCode >= 500) {
      logger.error(message, logData);
    } else if (res.statusCode >= 400) {
      logger.warn(message, logData);
    } else {
      logger.info(message, logData);
    }
  });

  next();
};
