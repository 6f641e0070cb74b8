// Correlation ID for request tracing
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}
