import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'NOT_FOUND', req.correlationId));
}

function isBodyParseError(err: unknown): err is Error & { status: number; type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed' && 'status' in err;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json(createErrorResponse('Request body is not valid JSON', undefined, 'INVALID_JSON', req.correlationId));
    return;
  }
  logger.error('http:unhandled_error', {
    correlationId: req.correlationId,
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'INTERNAL_ERROR', req.correlationId));
}
