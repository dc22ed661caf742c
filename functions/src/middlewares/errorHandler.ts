import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';

type HttpError = Error & { status?: number; statusCode?: number; type?: string };

/**
 * Body-parser failures carry their HTTP status and a type tag.
 */
const clientErrorFor = (err: HttpError): { status: number; code: string; message: string } | null => {
  if (err.type === 'entity.too.large') {
    return { status: 413, code: 'payload_too_large', message: 'Request body is too large' };
  }
  if (err.type === 'entity.parse.failed') {
    return { status: 400, code: 'invalid_json', message: 'Request body is not valid JSON' };
  }
  return null;
};

export function errorHandler(err: HttpError, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    next(err);
    return;
  }

  const clientError = clientErrorFor(err);
  if (clientError) {
    functions.logger.warn(`[errorHandler] ${req.method} ${req.path}: ${clientError.code}`);
    res.status(clientError.status).json({ code: clientError.code, message: clientError.message });
    return;
  }

  functions.logger.error('[errorHandler] Unhandled error:', err);

  if (process.env.NODE_ENV === 'production') {
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
