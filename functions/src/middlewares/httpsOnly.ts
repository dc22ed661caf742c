import { Request, Response, NextFunction } from 'express';

/**
 * Reject plain-HTTP requests in production. Behind the Functions front end
 * the original scheme arrives in x-forwarded-proto.
 */
export function requireHttps(req: Request, res: Response, next: NextFunction) {
  if (process.env.NODE_ENV !== 'production') {
    next();
    return;
  }

  const forwardedProto = req.headers['x-forwarded-proto'];
  const proto = Array.isArray(forwardedProto) ? forwardedProto[0] : forwardedProto?.split(',')[0];

  if (req.secure || proto?.trim() === 'https') {
    next();
    return;
  }

  res.status(403).json({
    code: 'https_required',
    message: 'HTTPS is required',
  });
}
