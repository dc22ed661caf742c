import { Request, Response, NextFunction } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { setUser } from '../utils/sentry';

export interface AuthRequest extends Request {
  user?: admin.auth.DecodedIdToken;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Verify the Firebase ID token in the Authorization header and attach the
 * decoded token to the request.
 */
export async function requireAuth(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  const authHeader = req.headers.authorization;
  const idToken = authHeader?.startsWith(BEARER_PREFIX)
    ? authHeader.slice(BEARER_PREFIX.length).trim()
    : '';

  if (!idToken) {
    res.status(401).json({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    return;
  }

  try {
    const decodedToken = await admin.auth().verifyIdToken(idToken);
    req.user = decodedToken;
    setUser(decodedToken.uid);
  } catch (error) {
    functions.logger.warn('[auth] Token verification failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(401).json({
      code: 'unauthorized',
      message: 'Invalid or expired token',
    });
    return;
  }

  next();
}
