/**
 * Firebase Authentication Middleware
 * Verifies Firebase ID tokens for protected routes
 */

import type { Request, Response, NextFunction } from 'express';
import { getFirebaseAuth, getUserRole, isFirebaseAvailable } from '../config/firebase';
import { ErrorHandler } from '../utils/errorHandler';

// Types
export interface AuthenticatedUser {
  uid: string;
  email: string;
  emailVerified: boolean;
  name?: string;
  role: 'admin' | 'user';
}

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Name shown in analysis metadata and reports
 */
export const displayNameOf = (user: AuthenticatedUser | undefined): string => {
  if (!user) {
    return 'Unknown';
  }
  return user.name || user.email || `User ${user.uid}`;
};

/**
 * Middleware to verify Firebase ID token
 * @param req - Express request object
 * @param res - Express response object
 * @param next - Express next function
 */
export const authenticateUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({
      error: 'Authorization required',
      message: 'Request does not contain an access token.'
    });
    return;
  }

  const token = authHeader.slice('Bearer '.length).trim();
  if (!token) {
    res.status(401).json({
      error: 'Authorization required',
      message: 'No token provided'
    });
    return;
  }

  const firebaseAuth = isFirebaseAvailable() ? getFirebaseAuth() : null;
  if (!firebaseAuth) {
    res.status(503).json({
      error: 'Service Unavailable',
      message: 'Firebase authentication service is not available'
    });
    return;
  }

  try {
    const decodedToken = await firebaseAuth.verifyIdToken(token);
    const userRecord = await firebaseAuth.getUser(decodedToken.uid);

    req.user = {
      uid: userRecord.uid,
      email: userRecord.email || '',
      emailVerified: userRecord.emailVerified || false,
      name: userRecord.displayName || undefined,
      role: getUserRole(userRecord.email || '')
    };
  } catch (error) {
    console.error(`❌ [${new Date().toISOString()}] authenticateUser: token verification failed:`, ErrorHandler.describe(error));
    res.status(401).json({
      error: 'Invalid token',
      message: 'The token is invalid. Please log in again.'
    });
    return;
  }

  next();
};

/**
 * Admin-only middleware; must run after authenticateUser
 * @param req - Express request object
 * @param res - Express response object
 * @param next - Express next function
 */
export const requireAdmin = (req: Request, res: Response, next: NextFunction): void => {
  if (req.user?.role !== 'admin') {
    res.status(403).json({
      error: 'Forbidden',
      message: 'Admin access required'
    });
    return;
  }
  next();
};
