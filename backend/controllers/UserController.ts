import admin from 'firebase-admin';
import type { Request, Response } from 'express';
import { getFirebaseAuth, getUserRole, isFirebaseAvailable } from '../config/firebase';
import { ErrorHandler } from '../utils/errorHandler';
import {
  isUserType,
  USER_TYPES,
  validateEmail,
  validateName,
  validatePassword
} from '../utils/userValidation';
import type { UserType } from '../utils/userValidation';

export interface UserProfile {
  uid: string;
  email: string;
  emailVerified: boolean;
  firstName: string;
  lastName: string;
  name: string | null;
  userType: UserType;
  role: 'admin' | 'user';
  createdAt: string | null;
  lastLoginAt: string | null;
}

const DEFAULT_USER_TYPE: UserType = 'healthcare';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringField = (body: Record<string, unknown>, key: string): string => {
  const value = body[key];
  return typeof value === 'string' ? value : '';
};

const firebaseErrorCode = (error: unknown): string | undefined => {
  if (!isRecord(error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

const toProfile = (record: admin.auth.UserRecord): UserProfile => {
  const name = record.displayName || null;
  const [firstName = '', ...rest] = (name ?? '').split(' ');
  const claimedType = record.customClaims?.['userType'];
  return {
    uid: record.uid,
    email: record.email || '',
    emailVerified: record.emailVerified || false,
    firstName,
    lastName: rest.join(' '),
    name,
    userType: isUserType(claimedType) ? claimedType : DEFAULT_USER_TYPE,
    role: getUserRole(record.email || ''),
    createdAt: record.metadata.creationTime || null,
    lastLoginAt: record.metadata.lastSignInTime || null
  };
};

const noData = (res: Response): void => {
  res.status(400).json({
    error: 'No data provided',
    message: 'Request body must contain JSON data'
  });
};

/**
 * Account endpoints backed by Firebase Authentication.
 * Sign-in happens in the client SDK; these routes manage the account itself.
 */
export class UserController {
  /**
   * POST /api/users/register
   */
  register = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) {
      noData(res);
      return;
    }

    const firstName = stringField(body, 'firstName').trim();
    const lastName = stringField(body, 'lastName').trim();
    const email = stringField(body, 'email').trim().toLowerCase();
    const password = stringField(body, 'password');
    const confirmPassword = stringField(body, 'confirmPassword');
    const userType = stringField(body, 'userType').trim() || DEFAULT_USER_TYPE;

    if (!firstName || !lastName || !email || !password) {
      res.status(400).json({
        error: 'Missing required fields',
        message: 'First name, last name, email, and password are required'
      });
      return;
    }
    if (body['agreeToTerms'] !== true) {
      res.status(400).json({
        error: 'Terms not accepted',
        message: 'You must agree to the terms and conditions'
      });
      return;
    }
    if (password !== confirmPassword) {
      res.status(400).json({
        error: 'Password mismatch',
        message: 'Password and confirm password do not match'
      });
      return;
    }

    const firstNameCheck = validateName(firstName);
    if (!firstNameCheck.valid) {
      res.status(400).json({ error: 'Invalid first name', message: firstNameCheck.message });
      return;
    }
    const lastNameCheck = validateName(lastName);
    if (!lastNameCheck.valid) {
      res.status(400).json({ error: 'Invalid last name', message: lastNameCheck.message });
      return;
    }
    if (!validateEmail(email)) {
      res.status(400).json({ error: 'Invalid email', message: 'Please provide a valid email address' });
      return;
    }
    const passwordCheck = validatePassword(password);
    if (!passwordCheck.valid) {
      res.status(400).json({ error: 'Invalid password', message: passwordCheck.message });
      return;
    }
    if (!isUserType(userType)) {
      res.status(400).json({
        error: 'Invalid user type',
        message: `User type must be one of: ${USER_TYPES.join(', ')}`
      });
      return;
    }

    const firebaseAuth = this.requireAuthService(res);
    if (!firebaseAuth) {
      return;
    }

    try {
      const created = await firebaseAuth.createUser({
        email,
        password,
        displayName: `${firstName} ${lastName}`,
        emailVerified: false
      });
      await firebaseAuth.setCustomUserClaims(created.uid, { userType });
      const record = await firebaseAuth.getUser(created.uid);

      console.log(`✅ [USERS] Registered ${email}`);
      res.status(201).json({
        message: 'User registered successfully',
        user: toProfile(record)
      });
    } catch (error) {
      const code = firebaseErrorCode(error);
      if (code === 'auth/email-already-exists') {
        res.status(409).json({
          error: 'Email already registered',
          message: 'An account with this email already exists'
        });
        return;
      }
      if (code === 'auth/invalid-email' || code === 'auth/invalid-password') {
        res.status(400).json({ error: 'Registration failed', message: ErrorHandler.describe(error) });
        return;
      }
      console.error('❌ Registration error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Internal server error',
        message: 'An unexpected error occurred during registration'
      });
    }
  };

  /**
   * GET /api/users/profile
   */
  getProfile = async (req: Request, res: Response): Promise<void> => {
    const firebaseAuth = this.requireAuthService(res);
    if (!firebaseAuth || !this.hasUser(req, res)) {
      return;
    }

    try {
      const record = await firebaseAuth.getUser(req.user.uid);
      if (record.disabled) {
        res.status(401).json({
          error: 'Account deactivated',
          message: 'Your account has been deactivated'
        });
        return;
      }
      res.status(200).json({ user: toProfile(record) });
    } catch (error) {
      if (firebaseErrorCode(error) === 'auth/user-not-found') {
        res.status(404).json({
          error: 'User not found',
          message: 'User account no longer exists'
        });
        return;
      }
      console.error('❌ Profile fetch error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Internal server error',
        message: 'An unexpected error occurred while fetching profile'
      });
    }
  };

  /**
   * PUT /api/users/profile
   * Body may carry firstName, lastName and userType
   */
  updateProfile = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) {
      noData(res);
      return;
    }

    const updates: { firstName?: string; lastName?: string; userType?: UserType } = {};
    if ('firstName' in body) {
      const firstName = stringField(body, 'firstName').trim();
      const check = validateName(firstName);
      if (!check.valid) {
        res.status(400).json({ error: 'Invalid first name', message: check.message });
        return;
      }
      updates.firstName = firstName;
    }
    if ('lastName' in body) {
      const lastName = stringField(body, 'lastName').trim();
      const check = validateName(lastName);
      if (!check.valid) {
        res.status(400).json({ error: 'Invalid last name', message: check.message });
        return;
      }
      updates.lastName = lastName;
    }
    if ('userType' in body) {
      const userType = stringField(body, 'userType').trim();
      if (!isUserType(userType)) {
        res.status(400).json({
          error: 'Invalid user type',
          message: `User type must be one of: ${USER_TYPES.join(', ')}`
        });
        return;
      }
      updates.userType = userType;
    }

    if (Object.keys(updates).length === 0) {
      res.status(400).json({
        error: 'No valid fields to update',
        message: 'Please provide at least one field to update'
      });
      return;
    }

    const firebaseAuth = this.requireAuthService(res);
    if (!firebaseAuth || !this.hasUser(req, res)) {
      return;
    }

    try {
      const currentRecord = await firebaseAuth.getUser(req.user.uid);
      const current = toProfile(currentRecord);
      if (updates.firstName !== undefined || updates.lastName !== undefined) {
        const firstName = updates.firstName ?? current.firstName;
        const lastName = updates.lastName ?? current.lastName;
        await firebaseAuth.updateUser(req.user.uid, { displayName: `${firstName} ${lastName}`.trim() });
      }
      if (updates.userType !== undefined) {
        const existingClaims = currentRecord.customClaims ?? {};
        await firebaseAuth.setCustomUserClaims(req.user.uid, { ...existingClaims, userType: updates.userType });
      }

      const updated = toProfile(await firebaseAuth.getUser(req.user.uid));
      console.log(`✅ [USERS] Profile updated: ${updated.email}`);
      res.status(200).json({
        message: 'Profile updated successfully',
        user: updated
      });
    } catch (error) {
      console.error('❌ Profile update error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Internal server error',
        message: 'An unexpected error occurred while updating profile'
      });
    }
  };

  /**
   * POST /api/users/change-password
   * The client re-authenticates with the current password before calling this.
   */
  changePassword = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) {
      noData(res);
      return;
    }

    const newPassword = stringField(body, 'newPassword');
    const confirmPassword = stringField(body, 'confirmPassword');
    if (!newPassword || !confirmPassword) {
      res.status(400).json({
        error: 'Missing required fields',
        message: 'New password and confirm password are required'
      });
      return;
    }
    if (newPassword !== confirmPassword) {
      res.status(400).json({
        error: 'Password mismatch',
        message: 'New password and confirm password do not match'
      });
      return;
    }
    const check = validatePassword(newPassword);
    if (!check.valid) {
      res.status(400).json({ error: 'Invalid new password', message: check.message });
      return;
    }

    const firebaseAuth = this.requireAuthService(res);
    if (!firebaseAuth || !this.hasUser(req, res)) {
      return;
    }

    try {
      await firebaseAuth.updateUser(req.user.uid, { password: newPassword });
      // other sessions must sign in again with the new password
      await firebaseAuth.revokeRefreshTokens(req.user.uid);
      console.log(`🔑 [USERS] Password changed for ${req.user.uid}`);
      res.status(200).json({ message: 'Password changed successfully' });
    } catch (error) {
      console.error('❌ Change password error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Internal server error',
        message: 'An unexpected error occurred while changing password'
      });
    }
  };

  /**
   * POST /api/users/logout
   */
  logout = async (req: Request, res: Response): Promise<void> => {
    const firebaseAuth = this.requireAuthService(res);
    if (!firebaseAuth || !this.hasUser(req, res)) {
      return;
    }

    try {
      await firebaseAuth.revokeRefreshTokens(req.user.uid);
      console.log(`👋 [USERS] Logged out ${req.user.uid}`);
      res.status(200).json({ message: 'Logged out successfully' });
    } catch (error) {
      console.error('❌ Logout error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Internal server error',
        message: 'An unexpected error occurred during logout'
      });
    }
  };

  /**
   * GET /api/users/health
   */
  health = (_req: Request, res: Response): void => {
    const available = isFirebaseAvailable();
    res.status(available ? 200 : 503).json({
      status: available ? 'healthy' : 'unhealthy',
      service: 'user_routes',
      auth: available ? 'available' : 'unavailable',
      timestamp: new Date().toISOString()
    });
  };

  private hasUser(req: Request, res: Response): req is Request & { user: NonNullable<Request['user']> } {
    if (!req.user) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'User not authenticated'
      });
      return false;
    }
    return true;
  }

  private requireAuthService(res: Response): admin.auth.Auth | null {
    const firebaseAuth = isFirebaseAvailable() ? getFirebaseAuth() : null;
    if (!firebaseAuth) {
      res.status(503).json({
        error: 'Service Unavailable',
        message: 'Firebase authentication service is not available'
      });
    }
    return firebaseAuth;
  }
}
