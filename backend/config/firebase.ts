/**
 * Centralized Firebase Admin Configuration
 * Initializes the Admin SDK used to verify user ID tokens
 */

import admin from 'firebase-admin';
import { join } from 'path';
import { existsSync } from 'fs';
import { ADMIN_EMAILS } from './admin';

// Firebase Admin instances
let firebaseAdmin: admin.app.App | null = null;
let firebaseAuth: admin.auth.Auth | null = null;
let isInitialized = false;
let initAttempted = false;

const resolveServiceAccountPath = (): string | undefined => {
  const possiblePaths = [
    process.env['FIREBASE_SERVICE_ACCOUNT'],
    join(process.cwd(), 'backend', 'firebase-service-account.json'),
    join(process.cwd(), 'firebase-service-account.json')
  ].filter((candidate): candidate is string => Boolean(candidate));

  return possiblePaths.find(candidate => existsSync(candidate));
};

/**
 * Initialize Firebase Admin SDK
 */
const initializeFirebase = (): boolean => {
  initAttempted = true;
  try {
    if (isInitialized && firebaseAdmin) {
      return true;
    }

    const existingApp = admin.apps[0];
    if (existingApp) {
      firebaseAdmin = existingApp;
    } else {
      const serviceAccountPath = resolveServiceAccountPath();
      if (!serviceAccountPath) {
        console.warn('⚠️ Firebase service account not found - authentication disabled');
        return false;
      }

      firebaseAdmin = admin.initializeApp({
        credential: admin.credential.cert(serviceAccountPath)
      });
    }

    firebaseAuth = admin.auth(firebaseAdmin);
    isInitialized = true;
    return true;
  } catch (error) {
    console.error('❌ Firebase Admin initialization failed:', error instanceof Error ? error.message : String(error));
    firebaseAdmin = null;
    firebaseAuth = null;
    isInitialized = false;
    return false;
  }
};

/**
 * Get Firebase Auth instance
 */
export const getFirebaseAuth = (): admin.auth.Auth | null => {
  if (!firebaseAuth && !initAttempted) {
    initializeFirebase();
  }
  return firebaseAuth;
};

/**
 * Check if Firebase is available
 */
export const isFirebaseAvailable = (): boolean => {
  if (!initAttempted) {
    initializeFirebase();
  }
  return isInitialized && firebaseAdmin !== null && firebaseAuth !== null;
};

/**
 * Helper function to determine user role based on email
 */
export const getUserRole = (email: string): 'admin' | 'user' => {
  return ADMIN_EMAILS.includes(email.toLowerCase()) ? 'admin' : 'user';
};
