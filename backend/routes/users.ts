/**
 * User Router
 * Account registration, profile and session endpoints
 */

import express from 'express';
import { UserController } from '../controllers/UserController';
import { authenticateUser } from '../middleware/auth';

export const createUserRouter = (): express.Router => {
  const router = express.Router();
  const controller = new UserController();

  /**
   * POST /api/users/register
   * Body { firstName, lastName, email, password, confirmPassword, userType?, agreeToTerms }
   */
  router.post('/register', controller.register);

  router.get('/profile', authenticateUser, controller.getProfile);

  /**
   * PUT /api/users/profile
   * Body { firstName?, lastName?, userType? }
   */
  router.put('/profile', authenticateUser, controller.updateProfile);

  router.post('/change-password', authenticateUser, controller.changePassword);
  router.post('/logout', authenticateUser, controller.logout);
  router.get('/health', controller.health);

  return router;
};
