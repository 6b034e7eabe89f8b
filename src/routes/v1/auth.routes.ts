import { Router } from 'express';
import { AuthController } from '../../controllers/auth.controller';

/**
 * Public auth routes (v1)
 */
export function createAuthRouter(authController: AuthController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/auth/login:
   *   post:
   *     summary: Check staff credentials and mail a login code
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password]
   *             properties:
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *     responses:
   *       200:
   *         description: Code sent
   *       401:
   *         description: Invalid email or password
   *       502:
   *         description: The code could not be delivered
   * /v1/auth/verify-otp:
   *   post:
   *     summary: Exchange a login code for a session token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, otp]
   *             properties:
   *               email:
   *                 type: string
   *               otp:
   *                 type: string
   *                 pattern: '^\d{6}$'
   *     responses:
   *       200:
   *         description: Session token
   *       401:
   *         description: Invalid or expired code
   */
  router.post('/login', authController.login);
  router.post('/verify-otp', authController.verifyOtp);

  return router;
}

/**
 * Staff account routes (v1), behind authentication
 */
export function createAdminsRouter(authController: AuthController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/admins/me:
   *   get:
   *     summary: The signed-in staff member
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Staff account
   * /v1/admins:
   *   post:
   *     summary: Create a staff account
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [first_name, last_name, email, password]
   *             properties:
   *               first_name:
   *                 type: string
   *               last_name:
   *                 type: string
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *                 minLength: 8
   *     responses:
   *       201:
   *         description: Staff account created
   *       409:
   *         description: Email already registered
   */
  router.get('/me', authController.me);
  router.post('/', authController.createAdmin);

  return router;
}
