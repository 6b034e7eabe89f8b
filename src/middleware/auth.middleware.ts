import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/auth.service';
import { AppError, ErrorCode } from '../types/error.types';
import type { StaffContext } from '../types/admin.types';

/**
 * Authentication middleware factory
 *
 * Verifies the bearer token and attaches the staff context to the request
 */
export const authenticate = (authService: AuthService): RequestHandler => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = req.headers['authorization'];
    const [scheme, token] = header ? header.split(' ') : [];

    if (scheme !== 'Bearer' || !token) {
      next(new AppError(ErrorCode.AUTH_REQUIRED, 'Access token required', 401));
      return;
    }

    try {
      req.staff = authService.verifyToken(token);
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * Staff context of an authenticated request
 */
export function requireStaff(req: Request): StaffContext {
  if (!req.staff) {
    throw new AppError(ErrorCode.AUTH_REQUIRED, 'Access token required', 401);
  }
  return req.staff;
}
