import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireStaff } from '../middleware/auth.middleware';
import { createAdminSchema, loginSchema, verifyOtpSchema } from '../validators/auth.validator';

/**
 * Auth Controller
 */
export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /v1/auth/login
   * Checks the password and mails a one-time code
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { body } = await parseRequest(loginSchema, req);

    const challenge = await this.authService.login(body.email, body.password);

    res.status(200).json(createSuccessResponse(challenge, 'Login code sent'));
  });

  /**
   * POST /v1/auth/verify-otp
   */
  verifyOtp = asyncHandler(async (req: Request, res: Response) => {
    const { body } = await parseRequest(verifyOtpSchema, req);

    const session = await this.authService.verifyOtp(body.email, body.otp);

    res.status(200).json(createSuccessResponse(session));
  });

  /**
   * GET /v1/admins/me
   */
  me = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);

    const admin = await this.authService.getAdmin(staff.adminId);

    res.status(200).json(createSuccessResponse(admin));
  });

  /**
   * POST /v1/admins
   */
  createAdmin = asyncHandler(async (req: Request, res: Response) => {
    const { body } = await parseRequest(createAdminSchema, req);

    const admin = await this.authService.createAdmin({
      firstName: body.first_name,
      lastName: body.last_name,
      email: body.email,
      password: body.password,
    });

    res.status(201).json(createSuccessResponse(admin));
  });
}
