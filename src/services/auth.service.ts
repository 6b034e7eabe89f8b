import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { createHash, randomInt, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import type { IAdminRepository } from '../repositories/interfaces';
import {
  CreateAdminInput,
  LoginChallenge,
  PublicAdmin,
  SessionToken,
  StaffContext,
  toPublicAdmin,
} from '../types/admin.types';
import { fullName } from '../types/borrower.types';
import { AppError, ErrorCode } from '../types/error.types';
import { NotificationDispatcher } from './notification.service';
import { logger } from '../config/logger';

export interface AuthOptions {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  otpTtlMinutes: number;
  now?: () => Date;
}

const BCRYPT_ROUNDS = 10;

/**
 * JWT payload schema - validates token structure
 */
const tokenPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  email: z.string().email(),
  name: z.string(),
});

const hashOtp = (code: string): string => createHash('sha256').update(code).digest('hex');

/**
 * Auth Service
 *
 * Two-step staff login: password, then a 6-digit code sent by mail, then a
 * signed token carried on every request.
 */
export class AuthService {
  private now: () => Date;

  constructor(
    private adminRepo: IAdminRepository,
    private dispatcher: NotificationDispatcher,
    private options: AuthOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async login(email: string, password: string): Promise<LoginChallenge> {
    const normalizedEmail = email.trim().toLowerCase();
    const admin = await this.adminRepo.findByEmail(normalizedEmail);

    // Same error for unknown email and wrong password
    if (!admin || !(await bcrypt.compare(password, admin.passwordHash))) {
      logger.warn('Failed login attempt', { email: normalizedEmail });
      throw new AppError(ErrorCode.INVALID_CREDENTIALS, 'Invalid email or password', 401);
    }

    const code = String(randomInt(0, 1_000_000)).padStart(6, '0');
    const expiresAt = new Date(this.now().getTime() + this.options.otpTtlMinutes * 60_000);

    await this.adminRepo.setOtp(admin.id, hashOtp(code), expiresAt);

    const sent = await this.dispatcher.deliverNow('login code', {
      to: admin.email,
      subject: 'Your login code',
      html: `<p>Your login code is <strong>${code}</strong>. It expires in ${this.options.otpTtlMinutes} minutes.</p>`,
      text: `Your login code is ${code}. It expires in ${this.options.otpTtlMinutes} minutes.`,
    });

    if (!sent) {
      throw new AppError(ErrorCode.NOTIFICATION_FAILED, 'Could not send the login code. Try again later.', 502);
    }

    logger.info('Login code issued', { adminId: admin.id });
    return { email: admin.email, expiresAt };
  }

  async verifyOtp(email: string, code: string): Promise<SessionToken> {
    const admin = await this.adminRepo.findByEmail(email.trim().toLowerCase());

    const invalid = new AppError(ErrorCode.INVALID_OTP, 'Invalid or expired login code', 401);

    if (!admin || !admin.otpHash || !admin.otpExpiresAt) throw invalid;
    if (admin.otpExpiresAt.getTime() <= this.now().getTime()) throw invalid;

    const expected = Buffer.from(admin.otpHash, 'hex');
    const actual = Buffer.from(hashOtp(code.trim()), 'hex');
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) throw invalid;

    // Single use, even if the same code is submitted twice at once
    if (!(await this.adminRepo.consumeOtp(admin.id, admin.otpHash))) throw invalid;

    const token = jwt.sign(
      { sub: String(admin.id), email: admin.email, name: fullName(admin) },
      this.options.jwtSecret,
      { expiresIn: this.options.jwtExpiresInSeconds }
    );

    logger.info('Staff signed in', { adminId: admin.id });
    return { token, expiresIn: this.options.jwtExpiresInSeconds, admin: toPublicAdmin(admin) };
  }

  /**
   * Verify a bearer token and turn it into the request's staff context
   */
  verifyToken(token: string): StaffContext {
    let decoded: unknown;

    try {
      decoded = jwt.verify(token, this.options.jwtSecret);
    } catch (error) {
      logger.debug('Token rejected', { error: error instanceof Error ? error.message : String(error) });
      throw new AppError(ErrorCode.INVALID_TOKEN, 'Invalid or expired token', 401);
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new AppError(ErrorCode.INVALID_TOKEN, 'Invalid or expired token', 401);
    }

    return {
      adminId: Number(payload.data.sub),
      email: payload.data.email,
      name: payload.data.name,
    };
  }

  async createAdmin(input: CreateAdminInput): Promise<PublicAdmin> {
    const email = input.email.trim().toLowerCase();
    logger.info('Creating admin', { email });

    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    const admin = await this.adminRepo.create({
      firstName: input.firstName,
      lastName: input.lastName,
      email,
      passwordHash,
    });

    logger.info('Admin created', { adminId: admin.id });
    return toPublicAdmin(admin);
  }

  async getAdmin(id: number): Promise<PublicAdmin> {
    const admin = await this.adminRepo.findById(id);

    if (!admin) {
      throw new AppError(ErrorCode.ADMIN_NOT_FOUND, `Admin with ID ${id} not found`, 404);
    }

    return toPublicAdmin(admin);
  }
}
