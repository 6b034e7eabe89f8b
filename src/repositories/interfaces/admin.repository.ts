import type { Admin, CreateAdminParams } from '../../types/admin.types';

export interface IAdminRepository {
  create(params: CreateAdminParams): Promise<Admin>;
  findById(id: number): Promise<Admin | null>;
  findByEmail(email: string): Promise<Admin | null>;
  setOtp(id: number, otpHash: string, expiresAt: Date): Promise<void>;
  /** Clears the code only if it is still the one given, so a code is used once */
  consumeOtp(id: number, otpHash: string): Promise<boolean>;
}
