/**
 * Administrator (staff) types
 */

export interface Admin {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  otpHash: string | null;
  otpExpiresAt: Date | null;
  createdAt: Date;
}

export type PublicAdmin = Omit<Admin, 'passwordHash' | 'otpHash' | 'otpExpiresAt'>;

export interface CreateAdminInput {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
}

export interface CreateAdminParams {
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
}

// Authenticated staff identity attached to each request
export interface StaffContext {
  adminId: number;
  email: string;
  name: string;
}

export interface LoginChallenge {
  email: string;
  expiresAt: Date;
}

export interface SessionToken {
  token: string;
  expiresIn: number;
  admin: PublicAdmin;
}

export function toPublicAdmin(admin: Admin): PublicAdmin {
  return {
    id: admin.id,
    firstName: admin.firstName,
    lastName: admin.lastName,
    email: admin.email,
    createdAt: admin.createdAt,
  };
}
