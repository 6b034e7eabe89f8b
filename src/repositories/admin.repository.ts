import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Admin, CreateAdminParams } from '../types/admin.types';
import type { IAdminRepository } from './interfaces';
import { logger } from '../config/logger';

const ADMIN_COLUMNS =
  'id, first_name, last_name, email, password_hash, otp_hash, otp_expires_at, created_at';

const adminRowSchema = z.object({
  id: z.number().int(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  password_hash: z.string(),
  otp_hash: z.string().nullable(),
  otp_expires_at: z.string().nullable(),
  created_at: z.string(),
});

type AdminRow = z.infer<typeof adminRowSchema>;

/**
 * Admin Repository
 *
 * Staff accounts and their one-time login codes
 */
export class AdminRepository implements IAdminRepository {
  constructor(private client: SupabaseClient) {}

  async create(params: CreateAdminParams): Promise<Admin> {
    const { data, error } = await this.client
      .from('admins')
      .insert({
        first_name: params.firstName,
        last_name: params.lastName,
        email: params.email,
        password_hash: params.passwordHash,
      })
      .select(ADMIN_COLUMNS)
      .single();

    if (error) {
      logger.error('Failed to create admin', { error: error.message });
      throw new Error(`Failed to create admin: ${error.message}`);
    }

    return this.mapToAdmin(adminRowSchema.parse(data));
  }

  async findById(id: number): Promise<Admin | null> {
    return this.findOne('id', id);
  }

  async findByEmail(email: string): Promise<Admin | null> {
    return this.findOne('email', email);
  }

  async setOtp(id: number, otpHash: string, expiresAt: Date): Promise<void> {
    const { error } = await this.client
      .from('admins')
      .update({
        otp_hash: otpHash,
        otp_expires_at: expiresAt.toISOString(),
        updated_at: new Date().toISOString(),
      })
      .eq('id', id);

    if (error) {
      logger.error('Failed to store login code', { id, error: error.message });
      throw new Error(`Failed to store login code: ${error.message}`);
    }
  }

  async consumeOtp(id: number, otpHash: string): Promise<boolean> {
    const { data, error } = await this.client
      .from('admins')
      .update({ otp_hash: null, otp_expires_at: null, updated_at: new Date().toISOString() })
      .eq('id', id)
      .eq('otp_hash', otpHash)
      .select('id');

    if (error) {
      logger.error('Failed to consume login code', { id, error: error.message });
      throw new Error(`Failed to consume login code: ${error.message}`);
    }

    return z.array(z.object({ id: z.number().int() })).parse(data).length === 1;
  }

  private async findOne(column: 'id' | 'email', value: number | string): Promise<Admin | null> {
    const { data, error } = await this.client
      .from('admins')
      .select(ADMIN_COLUMNS)
      .eq(column, value)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find admin', { column, error: error.message });
      throw new Error(`Failed to find admin: ${error.message}`);
    }

    return this.mapToAdmin(adminRowSchema.parse(data));
  }

  private mapToAdmin(row: AdminRow): Admin {
    return {
      id: row.id,
      firstName: row.first_name,
      lastName: row.last_name,
      email: row.email,
      passwordHash: row.password_hash,
      otpHash: row.otp_hash,
      otpExpiresAt: row.otp_expires_at ? new Date(row.otp_expires_at) : null,
      createdAt: new Date(row.created_at),
    };
  }
}
