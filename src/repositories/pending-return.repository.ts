import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  CreatePendingReturnParams,
  PendingReturn,
  PendingReturnStatus,
} from '../types/pending-return.types';
import type { IPendingReturnRepository } from './interfaces';
import { logger } from '../config/logger';

const PENDING_RETURN_COLUMNS =
  'id, borrower_id, reference_transaction_id, claims, status, submitted_by_admin_id, created_at';

const storedClaimSchema = z.object({
  item_name: z.string(),
  quantity: z.number().int().positive(),
  condition: z.string().nullable(),
});

const pendingReturnRowSchema = z.object({
  id: z.number().int(),
  borrower_id: z.number().int(),
  reference_transaction_id: z.number().int().nullable(),
  claims: z.array(storedClaimSchema),
  status: z.nativeEnum(PendingReturnStatus),
  submitted_by_admin_id: z.number().int().nullable(),
  created_at: z.string(),
});

type PendingReturnRow = z.infer<typeof pendingReturnRowSchema>;

/**
 * Pending Return Repository
 *
 * Staged kiosk return claims. A row exists only while it awaits a decision;
 * approval deletes it inside apply_return_atomic, decline deletes it here.
 */
export class PendingReturnRepository implements IPendingReturnRepository {
  constructor(private client: SupabaseClient) {}

  async create(params: CreatePendingReturnParams): Promise<PendingReturn> {
    logger.debug('Staging pending return', {
      borrowerId: params.borrowerId,
      claims: params.claims.length,
    });

    const { data, error } = await this.client
      .from('pending_returns')
      .insert({
        borrower_id: params.borrowerId,
        reference_transaction_id: params.referenceTransactionId,
        claims: params.claims.map((claim) => ({
          item_name: claim.itemName,
          quantity: claim.quantity,
          condition: claim.condition,
        })),
        status: PendingReturnStatus.PENDING,
        submitted_by_admin_id: params.submittedByAdminId,
      })
      .select(PENDING_RETURN_COLUMNS)
      .single();

    if (error) {
      logger.error('Failed to stage pending return', { error: error.message });
      throw new Error(`Failed to stage pending return: ${error.message}`);
    }

    return this.mapToPendingReturn(pendingReturnRowSchema.parse(data));
  }

  async findById(id: number): Promise<PendingReturn | null> {
    const { data, error } = await this.client
      .from('pending_returns')
      .select(PENDING_RETURN_COLUMNS)
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find pending return', { id, error: error.message });
      throw new Error(`Failed to find pending return: ${error.message}`);
    }

    return this.mapToPendingReturn(pendingReturnRowSchema.parse(data));
  }

  async list(): Promise<PendingReturn[]> {
    const { data, error } = await this.client
      .from('pending_returns')
      .select(PENDING_RETURN_COLUMNS)
      .eq('status', PendingReturnStatus.PENDING)
      .order('created_at', { ascending: true });

    if (error) {
      logger.error('Failed to list pending returns', { error: error.message });
      throw new Error(`Failed to list pending returns: ${error.message}`);
    }

    return z.array(pendingReturnRowSchema).parse(data).map((row) => this.mapToPendingReturn(row));
  }

  /**
   * Decline (idempotent delete)
   *
   * The DELETE only matches a row that still exists, so of two concurrent
   * decisions exactly one gets the row back.
   */
  async decline(id: number): Promise<PendingReturn | null> {
    const { data, error } = await this.client
      .from('pending_returns')
      .delete()
      .eq('id', id)
      .select(PENDING_RETURN_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Already consumed
      logger.error('Failed to decline pending return', { id, error: error.message });
      throw new Error(`Failed to decline pending return: ${error.message}`);
    }

    logger.info('Pending return declined', { id });
    return {
      ...this.mapToPendingReturn(pendingReturnRowSchema.parse(data)),
      status: PendingReturnStatus.DECLINED,
    };
  }

  private mapToPendingReturn(row: PendingReturnRow): PendingReturn {
    return {
      id: row.id,
      borrowerId: row.borrower_id,
      referenceTransactionId: row.reference_transaction_id,
      claims: row.claims.map((claim) => ({
        itemName: claim.item_name,
        quantity: claim.quantity,
        condition: claim.condition,
      })),
      status: row.status,
      submittedByAdminId: row.submitted_by_admin_id,
      createdAt: new Date(row.created_at),
    };
  }
}
