import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  ApplyReturnParams,
  ApplyReturnResult,
  BorrowTransaction,
  IssueBorrowParams,
  IssueBorrowResult,
  TransactionFilters,
  TransactionStatus,
  deriveTransactionStatus,
} from '../types/transaction.types';
import type { PaginationParams } from '../types/api.types';
import type { ReportRange } from '../types/report.types';
import type { ITransactionRepository, TransactionPage } from './interfaces';
import { formatReferenceNumber } from '../utils/reference-number';
import { fetchAllPages } from '../utils/fetch-all-pages';
import { logger } from '../config/logger';

const TRANSACTION_COLUMNS = [
  'id',
  'borrower_id',
  'item_id',
  'issued_by_admin_id',
  'instructor_id',
  'subject',
  'room',
  'borrowed_qty',
  'returned_qty',
  'condition_before',
  'condition_after',
  'borrowed_at',
  'returned_at',
  'returned_by_admin_id',
  'idempotency_key',
  'items(name)',
].join(', ');

const transactionRowSchema = z.object({
  id: z.number().int(),
  borrower_id: z.number().int(),
  item_id: z.number().int(),
  issued_by_admin_id: z.number().int().nullable(),
  instructor_id: z.number().int().nullable(),
  subject: z.string().nullable(),
  room: z.string().nullable(),
  borrowed_qty: z.number().int(),
  returned_qty: z.number().int(),
  condition_before: z.string().nullable(),
  condition_after: z.string().nullable(),
  borrowed_at: z.string(),
  returned_at: z.string().nullable(),
  returned_by_admin_id: z.number().int().nullable(),
  idempotency_key: z.string().nullable(),
  items: z.object({ name: z.string() }).nullable(),
});

type TransactionRow = z.infer<typeof transactionRowSchema>;

const issueResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('issued'),
    transaction_ids: z.array(z.number().int()),
    replayed_count: z.number().int(),
  }),
  z.object({
    status: z.literal('insufficient_stock'),
    item_id: z.number().int(),
    available: z.number().int(),
  }),
  z.object({
    status: z.literal('item_unavailable'),
    item_id: z.number().int(),
  }),
  z.object({
    status: z.literal('replay_mismatch'),
    item_id: z.number().int(),
    recorded_quantity: z.number().int(),
  }),
  z.object({ status: z.literal('borrower_unavailable') }),
]);

const applyReturnResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('applied'), item_ids: z.array(z.number().int()) }),
  z.object({ status: z.literal('pending_return_missing') }),
]);

interface RangedResponse {
  data: unknown;
  error: { message: string } | null;
  count: number | null;
}

// Raised by apply_return_atomic when a guarded update matches no row
const RETURN_CONFLICT_PATTERN = /RETURN_CONFLICT:(\d+)/;

/**
 * Transaction Repository
 *
 * Handles all database operations for the transactions table.
 * Issue and return go through PostgreSQL functions so that every multi-row
 * write is a single storage transaction holding the item row locks.
 */
export class TransactionRepository implements ITransactionRepository {
  constructor(private client: SupabaseClient) {}

  /**
   * Issue a borrow using the issue_borrow_atomic function, which:
   * 1. Takes a shared lock on the borrower row and refuses an archived borrower
   * 2. Locks every requested item row with SELECT ... FOR UPDATE (id order)
   * 3. Replays lines whose idempotency key is already recorded with the same
   *    quantity, and refuses a rescan that asks for a different one
   * 4. Checks stock for the rest within the lock, returning early on a shortfall
   * 5. Inserts the lines and increments borrowed_quantity
   */
  async issueAtomic(params: IssueBorrowParams): Promise<IssueBorrowResult> {
    logger.debug('Issuing borrow atomically', {
      borrowerId: params.borrowerId,
      lines: params.lines.length,
    });

    const { data, error } = await this.client.rpc('issue_borrow_atomic', {
      p_borrower_id: params.borrowerId,
      p_instructor_id: params.instructorId,
      p_admin_id: params.adminId,
      p_subject: params.subject,
      p_room: params.room,
      p_lines: params.lines.map((line) => ({
        item_id: line.itemId,
        quantity: line.quantity,
        condition_before: line.conditionBefore,
        idempotency_key: line.idempotencyKey,
      })),
    });

    if (error) {
      logger.error('Failed to issue borrow atomically', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new Error(`Failed to issue borrow: ${error.message}`);
    }

    const result = issueResultSchema.parse(data);

    switch (result.status) {
      case 'issued':
        return {
          status: 'issued',
          transactionIds: result.transaction_ids,
          replayedCount: result.replayed_count,
        };
      case 'insufficient_stock':
        return { status: 'insufficient_stock', itemId: result.item_id, available: result.available };
      case 'item_unavailable':
        return { status: 'item_unavailable', itemId: result.item_id };
      case 'replay_mismatch':
        return { status: 'replay_mismatch', itemId: result.item_id, recordedQuantity: result.recorded_quantity };
      case 'borrower_unavailable':
        return { status: 'borrower_unavailable' };
    }
  }

  /**
   * Apply a return plan using the apply_return_atomic function, which:
   * 1. Consumes the pending return row when one is given (DELETE ... RETURNING)
   * 2. Locks the affected item rows in id order
   * 3. Applies each allocation with the guard returned_qty + credited <= borrowed_qty
   * 4. Recomputes borrowed_quantity of each touched item in one statement
   *
   * A guard miss raises inside the function, so nothing of the submission is kept.
   */
  async applyReturnAtomic(params: ApplyReturnParams): Promise<ApplyReturnResult> {
    logger.debug('Applying return atomically', {
      allocations: params.allocations.length,
      pendingReturnId: params.pendingReturnId,
    });

    const { data, error } = await this.client.rpc('apply_return_atomic', {
      p_allocations: params.allocations.map((allocation) => ({
        transaction_id: allocation.transactionId,
        credited: allocation.credited,
        condition_after: allocation.conditionAfter,
      })),
      p_admin_id: params.adminId,
      p_pending_return_id: params.pendingReturnId ?? null,
    });

    if (error) {
      const conflict = RETURN_CONFLICT_PATTERN.exec(error.message);
      if (conflict) {
        logger.warn('Return conflicted with a concurrent submission', { error: error.message });
        return { status: 'conflict', transactionId: conflict[1] ? Number(conflict[1]) : null };
      }

      logger.error('Failed to apply return atomically', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new Error(`Failed to apply return: ${error.message}`);
    }

    const result = applyReturnResultSchema.parse(data);

    if (result.status === 'pending_return_missing') {
      return { status: 'pending_return_missing' };
    }

    return { status: 'applied', itemIds: result.item_ids };
  }

  async findById(id: number): Promise<BorrowTransaction | null> {
    const { data, error } = await this.client
      .from('transactions')
      .select(TRANSACTION_COLUMNS)
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find transaction', { id, error: error.message });
      throw new Error(`Failed to find transaction: ${error.message}`);
    }

    return this.mapToTransaction(transactionRowSchema.parse(data));
  }

  async findByIds(ids: number[]): Promise<BorrowTransaction[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.client
      .from('transactions')
      .select(TRANSACTION_COLUMNS)
      .in('id', ids)
      .order('id', { ascending: true });

    return this.parseRows(data, error, 'find transactions');
  }

  /**
   * Open rows (outstanding_qty > 0) ordered oldest-first, the order the
   * reconciler credits them in
   */
  async findOpenByBorrower(borrowerId: number): Promise<BorrowTransaction[]> {
    const { data, error } = await this.client
      .from('transactions')
      .select(TRANSACTION_COLUMNS)
      .eq('borrower_id', borrowerId)
      .gt('outstanding_qty', 0)
      .order('id', { ascending: true });

    return this.parseRows(data, error, 'find open transactions');
  }

  /**
   * Borrowing history, newest first
   */
  async list(filters: TransactionFilters, page: PaginationParams): Promise<TransactionPage> {
    let query = this.client
      .from('transactions')
      .select(TRANSACTION_COLUMNS, { count: 'exact' })
      .order('id', { ascending: false })
      .range(page.offset, page.offset + page.limit - 1);

    if (filters.borrowerId !== undefined) query = query.eq('borrower_id', filters.borrowerId);
    if (filters.itemId !== undefined) query = query.eq('item_id', filters.itemId);
    if (filters.from) query = query.gte('borrowed_at', filters.from.toISOString());
    if (filters.to) query = query.lte('borrowed_at', filters.to.toISOString());

    switch (filters.status) {
      case TransactionStatus.BORROWED:
        query = query.eq('returned_qty', 0);
        break;
      case TransactionStatus.PARTIAL:
        query = query.gt('returned_qty', 0).gt('outstanding_qty', 0);
        break;
      case TransactionStatus.RETURNED:
        query = query.eq('outstanding_qty', 0);
        break;
      default:
        break;
    }

    const { data, error, count } = await query;
    const rows = this.parseRows(data, error, 'list transactions');

    return { rows, total: count ?? rows.length };
  }

  async findBorrowedInRange(range: ReportRange): Promise<BorrowTransaction[]> {
    return this.loadAll('load report transactions', (from, to) => {
      let query = this.client
        .from('transactions')
        .select(TRANSACTION_COLUMNS, { count: 'exact' })
        .order('id', { ascending: true });

      if (range.from) query = query.gte('borrowed_at', range.from.toISOString());
      if (range.to) query = query.lte('borrowed_at', range.to.toISOString());

      return query.range(from, to);
    });
  }

  async findOpen(): Promise<BorrowTransaction[]> {
    return this.loadAll('load open transactions', (from, to) =>
      this.client
        .from('transactions')
        .select(TRANSACTION_COLUMNS, { count: 'exact' })
        .gt('outstanding_qty', 0)
        .order('id', { ascending: true })
        .range(from, to)
    );
  }

  async findReturned(): Promise<BorrowTransaction[]> {
    return this.loadAll('load returned transactions', (from, to) =>
      this.client
        .from('transactions')
        .select(TRANSACTION_COLUMNS, { count: 'exact' })
        .not('returned_at', 'is', null)
        .order('returned_at', { ascending: true })
        .order('id', { ascending: true })
        .range(from, to)
    );
  }

  /**
   * Whole result sets for reports, read page by page
   */
  private loadAll(
    action: string,
    query: (from: number, to: number) => PromiseLike<RangedResponse>
  ): Promise<BorrowTransaction[]> {
    return fetchAllPages(async (from, to) => {
      const { data, error, count } = await query(from, to);
      return { rows: this.parseRows(data, error, action), total: count };
    });
  }

  private parseRows(
    data: unknown,
    error: { message: string } | null,
    action: string
  ): BorrowTransaction[] {
    if (error) {
      logger.error(`Failed to ${action}`, { error: error.message });
      throw new Error(`Failed to ${action}: ${error.message}`);
    }

    return z.array(transactionRowSchema).parse(data).map((row) => this.mapToTransaction(row));
  }

  /**
   * Map database row to domain model
   */
  private mapToTransaction(row: TransactionRow): BorrowTransaction {
    return {
      id: row.id,
      referenceNumber: formatReferenceNumber(row.id),
      borrowerId: row.borrower_id,
      itemId: row.item_id,
      itemName: row.items?.name ?? null,
      issuedByAdminId: row.issued_by_admin_id,
      instructorId: row.instructor_id,
      subject: row.subject,
      room: row.room,
      borrowedQty: row.borrowed_qty,
      returnedQty: row.returned_qty,
      outstandingQty: row.borrowed_qty - row.returned_qty,
      status: deriveTransactionStatus(row.borrowed_qty, row.returned_qty),
      conditionBefore: row.condition_before,
      conditionAfter: row.condition_after,
      borrowedAt: new Date(row.borrowed_at),
      returnedAt: row.returned_at ? new Date(row.returned_at) : null,
      returnedByAdminId: row.returned_by_admin_id,
      idempotencyKey: row.idempotency_key,
    };
  }
}
