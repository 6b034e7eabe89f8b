import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  ArchiveBorrowerResult,
  Borrower,
  BorrowerFilters,
  BorrowerRole,
  CreateBorrowerInput,
  UpdateBorrowerInput,
} from '../types/borrower.types';
import type { IBorrowerRepository } from './interfaces';
import { logger } from '../config/logger';

const BORROWER_COLUMNS =
  'id, rfid, borrower_code, first_name, last_name, department, course, role, email, archived_at, created_at';

const borrowerRowSchema = z.object({
  id: z.number().int(),
  rfid: z.string(),
  borrower_code: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  department: z.string().nullable(),
  course: z.string().nullable(),
  role: z.nativeEnum(BorrowerRole),
  email: z.string().nullable(),
  archived_at: z.string().nullable(),
  created_at: z.string(),
});

type BorrowerRow = z.infer<typeof borrowerRowSchema>;

const archiveResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('archived') }),
  z.object({ status: z.literal('has_open_borrows'), open_transactions: z.number().int() }),
  z.object({ status: z.literal('not_found') }),
]);

// PostgREST treats , ( ) as syntax inside or=() filters
const sanitizeSearch = (term: string): string => term.replace(/[,()%*]/g, ' ').trim();

/**
 * Borrower Repository
 *
 * Students, instructors and staff identified by their RFID badge
 */
export class BorrowerRepository implements IBorrowerRepository {
  constructor(private client: SupabaseClient) {}

  async create(input: CreateBorrowerInput): Promise<Borrower> {
    logger.debug('Creating borrower', { borrowerCode: input.borrowerCode, role: input.role });

    const { data, error } = await this.client
      .from('borrowers')
      .insert({
        rfid: input.rfid,
        borrower_code: input.borrowerCode,
        first_name: input.firstName,
        last_name: input.lastName,
        department: input.department ?? null,
        course: input.course ?? null,
        role: input.role,
        email: input.email ?? null,
      })
      .select(BORROWER_COLUMNS)
      .single();

    if (error) {
      logger.error('Failed to create borrower', { error: error.message });
      throw new Error(`Failed to create borrower: ${error.message}`);
    }

    return this.mapToBorrower(borrowerRowSchema.parse(data));
  }

  async findById(id: number): Promise<Borrower | null> {
    return this.findOne('id', id);
  }

  async findByRfid(rfid: string): Promise<Borrower | null> {
    return this.findOne('rfid', rfid);
  }

  async list(filters: BorrowerFilters): Promise<Borrower[]> {
    let query = this.client
      .from('borrowers')
      .select(BORROWER_COLUMNS)
      .order('last_name', { ascending: true })
      .order('first_name', { ascending: true });

    query = filters.archived ? query.not('archived_at', 'is', null) : query.is('archived_at', null);

    if (filters.role) {
      query = query.eq('role', filters.role);
    }

    if (filters.search) {
      const term = sanitizeSearch(filters.search);
      if (term) {
        query = query.or(
          `first_name.ilike.%${term}%,last_name.ilike.%${term}%,borrower_code.ilike.%${term}%`
        );
      }
    }

    const { data, error } = await query;

    if (error) {
      logger.error('Failed to list borrowers', { filters, error: error.message });
      throw new Error(`Failed to list borrowers: ${error.message}`);
    }

    return z.array(borrowerRowSchema).parse(data).map((row) => this.mapToBorrower(row));
  }

  async update(id: number, input: UpdateBorrowerInput): Promise<Borrower | null> {
    const changes: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (input.rfid !== undefined) changes['rfid'] = input.rfid;
    if (input.borrowerCode !== undefined) changes['borrower_code'] = input.borrowerCode;
    if (input.firstName !== undefined) changes['first_name'] = input.firstName;
    if (input.lastName !== undefined) changes['last_name'] = input.lastName;
    if (input.department !== undefined) changes['department'] = input.department;
    if (input.course !== undefined) changes['course'] = input.course;
    if (input.role !== undefined) changes['role'] = input.role;
    if (input.email !== undefined) changes['email'] = input.email;

    const { data, error } = await this.client
      .from('borrowers')
      .update(changes)
      .eq('id', id)
      .select(BORROWER_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null;
      logger.error('Failed to update borrower', { id, error: error.message });
      throw new Error(`Failed to update borrower: ${error.message}`);
    }

    return this.mapToBorrower(borrowerRowSchema.parse(data));
  }

  /**
   * Archive a borrower using the archive_borrower_atomic function, which locks
   * the borrower row exclusively, then counts open transactions. Issuing holds
   * a shared lock on the same row, so the two cannot interleave.
   */
  async archive(id: number): Promise<ArchiveBorrowerResult> {
    const { data, error } = await this.client.rpc('archive_borrower_atomic', { p_borrower_id: id });

    if (error) {
      logger.error('Failed to archive borrower', { id, error: error.message });
      throw new Error(`Failed to archive borrower: ${error.message}`);
    }

    const result = archiveResultSchema.parse(data);

    switch (result.status) {
      case 'not_found':
        return { status: 'not_found' };
      case 'has_open_borrows':
        return { status: 'has_open_borrows', openTransactions: result.open_transactions };
      case 'archived': {
        const borrower = await this.findById(id);
        if (!borrower) return { status: 'not_found' };

        logger.info('Borrower archived', { id });
        return { status: 'archived', borrower };
      }
    }
  }

  async restore(id: number): Promise<Borrower | null> {
    const { data, error } = await this.client
      .from('borrowers')
      .update({ archived_at: null, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select(BORROWER_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null;
      logger.error('Failed to restore borrower', { id, error: error.message });
      throw new Error(`Failed to restore borrower: ${error.message}`);
    }

    logger.info('Borrower restored', { id });
    return this.mapToBorrower(borrowerRowSchema.parse(data));
  }

  private async findOne(column: 'id' | 'rfid', value: number | string): Promise<Borrower | null> {
    const { data, error } = await this.client
      .from('borrowers')
      .select(BORROWER_COLUMNS)
      .eq(column, value)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find borrower', { [column]: value, error: error.message });
      throw new Error(`Failed to find borrower: ${error.message}`);
    }

    return this.mapToBorrower(borrowerRowSchema.parse(data));
  }

  private mapToBorrower(row: BorrowerRow): Borrower {
    return {
      id: row.id,
      rfid: row.rfid,
      borrowerCode: row.borrower_code,
      firstName: row.first_name,
      lastName: row.last_name,
      department: row.department,
      course: row.course,
      role: row.role,
      email: row.email,
      archivedAt: row.archived_at ? new Date(row.archived_at) : null,
      createdAt: new Date(row.created_at),
    };
  }
}
