import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  AvailabilityStatus,
  CreateItemInput,
  Item,
  ItemFilters,
  UpdateItemInput,
} from '../types/item.types';
import type { IItemRepository } from './interfaces';
import { fetchAllPages } from '../utils/fetch-all-pages';
import { logger } from '../config/logger';

const ITEM_COLUMNS =
  'id, name, category, total_quantity, borrowed_quantity, availability_status, archived_at, created_at, updated_at';

const itemRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  category: z.string().nullable(),
  total_quantity: z.number().int(),
  borrowed_quantity: z.number().int(),
  availability_status: z.nativeEnum(AvailabilityStatus),
  archived_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

type ItemRow = z.infer<typeof itemRowSchema>;

/**
 * Item Repository
 *
 * Handles all database operations for the items table. The ledger pair
 * (total_quantity, borrowed_quantity) is only written here by catalog edits;
 * borrow and return move borrowed_quantity inside the atomic functions.
 */
export class ItemRepository implements IItemRepository {
  constructor(private client: SupabaseClient) {}

  /**
   * Create a new item
   */
  async create(input: CreateItemInput): Promise<Item> {
    logger.debug('Creating item', { name: input.name, totalQuantity: input.totalQuantity });

    const { data, error } = await this.client
      .from('items')
      .insert({
        name: input.name,
        category: input.category ?? null,
        total_quantity: input.totalQuantity,
      })
      .select(ITEM_COLUMNS)
      .single();

    if (error) {
      logger.error('Failed to create item', { error: error.message });
      throw new Error(`Failed to create item: ${error.message}`);
    }

    return this.mapToItem(itemRowSchema.parse(data));
  }

  /**
   * Find item by ID
   */
  async findById(id: number): Promise<Item | null> {
    const { data, error } = await this.client
      .from('items')
      .select(ITEM_COLUMNS)
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find item', { id, error: error.message });
      throw new Error(`Failed to find item: ${error.message}`);
    }

    return this.mapToItem(itemRowSchema.parse(data));
  }

  async findByIds(ids: number[]): Promise<Item[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.client.from('items').select(ITEM_COLUMNS).in('id', ids);

    if (error) {
      logger.error('Failed to find items', { ids, error: error.message });
      throw new Error(`Failed to find items: ${error.message}`);
    }

    return z.array(itemRowSchema).parse(data).map((row) => this.mapToItem(row));
  }

  /**
   * List the catalog, or the archive when filters.archived is set
   */
  async list(filters: ItemFilters): Promise<Item[]> {
    return fetchAllPages(async (from, to) => {
      let query = this.client
        .from('items')
        .select(ITEM_COLUMNS, { count: 'exact' })
        .order('name', { ascending: true })
        .order('id', { ascending: true });

      query = filters.archived ? query.not('archived_at', 'is', null) : query.is('archived_at', null);

      if (filters.category) {
        query = query.eq('category', filters.category);
      }

      const { data, error, count } = await query.range(from, to);

      if (error) {
        logger.error('Failed to list items', { filters, error: error.message });
        throw new Error(`Failed to list items: ${error.message}`);
      }

      return { rows: z.array(itemRowSchema).parse(data).map((row) => this.mapToItem(row)), total: count };
    });
  }

  /**
   * Update catalog fields
   *
   * The items_borrowed_within_total check constraint rejects a total below the
   * currently borrowed count, even if a borrow lands between read and write.
   */
  async update(id: number, input: UpdateItemInput): Promise<Item | null> {
    const changes: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (input.name !== undefined) changes['name'] = input.name;
    if (input.category !== undefined) changes['category'] = input.category;
    if (input.totalQuantity !== undefined) changes['total_quantity'] = input.totalQuantity;

    const { data, error } = await this.client
      .from('items')
      .update(changes)
      .eq('id', id)
      .select(ITEM_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null;
      logger.error('Failed to update item', { id, error: error.message });
      throw new Error(`Failed to update item: ${error.message}`);
    }

    return this.mapToItem(itemRowSchema.parse(data));
  }

  /**
   * Archive an item (conditional)
   *
   * Only matches while borrowed_quantity is 0. The update takes the row lock,
   * so it serializes with issue_borrow_atomic.
   */
  async archive(id: number): Promise<Item | null> {
    const now = new Date().toISOString();

    const { data, error } = await this.client
      .from('items')
      .update({ archived_at: now, updated_at: now })
      .eq('id', id)
      .eq('borrowed_quantity', 0)
      .select(ITEM_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Guard not met
      logger.error('Failed to archive item', { id, error: error.message });
      throw new Error(`Failed to archive item: ${error.message}`);
    }

    logger.info('Item archived', { id });
    return this.mapToItem(itemRowSchema.parse(data));
  }

  async restore(id: number): Promise<Item | null> {
    const { data, error } = await this.client
      .from('items')
      .update({ archived_at: null, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select(ITEM_COLUMNS)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null;
      logger.error('Failed to restore item', { id, error: error.message });
      throw new Error(`Failed to restore item: ${error.message}`);
    }

    logger.info('Item restored', { id });
    return this.mapToItem(itemRowSchema.parse(data));
  }

  /**
   * Map database row to domain model
   */
  private mapToItem(row: ItemRow): Item {
    return {
      id: row.id,
      name: row.name,
      category: row.category,
      totalQuantity: row.total_quantity,
      borrowedQuantity: row.borrowed_quantity,
      availableQuantity: row.total_quantity - row.borrowed_quantity,
      availabilityStatus: row.availability_status,
      archivedAt: row.archived_at ? new Date(row.archived_at) : null,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
