import type { IItemRepository } from '../repositories/interfaces';
import { CreateItemInput, Item, ItemFilters, UpdateItemInput } from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Item Service
 *
 * Business logic for the equipment catalog
 */
export class ItemService {
  constructor(private itemRepo: IItemRepository) {}

  /**
   * Create a new item
   */
  async createItem(input: CreateItemInput): Promise<Item> {
    logger.info('Creating item', { name: input.name, totalQuantity: input.totalQuantity });

    const item = await this.itemRepo.create(input);

    logger.info('Item created successfully', { itemId: item.id });
    return item;
  }

  async listItems(filters: ItemFilters): Promise<Item[]> {
    logger.debug('Listing items', filters);
    return this.itemRepo.list(filters);
  }

  /**
   * Get item by ID with its availability
   */
  async getItem(id: number): Promise<Item> {
    logger.debug('Getting item', { id });

    const item = await this.itemRepo.findById(id);

    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
    }

    return item;
  }

  /**
   * Update catalog fields
   *
   * Business rules:
   * - total quantity may not drop below what is currently borrowed
   */
  async updateItem(id: number, input: UpdateItemInput): Promise<Item> {
    logger.info('Updating item', { id, ...input });

    const existing = await this.getItem(id);

    if (input.totalQuantity !== undefined && input.totalQuantity < existing.borrowedQuantity) {
      throw new AppError(
        ErrorCode.QUANTITY_BELOW_BORROWED,
        `Cannot set total quantity to ${input.totalQuantity}. ${existing.borrowedQuantity} units are borrowed.`,
        409,
        { requested: input.totalQuantity, borrowed: existing.borrowedQuantity }
      );
    }

    const updated = await this.itemRepo.update(id, input);

    if (!updated) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
    }

    logger.info('Item updated', { id });
    return updated;
  }

  /**
   * Archive an item (idempotent)
   *
   * Business rules:
   * - items with units still out cannot be archived
   * - archiving an archived item returns it unchanged
   */
  async archiveItem(id: number): Promise<Item> {
    logger.info('Archiving item', { id });

    const existing = await this.getItem(id);

    if (existing.archivedAt) {
      logger.debug('Item already archived', { id });
      return existing;
    }

    const archived = existing.borrowedQuantity === 0 ? await this.itemRepo.archive(id) : null;

    if (!archived) {
      // Either borrowed already, or a borrow landed between the read and the guarded update
      const current = await this.getItem(id);
      throw new AppError(
        ErrorCode.ITEM_HAS_OPEN_BORROWS,
        `Cannot archive item with ${current.borrowedQuantity} units still borrowed`,
        409,
        { borrowed: current.borrowedQuantity }
      );
    }

    return archived;
  }

  async restoreItem(id: number): Promise<Item> {
    logger.info('Restoring item', { id });

    const restored = await this.itemRepo.restore(id);

    if (!restored) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
    }

    return restored;
  }
}
