import type { CreateItemInput, Item, ItemFilters, UpdateItemInput } from '../../types/item.types';

export interface IItemRepository {
  create(input: CreateItemInput): Promise<Item>;
  findById(id: number): Promise<Item | null>;
  findByIds(ids: number[]): Promise<Item[]>;
  list(filters: ItemFilters): Promise<Item[]>;
  update(id: number, input: UpdateItemInput): Promise<Item | null>;
  /** Marks the item archived only while nothing is borrowed; null when the guard fails */
  archive(id: number): Promise<Item | null>;
  restore(id: number): Promise<Item | null>;
}
