/**
 * Item (inventory catalog) domain types
 */

export enum AvailabilityStatus {
  AVAILABLE = 'Available',
  UNAVAILABLE = 'Unavailable',
}

export interface Item {
  id: number;
  name: string;
  category: string | null;
  totalQuantity: number;
  borrowedQuantity: number;
  availableQuantity: number;
  availabilityStatus: AvailabilityStatus;
  archivedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateItemInput {
  name: string;
  category?: string | null;
  totalQuantity: number;
}

export interface UpdateItemInput {
  name?: string;
  category?: string | null;
  totalQuantity?: number;
}

export interface ItemFilters {
  category?: string;
  archived: boolean;
}

/**
 * Availability is derived from the ledger pair, never stored independently
 */
export function deriveAvailability(totalQuantity: number, borrowedQuantity: number): AvailabilityStatus {
  return borrowedQuantity < totalQuantity ? AvailabilityStatus.AVAILABLE : AvailabilityStatus.UNAVAILABLE;
}
