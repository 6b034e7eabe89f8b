/**
 * Usage report types
 */

export interface ReportRange {
  from?: Date;
  to?: Date;
}

export interface TopBorrowedItem {
  itemId: number;
  itemName: string;
  category: string | null;
  totalBorrowed: number;
}

export interface OutstandingItem {
  itemId: number;
  itemName: string;
  category: string | null;
  outstanding: number;
}

export interface ItemCondition {
  itemId: number;
  itemName: string;
  condition: string | null;
}

export interface UsageReport {
  generatedAt: Date;
  range: ReportRange;
  totalBorrowLines: number;
  unitsBorrowedInRange: number;
  unitsCurrentlyOut: number;
  unitsAvailable: number;
  unavailableItemCount: number;
  stockByStatus: Record<string, number>;
  topBorrowedItems: TopBorrowedItem[];
  outstandingItems: OutstandingItem[];
  latestConditions: ItemCondition[];
}
