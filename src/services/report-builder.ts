import { AvailabilityStatus, Item } from '../types/item.types';
import type { BorrowTransaction } from '../types/transaction.types';
import type { ItemCondition, ReportRange, TopBorrowedItem, UsageReport } from '../types/report.types';

export interface ReportInputs {
  range: ReportRange;
  items: Item[];
  borrowedInRange: BorrowTransaction[];
  open: BorrowTransaction[];
  returned: BorrowTransaction[];
  generatedAt: Date;
  topLimit?: number;
}

const DEFAULT_TOP_LIMIT = 10;

/**
 * Build the usage report from already-loaded rows
 */
export function buildUsageReport(inputs: ReportInputs): UsageReport {
  const itemsById = new Map(inputs.items.map((item) => [item.id, item]));
  const describeItem = (itemId: number, fallbackName: string | null) => {
    const item = itemsById.get(itemId);
    return {
      itemName: item?.name ?? fallbackName ?? `#${itemId}`,
      category: item?.category ?? null,
    };
  };

  const borrowedTotals = new Map<number, number>();
  const borrowedNames = new Map<number, string | null>();
  let unitsBorrowedInRange = 0;

  for (const transaction of inputs.borrowedInRange) {
    unitsBorrowedInRange += transaction.borrowedQty;
    borrowedTotals.set(transaction.itemId, (borrowedTotals.get(transaction.itemId) ?? 0) + transaction.borrowedQty);
    borrowedNames.set(transaction.itemId, transaction.itemName);
  }

  const topBorrowedItems: TopBorrowedItem[] = [...borrowedTotals.entries()]
    .map(([itemId, totalBorrowed]) => ({
      itemId,
      ...describeItem(itemId, borrowedNames.get(itemId) ?? null),
      totalBorrowed,
    }))
    .sort((a, b) => b.totalBorrowed - a.totalBorrowed || a.itemName.localeCompare(b.itemName))
    .slice(0, inputs.topLimit ?? DEFAULT_TOP_LIMIT);

  const outstandingTotals = new Map<number, number>();
  const outstandingNames = new Map<number, string | null>();
  for (const transaction of inputs.open) {
    outstandingTotals.set(
      transaction.itemId,
      (outstandingTotals.get(transaction.itemId) ?? 0) + transaction.outstandingQty
    );
    outstandingNames.set(transaction.itemId, transaction.itemName);
  }

  const outstandingItems = [...outstandingTotals.entries()]
    .map(([itemId, outstanding]) => ({
      itemId,
      ...describeItem(itemId, outstandingNames.get(itemId) ?? null),
      outstanding,
    }))
    .sort((a, b) => b.outstanding - a.outstanding || a.itemName.localeCompare(b.itemName));

  // Rows arrive ordered by return time, so the last write per item wins
  const conditions = new Map<number, ItemCondition>();
  for (const transaction of inputs.returned) {
    if (transaction.conditionAfter === null) continue;
    conditions.set(transaction.itemId, {
      itemId: transaction.itemId,
      itemName: describeItem(transaction.itemId, transaction.itemName).itemName,
      condition: transaction.conditionAfter,
    });
  }

  const stockByStatus: Record<string, number> = {
    [AvailabilityStatus.AVAILABLE]: 0,
    [AvailabilityStatus.UNAVAILABLE]: 0,
  };
  let unitsCurrentlyOut = 0;
  let unitsAvailable = 0;

  for (const item of inputs.items) {
    unitsCurrentlyOut += item.borrowedQuantity;
    unitsAvailable += item.availableQuantity;
    stockByStatus[item.availabilityStatus] = (stockByStatus[item.availabilityStatus] ?? 0) + 1;
  }

  return {
    generatedAt: inputs.generatedAt,
    range: inputs.range,
    totalBorrowLines: inputs.borrowedInRange.length,
    unitsBorrowedInRange,
    unitsCurrentlyOut,
    unitsAvailable,
    unavailableItemCount: stockByStatus[AvailabilityStatus.UNAVAILABLE] ?? 0,
    stockByStatus,
    topBorrowedItems,
    outstandingItems,
    latestConditions: [...conditions.values()].sort((a, b) => a.itemName.localeCompare(b.itemName)),
  };
}
