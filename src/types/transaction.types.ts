/**
 * Borrow transaction domain types
 *
 * One transaction is one line of a borrow event: a single item, the quantity
 * taken, and how much of it has come back so far.
 */

export enum TransactionStatus {
  BORROWED = 'borrowed',
  PARTIAL = 'partial',
  RETURNED = 'returned',
}

export interface BorrowTransaction {
  id: number;
  referenceNumber: string;
  borrowerId: number;
  itemId: number;
  itemName: string | null;
  issuedByAdminId: number | null;
  instructorId: number | null;
  subject: string | null;
  room: string | null;
  borrowedQty: number;
  returnedQty: number;
  outstandingQty: number;
  status: TransactionStatus;
  conditionBefore: string | null;
  conditionAfter: string | null;
  borrowedAt: Date;
  returnedAt: Date | null;
  returnedByAdminId: number | null;
  idempotencyKey: string | null;
}

// Issue request (service input)
export interface IssueBorrowLineInput {
  itemId: number;
  quantity: number;
  conditionBefore?: string | null;
}

export interface IssueBorrowInput {
  borrowerRfid: string;
  instructorRfid: string;
  subject: string;
  room: string;
  lines: IssueBorrowLineInput[];
}

// Issue params handed to the atomic storage operation
export interface IssueBorrowLineParams {
  itemId: number;
  quantity: number;
  conditionBefore: string | null;
  idempotencyKey: string;
}

export interface IssueBorrowParams {
  borrowerId: number;
  instructorId: number;
  adminId: number | null;
  subject: string;
  room: string;
  lines: IssueBorrowLineParams[];
}

export type IssueBorrowResult =
  | { status: 'issued'; transactionIds: number[]; replayedCount: number }
  | { status: 'insufficient_stock'; itemId: number; available: number }
  | { status: 'item_unavailable'; itemId: number }
  | { status: 'replay_mismatch'; itemId: number; recordedQuantity: number }
  | { status: 'borrower_unavailable' };

export interface IssueBorrowOutcome {
  referenceNumber: string;
  replayed: boolean;
  transactions: BorrowTransaction[];
}

// Return allocation applied atomically
export interface ReturnAllocationParams {
  transactionId: number;
  credited: number;
  conditionAfter: string | null;
}

export interface ApplyReturnParams {
  allocations: ReturnAllocationParams[];
  adminId: number | null;
  pendingReturnId?: number;
}

export type ApplyReturnResult =
  | { status: 'applied'; itemIds: number[] }
  | { status: 'conflict'; transactionId: number | null }
  | { status: 'pending_return_missing' };

export interface TransactionFilters {
  borrowerId?: number;
  itemId?: number;
  status?: TransactionStatus;
  from?: Date;
  to?: Date;
}

export function deriveTransactionStatus(borrowedQty: number, returnedQty: number): TransactionStatus {
  if (returnedQty <= 0) return TransactionStatus.BORROWED;
  if (returnedQty < borrowedQty) return TransactionStatus.PARTIAL;
  return TransactionStatus.RETURNED;
}
