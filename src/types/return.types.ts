/**
 * Return claim and receipt types
 */

// A claim as submitted: quantity may be anything the form sent
export interface ReturnClaimInput {
  itemName: string;
  quantity: unknown;
  condition?: string | null;
}

// A claim that passed normalization
export interface ReturnClaim {
  itemName: string;
  quantity: number;
  condition: string | null;
}

export interface SkippedClaim {
  index: number;
  itemName: string;
  reason: string;
}

export interface CreditedItem {
  itemName: string;
  quantity: number;
  condition: string | null;
}

export interface TruncatedClaim {
  itemName: string;
  claimed: number;
  credited: number;
}

export type OverReturnPolicy = 'reject' | 'truncate';

export interface ReturnReceipt {
  referenceNumber: string;
  borrowerId: number;
  borrowerName: string;
  borrowerCode: string;
  department: string | null;
  course: string | null;
  items: CreditedItem[];
  skipped: SkippedClaim[];
  truncated: TruncatedClaim[];
  transactionIds: number[];
  returnedAt: Date;
  processedBy: string | null;
}
