/**
 * Pending-return staging types
 */

import type { ReturnClaim, ReturnReceipt } from './return.types';

export enum PendingReturnStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  COMPLETED = 'completed',
  DECLINED = 'declined',
}

export interface PendingReturn {
  id: number;
  borrowerId: number;
  referenceTransactionId: number | null;
  claims: ReturnClaim[];
  status: PendingReturnStatus;
  submittedByAdminId: number | null;
  createdAt: Date;
}

export interface CreatePendingReturnParams {
  borrowerId: number;
  referenceTransactionId: number | null;
  claims: ReturnClaim[];
  submittedByAdminId: number | null;
}

// Kiosk submissions either wait for approval or are applied right away
export type KioskReturnOutcome =
  | { mode: 'staged'; pendingReturn: PendingReturn }
  | { mode: 'applied'; receipt: ReturnReceipt };

export interface PendingReturnDecision {
  pendingReturn: PendingReturn;
  receipt?: ReturnReceipt;
}
