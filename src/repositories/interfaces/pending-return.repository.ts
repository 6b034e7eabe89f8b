import type { CreatePendingReturnParams, PendingReturn } from '../../types/pending-return.types';

export interface IPendingReturnRepository {
  create(params: CreatePendingReturnParams): Promise<PendingReturn>;
  findById(id: number): Promise<PendingReturn | null>;
  list(): Promise<PendingReturn[]>;
  /** Deletes the row if it still exists; null when another request already consumed it */
  decline(id: number): Promise<PendingReturn | null>;
}
