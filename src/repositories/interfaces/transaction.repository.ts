import type { PaginationParams } from '../../types/api.types';
import type { ReportRange } from '../../types/report.types';
import type {
  ApplyReturnParams,
  ApplyReturnResult,
  BorrowTransaction,
  IssueBorrowParams,
  IssueBorrowResult,
  TransactionFilters,
} from '../../types/transaction.types';

export interface TransactionPage {
  rows: BorrowTransaction[];
  total: number;
}

export interface ITransactionRepository {
  /**
   * Issue every line or none. Item rows are locked for the duration, lines whose
   * idempotency key already exists are replayed instead of inserted.
   */
  issueAtomic(params: IssueBorrowParams): Promise<IssueBorrowResult>;

  /**
   * Apply return allocations and recompute the touched items' ledgers in one
   * storage transaction. When a pending return id is given it is consumed first.
   */
  applyReturnAtomic(params: ApplyReturnParams): Promise<ApplyReturnResult>;

  findById(id: number): Promise<BorrowTransaction | null>;
  findByIds(ids: number[]): Promise<BorrowTransaction[]>;

  /** Open rows for a borrower, oldest first */
  findOpenByBorrower(borrowerId: number): Promise<BorrowTransaction[]>;

  list(filters: TransactionFilters, page: PaginationParams): Promise<TransactionPage>;
  findBorrowedInRange(range: ReportRange): Promise<BorrowTransaction[]>;
  findOpen(): Promise<BorrowTransaction[]>;
  findReturned(): Promise<BorrowTransaction[]>;
}
