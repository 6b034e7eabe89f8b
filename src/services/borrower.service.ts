import type {
  IBorrowerRepository,
  ITransactionRepository,
  TransactionPage,
} from '../repositories/interfaces';
import {
  Borrower,
  BorrowerFilters,
  CreateBorrowerInput,
  UpdateBorrowerInput,
} from '../types/borrower.types';
import type { BorrowTransaction } from '../types/transaction.types';
import type { PaginationParams } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

export interface OpenItemSummary {
  itemId: number;
  itemName: string;
  outstanding: number;
  transactionIds: number[];
  oldestBorrowedAt: Date;
}

/**
 * Borrower Service
 */
export class BorrowerService {
  constructor(
    private borrowerRepo: IBorrowerRepository,
    private transactionRepo: ITransactionRepository
  ) {}

  async createBorrower(input: CreateBorrowerInput): Promise<Borrower> {
    logger.info('Registering borrower', { borrowerCode: input.borrowerCode, role: input.role });

    const borrower = await this.borrowerRepo.create(input);

    logger.info('Borrower registered', { borrowerId: borrower.id });
    return borrower;
  }

  async listBorrowers(filters: BorrowerFilters): Promise<Borrower[]> {
    logger.debug('Listing borrowers', filters);
    return this.borrowerRepo.list(filters);
  }

  async getBorrower(id: number): Promise<Borrower> {
    const borrower = await this.borrowerRepo.findById(id);

    if (!borrower) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `Borrower with ID ${id} not found`, 404);
    }

    return borrower;
  }

  /**
   * Badge lookup used at the desk; archived borrowers do not scan in
   */
  async getBorrowerByRfid(rfid: string): Promise<Borrower> {
    const borrower = await this.borrowerRepo.findByRfid(rfid);

    if (!borrower || borrower.archivedAt) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `No active borrower with RFID ${rfid}`, 404);
    }

    return borrower;
  }

  async updateBorrower(id: number, input: UpdateBorrowerInput): Promise<Borrower> {
    logger.info('Updating borrower', { id });

    const updated = await this.borrowerRepo.update(id, input);

    if (!updated) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `Borrower with ID ${id} not found`, 404);
    }

    return updated;
  }

  /**
   * Archive a borrower
   *
   * Business rules:
   * - borrowers holding unreturned items cannot be archived
   */
  async archiveBorrower(id: number): Promise<Borrower> {
    logger.info('Archiving borrower', { id });

    const existing = await this.getBorrower(id);
    if (existing.archivedAt) return existing;

    const result = await this.borrowerRepo.archive(id);

    switch (result.status) {
      case 'archived':
        return result.borrower;
      case 'has_open_borrows':
        throw new AppError(
          ErrorCode.BORROWER_HAS_OPEN_BORROWS,
          `Borrower still has ${result.openTransactions} unreturned transactions`,
          409,
          { openTransactions: result.openTransactions }
        );
      case 'not_found':
        throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `Borrower with ID ${id} not found`, 404);
    }
  }

  async restoreBorrower(id: number): Promise<Borrower> {
    logger.info('Restoring borrower', { id });

    const restored = await this.borrowerRepo.restore(id);
    if (!restored) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `Borrower with ID ${id} not found`, 404);
    }

    return restored;
  }

  async listTransactions(id: number, page: PaginationParams): Promise<TransactionPage> {
    await this.getBorrower(id);
    return this.transactionRepo.list({ borrowerId: id }, page);
  }

  /**
   * What the borrower still holds, one entry per item (the return form)
   */
  async listOpenItems(id: number): Promise<OpenItemSummary[]> {
    await this.getBorrower(id);

    const open = await this.transactionRepo.findOpenByBorrower(id);
    return summarizeOpenItems(open);
  }
}

export function summarizeOpenItems(open: BorrowTransaction[]): OpenItemSummary[] {
  const byItem = new Map<number, OpenItemSummary>();

  for (const transaction of open) {
    const entry = byItem.get(transaction.itemId);

    if (entry) {
      entry.outstanding += transaction.outstandingQty;
      entry.transactionIds.push(transaction.id);
      if (transaction.borrowedAt < entry.oldestBorrowedAt) entry.oldestBorrowedAt = transaction.borrowedAt;
    } else {
      byItem.set(transaction.itemId, {
        itemId: transaction.itemId,
        itemName: transaction.itemName ?? `#${transaction.itemId}`,
        outstanding: transaction.outstandingQty,
        transactionIds: [transaction.id],
        oldestBorrowedAt: transaction.borrowedAt,
      });
    }
  }

  return [...byItem.values()];
}
