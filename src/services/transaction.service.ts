import type {
  IAdminRepository,
  IBorrowerRepository,
  ITransactionRepository,
  TransactionPage,
} from '../repositories/interfaces';
import type { PaginationParams } from '../types/api.types';
import type { BorrowTransaction, TransactionFilters } from '../types/transaction.types';
import { AppError, ErrorCode } from '../types/error.types';
import { fullName } from '../types/borrower.types';
import { SlipRenderer } from './slip.service';
import { parseReferenceNumber } from '../utils/reference-number';
import { logger } from '../config/logger';

/**
 * Transaction Service
 *
 * Read side of borrowing history
 */
export class TransactionService {
  constructor(
    private transactionRepo: ITransactionRepository,
    private borrowerRepo: IBorrowerRepository,
    private adminRepo: IAdminRepository,
    private slipRenderer: SlipRenderer
  ) {}

  async listTransactions(filters: TransactionFilters, page: PaginationParams): Promise<TransactionPage> {
    logger.debug('Listing transactions', { filters, page });
    return this.transactionRepo.list(filters, page);
  }

  /**
   * Look up by id or by zero-padded reference number
   */
  async getTransaction(reference: string): Promise<BorrowTransaction> {
    const id = parseReferenceNumber(reference);
    const transaction = id === null ? null : await this.transactionRepo.findById(id);

    if (!transaction) {
      throw new AppError(ErrorCode.TRANSACTION_NOT_FOUND, `Transaction ${reference} not found`, 404);
    }

    return transaction;
  }

  /**
   * Borrow slip for a transaction and the lines issued together with it
   */
  async renderBorrowSlip(reference: string): Promise<{ referenceNumber: string; pdf: Buffer }> {
    const transaction = await this.getTransaction(reference);

    const borrower = await this.borrowerRepo.findById(transaction.borrowerId);
    if (!borrower) {
      throw new AppError(
        ErrorCode.BORROWER_NOT_FOUND,
        `Borrower with ID ${transaction.borrowerId} not found`,
        404
      );
    }

    const instructor =
      transaction.instructorId !== null ? await this.borrowerRepo.findById(transaction.instructorId) : null;
    const admin =
      transaction.issuedByAdminId !== null ? await this.adminRepo.findById(transaction.issuedByAdminId) : null;

    const lines = await this.siblingLines(transaction);
    const first = lines[0] ?? transaction;

    const pdf = await this.slipRenderer.renderBorrowSlip({
      referenceNumber: first.referenceNumber,
      borrower,
      instructor,
      subject: transaction.subject,
      room: transaction.room,
      issuedBy: admin ? fullName(admin) : null,
      transactions: lines,
    });

    return { referenceNumber: first.referenceNumber, pdf };
  }

  // Lines of one borrow event share borrower, issuing staff and commit timestamp
  private async siblingLines(transaction: BorrowTransaction): Promise<BorrowTransaction[]> {
    const page = await this.transactionRepo.list(
      {
        borrowerId: transaction.borrowerId,
        from: transaction.borrowedAt,
        to: new Date(transaction.borrowedAt.getTime() + 1),
      },
      { limit: 100, offset: 0 }
    );

    const lines = page.rows
      .filter((row) => row.issuedByAdminId === transaction.issuedByAdminId)
      .sort((a, b) => a.id - b.id);

    return lines.length > 0 ? lines : [transaction];
  }
}
