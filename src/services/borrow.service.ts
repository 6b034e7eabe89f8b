import type {
  IBorrowerRepository,
  IItemRepository,
  ITransactionRepository,
} from '../repositories/interfaces';
import { Borrower, BorrowerRole } from '../types/borrower.types';
import type { StaffContext } from '../types/admin.types';
import type {
  IssueBorrowInput,
  IssueBorrowOutcome,
  IssueBorrowParams,
} from '../types/transaction.types';
import { AppError, ErrorCode } from '../types/error.types';
import { NotificationDispatcher } from './notification.service';
import { SlipRenderer } from './slip.service';
import { borrowLineIdempotencyKey } from '../utils/idempotency';
import { formatReferenceNumber } from '../utils/reference-number';
import { escapeHtml } from '../utils/html';
import { logger } from '../config/logger';

export interface BorrowServiceOptions {
  dedupeWindowMs: number;
  now?: () => Date;
}

/**
 * Borrow Service
 *
 * Issues equipment against an instructor's authorization.
 */
export class BorrowService {
  private now: () => Date;

  constructor(
    private borrowerRepo: IBorrowerRepository,
    private itemRepo: IItemRepository,
    private transactionRepo: ITransactionRepository,
    private dispatcher: NotificationDispatcher,
    private slipRenderer: SlipRenderer,
    private options: BorrowServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Issue a borrow with concurrency guarantees
   *
   * Concurrency approach:
   * issue_borrow_atomic locks every requested item row (SELECT ... FOR UPDATE,
   * id order), checks stock inside the lock and inserts all lines or none.
   * Two desks issuing the last unit serialize on the lock; the second sees
   * the updated borrowed_quantity and gets INSUFFICIENT_STOCK.
   *
   * Duplicate scans:
   * each line carries a key derived from (borrower, item, dedupe window).
   * A resubmission inside the window returns the recorded rows with
   * replayed = true instead of issuing again. A rescan with a different
   * quantity is refused with DUPLICATE_SCAN_MISMATCH.
   *
   * Archiving a borrower takes the borrower row lock exclusively, and the
   * issue function re-checks archived_at under a shared lock.
   */
  async issue(input: IssueBorrowInput, staff: StaffContext): Promise<IssueBorrowOutcome> {
    logger.info('Issuing borrow', {
      borrowerRfid: input.borrowerRfid,
      lines: input.lines.length,
      adminId: staff.adminId,
    });

    const borrower = await this.borrowerRepo.findByRfid(input.borrowerRfid);
    if (!borrower || borrower.archivedAt) {
      throw new AppError(
        ErrorCode.BORROWER_NOT_FOUND,
        `No active borrower with RFID ${input.borrowerRfid}`,
        404
      );
    }

    const instructor = await this.borrowerRepo.findByRfid(input.instructorRfid);
    if (!instructor || instructor.archivedAt || instructor.role !== BorrowerRole.INSTRUCTOR) {
      throw new AppError(
        ErrorCode.INVALID_INSTRUCTOR,
        'The authorizing badge does not belong to an active instructor',
        422,
        { instructorRfid: input.instructorRfid }
      );
    }

    const requestedIds = input.lines.map((line) => line.itemId);
    const items = await this.itemRepo.findByIds(requestedIds);
    const itemsById = new Map(items.map((item) => [item.id, item]));

    for (const itemId of requestedIds) {
      const item = itemsById.get(itemId);
      if (!item) {
        throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${itemId} not found`, 404);
      }
      if (item.archivedAt) {
        throw new AppError(ErrorCode.ITEM_ARCHIVED, `Item "${item.name}" is archived`, 409, { itemId });
      }
    }

    const issuedAt = this.now();
    const params: IssueBorrowParams = {
      borrowerId: borrower.id,
      instructorId: instructor.id,
      adminId: staff.adminId,
      subject: input.subject,
      room: input.room,
      lines: input.lines.map((line) => ({
        itemId: line.itemId,
        quantity: line.quantity,
        conditionBefore: line.conditionBefore ?? null,
        idempotencyKey: borrowLineIdempotencyKey(
          borrower.id,
          line.itemId,
          issuedAt,
          this.options.dedupeWindowMs
        ),
      })),
    };

    // Atomic issue (with row locking)
    const result = await this.transactionRepo.issueAtomic(params);

    if (result.status === 'insufficient_stock') {
      const line = input.lines.find((l) => l.itemId === result.itemId);
      const item = itemsById.get(result.itemId);

      throw new AppError(
        ErrorCode.INSUFFICIENT_STOCK,
        `Cannot borrow ${line?.quantity ?? 0} of "${item?.name ?? result.itemId}". Only ${result.available} available.`,
        409,
        {
          itemId: result.itemId,
          requested: line?.quantity ?? 0,
          available: result.available,
        }
      );
    }

    if (result.status === 'item_unavailable') {
      // Archived between the pre-check and the lock
      throw new AppError(ErrorCode.ITEM_ARCHIVED, `Item with ID ${result.itemId} is not available`, 409, {
        itemId: result.itemId,
      });
    }

    if (result.status === 'replay_mismatch') {
      const item = itemsById.get(result.itemId);
      const requested = input.lines.find((l) => l.itemId === result.itemId)?.quantity ?? 0;

      throw new AppError(
        ErrorCode.DUPLICATE_SCAN_MISMATCH,
        `"${item?.name ?? result.itemId}" was just issued to this borrower with quantity ${result.recordedQuantity}. Wait for the scan window to pass before issuing a different quantity.`,
        409,
        { itemId: result.itemId, requested, recorded: result.recordedQuantity }
      );
    }

    if (result.status === 'borrower_unavailable') {
      // Archived between the lookup and the lock
      throw new AppError(
        ErrorCode.BORROWER_NOT_FOUND,
        `No active borrower with RFID ${input.borrowerRfid}`,
        404
      );
    }

    const transactions = await this.transactionRepo.findByIds(result.transactionIds);
    const firstId = Math.min(...result.transactionIds);
    const replayed = result.replayedCount === input.lines.length;

    const outcome: IssueBorrowOutcome = {
      referenceNumber: formatReferenceNumber(firstId),
      replayed,
      transactions,
    };

    if (replayed) {
      logger.info('Duplicate borrow scan replayed', {
        borrowerId: borrower.id,
        referenceNumber: outcome.referenceNumber,
      });
      return outcome;
    }

    logger.info('Borrow issued successfully', {
      borrowerId: borrower.id,
      referenceNumber: outcome.referenceNumber,
      transactionIds: result.transactionIds,
      replayedLines: result.replayedCount,
    });

    this.notifyBorrower(borrower, instructor, staff, outcome, input);
    return outcome;
  }

  private notifyBorrower(
    borrower: Borrower,
    instructor: Borrower,
    staff: StaffContext,
    outcome: IssueBorrowOutcome,
    input: IssueBorrowInput
  ): void {
    const email = borrower.email;
    if (!email) return;

    this.dispatcher.enqueue(`borrow slip ${outcome.referenceNumber}`, async () => {
      const pdf = await this.slipRenderer.renderBorrowSlip({
        referenceNumber: outcome.referenceNumber,
        borrower,
        instructor,
        subject: input.subject,
        room: input.room,
        issuedBy: staff.name,
        transactions: outcome.transactions,
      });

      const rows = outcome.transactions
        .map((t) => `<li>${escapeHtml(t.itemName ?? `#${t.itemId}`)} &times; ${t.borrowedQty}</li>`)
        .join('');

      return {
        to: email,
        subject: `Borrower's slip ${outcome.referenceNumber}`,
        html: `<p>Hi ${escapeHtml(borrower.firstName)},</p><p>You borrowed:</p><ul>${rows}</ul><p>Your slip is attached.</p>`,
        attachments: [{ filename: `borrow-slip-${outcome.referenceNumber}.pdf`, content: pdf }],
      };
    });
  }
}
