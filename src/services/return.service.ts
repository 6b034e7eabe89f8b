import type { IBorrowerRepository, ITransactionRepository } from '../repositories/interfaces';
import { Borrower, fullName } from '../types/borrower.types';
import type { StaffContext } from '../types/admin.types';
import type { PendingReturn } from '../types/pending-return.types';
import type {
  OverReturnPolicy,
  ReturnClaim,
  ReturnClaimInput,
  ReturnReceipt,
  SkippedClaim,
} from '../types/return.types';
import { AppError, ErrorCode } from '../types/error.types';
import { normalizeClaims, planReturn } from './return-reconciler';
import { NotificationDispatcher } from './notification.service';
import { SlipRenderer } from './slip.service';
import { formatReferenceNumber } from '../utils/reference-number';
import { escapeHtml } from '../utils/html';
import { logger } from '../config/logger';

export interface ReturnServiceOptions {
  overReturnPolicy: OverReturnPolicy;
  now?: () => Date;
}

export interface SubmitReturnInput {
  borrowerId: number;
  claims: ReturnClaimInput[];
}

/**
 * Return Service
 *
 * Runs the reconciler for a borrower's return claims and commits the result.
 */
export class ReturnService {
  private now: () => Date;

  constructor(
    private borrowerRepo: IBorrowerRepository,
    private transactionRepo: ITransactionRepository,
    private dispatcher: NotificationDispatcher,
    private slipRenderer: SlipRenderer,
    private options: ReturnServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reconcile a return submission immediately
   *
   * Claims with a quantity that is not a positive whole number are skipped
   * and listed in the receipt.
   */
  async submitReturn(input: SubmitReturnInput, staff: StaffContext): Promise<ReturnReceipt> {
    logger.info('Processing return', {
      borrowerId: input.borrowerId,
      claims: input.claims.length,
      adminId: staff.adminId,
    });

    const borrower = await this.requireBorrower(input.borrowerId);
    const { claims, skipped } = normalizeClaims(input.claims);

    return this.reconcile(borrower, claims, skipped, staff);
  }

  /**
   * Reconcile a staged return; consuming the staging row is part of the same
   * storage transaction
   */
  async applyPendingReturn(pending: PendingReturn, staff: StaffContext): Promise<ReturnReceipt> {
    logger.info('Approving pending return', { pendingReturnId: pending.id, adminId: staff.adminId });

    const borrower = await this.requireBorrower(pending.borrowerId);
    return this.reconcile(borrower, pending.claims, [], staff, pending.id);
  }

  /**
   * Concurrency approach:
   * the plan is computed from a read of the open rows, then applied by
   * apply_return_atomic with guarded updates under the item row locks. If a
   * concurrent return consumed a balance in between, the guard fails, the
   * whole submission rolls back and the caller gets RETURN_CONFLICT.
   */
  private async reconcile(
    borrower: Borrower,
    claims: ReturnClaim[],
    skipped: SkippedClaim[],
    staff: StaffContext,
    pendingReturnId?: number
  ): Promise<ReturnReceipt> {
    if (claims.length === 0) {
      throw new AppError(ErrorCode.NO_ITEMS_RETURNED, 'No items were returned', 422, { skipped });
    }

    const open = await this.transactionRepo.findOpenByBorrower(borrower.id);
    const plan = planReturn(claims, open);

    if (plan.overReturns.length > 0 && this.options.overReturnPolicy === 'reject') {
      throw new AppError(
        ErrorCode.OVER_RETURN,
        'Returned quantity exceeds what the borrower has outstanding',
        409,
        {
          items: plan.overReturns.map((entry) => ({
            itemName: entry.itemName,
            claimed: entry.claimed,
            outstanding: entry.credited,
          })),
        }
      );
    }

    if (plan.allocations.length === 0) {
      throw new AppError(ErrorCode.NO_ITEMS_RETURNED, 'No items were returned', 422, {
        skipped,
        unmatched: plan.overReturns.map((entry) => entry.itemName),
      });
    }

    const result = await this.transactionRepo.applyReturnAtomic({
      allocations: plan.allocations,
      adminId: staff.adminId,
      pendingReturnId,
    });

    if (result.status === 'conflict') {
      throw new AppError(
        ErrorCode.RETURN_CONFLICT,
        'Another return for this borrower was processed at the same time. Review and resubmit.',
        409,
        { transactionId: result.transactionId }
      );
    }

    if (result.status === 'pending_return_missing') {
      throw new AppError(
        ErrorCode.PENDING_RETURN_NOT_FOUND,
        `Pending return with ID ${pendingReturnId ?? ''} not found`,
        404
      );
    }

    const transactionIds = plan.allocations.map((allocation) => allocation.transactionId);
    const receipt: ReturnReceipt = {
      referenceNumber: formatReferenceNumber(Math.min(...transactionIds)),
      borrowerId: borrower.id,
      borrowerName: fullName(borrower),
      borrowerCode: borrower.borrowerCode,
      department: borrower.department,
      course: borrower.course,
      items: plan.credited,
      skipped,
      truncated: plan.overReturns,
      transactionIds,
      returnedAt: this.now(),
      processedBy: staff.name,
    };

    logger.info('Return processed successfully', {
      borrowerId: borrower.id,
      referenceNumber: receipt.referenceNumber,
      items: receipt.items.length,
      truncated: receipt.truncated.length,
      itemIds: result.itemIds,
    });

    this.notifyBorrower(borrower, receipt);
    return receipt;
  }

  private async requireBorrower(id: number): Promise<Borrower> {
    const borrower = await this.borrowerRepo.findById(id);

    if (!borrower) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `Borrower with ID ${id} not found`, 404);
    }

    return borrower;
  }

  private notifyBorrower(borrower: Borrower, receipt: ReturnReceipt): void {
    const email = borrower.email;
    if (!email) return;

    this.dispatcher.enqueue(`return slip ${receipt.referenceNumber}`, async () => {
      const pdf = await this.slipRenderer.renderReturnSlip(receipt);
      const rows = receipt.items
        .map((item) => `<li>${escapeHtml(item.itemName)} &times; ${item.quantity}</li>`)
        .join('');

      return {
        to: email,
        subject: `Return slip ${receipt.referenceNumber}`,
        html: `<p>Hi ${escapeHtml(borrower.firstName)},</p><p>We received:</p><ul>${rows}</ul><p>Your slip is attached.</p>`,
        attachments: [{ filename: `return-slip-${receipt.referenceNumber}.pdf`, content: pdf }],
      };
    });
  }
}
