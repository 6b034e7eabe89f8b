import type {
  IBorrowerRepository,
  IPendingReturnRepository,
  ITransactionRepository,
} from '../repositories/interfaces';
import type { StaffContext } from '../types/admin.types';
import {
  KioskReturnOutcome,
  PendingReturn,
  PendingReturnDecision,
  PendingReturnStatus,
} from '../types/pending-return.types';
import type { ReturnClaimInput } from '../types/return.types';
import { AppError, ErrorCode } from '../types/error.types';
import { ReturnService } from './return.service';
import { normalizeClaims } from './return-reconciler';
import { logger } from '../config/logger';

export interface PendingReturnOptions {
  enabled: boolean;
}

export interface KioskReturnInput {
  borrowerRfid: string;
  claims: ReturnClaimInput[];
}

/**
 * Pending Return Service
 *
 * Lifecycle: pending -> completed (approve) | declined (decline).
 * The staging row is deleted by whichever decision gets to it first, which is
 * what keeps a claim from being applied twice.
 */
export class PendingReturnService {
  constructor(
    private pendingReturnRepo: IPendingReturnRepository,
    private borrowerRepo: IBorrowerRepository,
    private transactionRepo: ITransactionRepository,
    private returnService: ReturnService,
    private options: PendingReturnOptions
  ) {}

  /**
   * Kiosk submission: staged for approval when staging is enabled, otherwise
   * reconciled on the spot
   */
  async submitKioskReturn(input: KioskReturnInput, staff: StaffContext): Promise<KioskReturnOutcome> {
    const borrower = await this.borrowerRepo.findByRfid(input.borrowerRfid);
    if (!borrower) {
      throw new AppError(ErrorCode.BORROWER_NOT_FOUND, `No borrower with RFID ${input.borrowerRfid}`, 404);
    }

    if (!this.options.enabled) {
      const receipt = await this.returnService.submitReturn(
        { borrowerId: borrower.id, claims: input.claims },
        staff
      );
      return { mode: 'applied', receipt };
    }

    const { claims, skipped } = normalizeClaims(input.claims);
    if (claims.length === 0) {
      throw new AppError(ErrorCode.NO_ITEMS_RETURNED, 'No items were returned', 422, { skipped });
    }

    const open = await this.transactionRepo.findOpenByBorrower(borrower.id);
    const pendingReturn = await this.pendingReturnRepo.create({
      borrowerId: borrower.id,
      referenceTransactionId: open[0]?.id ?? null,
      claims,
      submittedByAdminId: staff.adminId,
    });

    logger.info('Return staged for approval', {
      pendingReturnId: pendingReturn.id,
      borrowerId: borrower.id,
      claims: claims.length,
    });

    return { mode: 'staged', pendingReturn };
  }

  async listPendingReturns(): Promise<PendingReturn[]> {
    return this.pendingReturnRepo.list();
  }

  async getPendingReturn(id: number): Promise<PendingReturn> {
    const pending = await this.pendingReturnRepo.findById(id);

    if (!pending) {
      throw new AppError(ErrorCode.PENDING_RETURN_NOT_FOUND, `Pending return with ID ${id} not found`, 404);
    }

    return pending;
  }

  /**
   * Approve: run the reconciler on the stored claims and consume the row
   * in one storage transaction. A second approval gets PENDING_RETURN_NOT_FOUND.
   */
  async approve(id: number, staff: StaffContext): Promise<PendingReturnDecision> {
    const pending = await this.getPendingReturn(id);
    const receipt = await this.returnService.applyPendingReturn(pending, staff);

    logger.info('Pending return completed', { pendingReturnId: id, adminId: staff.adminId });

    return {
      pendingReturn: { ...pending, status: PendingReturnStatus.COMPLETED },
      receipt,
    };
  }

  /**
   * Decline: discard the claim without touching transactions or items
   */
  async decline(id: number, staff: StaffContext): Promise<PendingReturnDecision> {
    const declined = await this.pendingReturnRepo.decline(id);

    if (!declined) {
      throw new AppError(ErrorCode.PENDING_RETURN_NOT_FOUND, `Pending return with ID ${id} not found`, 404);
    }

    logger.info('Pending return declined by staff', { pendingReturnId: id, adminId: staff.adminId });
    return { pendingReturn: declined };
  }
}
