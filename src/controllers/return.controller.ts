import { Request, Response } from 'express';
import { ReturnService } from '../services/return.service';
import { PendingReturnService } from '../services/pending-return.service';
import type { ReturnClaimInput } from '../types/return.types';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireStaff } from '../middleware/auth.middleware';
import {
  kioskReturnSchema,
  pendingReturnIdSchema,
  submitReturnSchema,
} from '../validators/return.validator';

const toClaims = (
  items: Array<{ item_name: string; quantity: unknown; condition?: string | null | undefined }>
): ReturnClaimInput[] =>
  items.map((item) => ({
    itemName: item.item_name,
    quantity: item.quantity,
    condition: item.condition ?? null,
  }));

/**
 * Return Controller
 *
 * Staff returns, kiosk returns and the pending-return approval queue
 */
export class ReturnController {
  constructor(
    private returnService: ReturnService,
    private pendingReturnService: PendingReturnService
  ) {}

  /**
   * POST /v1/returns
   * Staff-operated return, always applied immediately
   */
  submitReturn = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);
    const { body } = await parseRequest(submitReturnSchema, req);

    const receipt = await this.returnService.submitReturn(
      { borrowerId: body.borrower_id, claims: toClaims(body.items) },
      staff
    );

    res.status(200).json(createSuccessResponse(receipt, 'Return recorded'));
  });

  /**
   * POST /v1/kiosk/returns
   * Staged for approval when pending returns are enabled
   */
  submitKioskReturn = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);
    const { body } = await parseRequest(kioskReturnSchema, req);

    const outcome = await this.pendingReturnService.submitKioskReturn(
      { borrowerRfid: body.borrower_rfid, claims: toClaims(body.items) },
      staff
    );

    if (outcome.mode === 'staged') {
      res.status(202).json(createSuccessResponse(outcome, 'Return submitted for approval'));
      return;
    }

    res.status(200).json(createSuccessResponse(outcome, 'Return recorded'));
  });

  /**
   * GET /v1/pending-returns
   */
  listPendingReturns = asyncHandler(async (_req: Request, res: Response) => {
    const pending = await this.pendingReturnService.listPendingReturns();

    res.status(200).json(createSuccessResponse(pending));
  });

  /**
   * GET /v1/pending-returns/:id
   */
  getPendingReturn = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(pendingReturnIdSchema, req);

    const pending = await this.pendingReturnService.getPendingReturn(params.id);

    res.status(200).json(createSuccessResponse(pending));
  });

  /**
   * POST /v1/pending-returns/:id/approve
   */
  approvePendingReturn = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);
    const { params } = await parseRequest(pendingReturnIdSchema, req);

    const decision = await this.pendingReturnService.approve(params.id, staff);

    res.status(200).json(createSuccessResponse(decision, 'Pending return approved'));
  });

  /**
   * POST /v1/pending-returns/:id/decline
   */
  declinePendingReturn = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);
    const { params } = await parseRequest(pendingReturnIdSchema, req);

    const decision = await this.pendingReturnService.decline(params.id, staff);

    res.status(200).json(createSuccessResponse(decision, 'Pending return declined'));
  });
}
