import { Request, Response } from 'express';
import { BorrowService } from '../services/borrow.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireStaff } from '../middleware/auth.middleware';
import { issueBorrowSchema } from '../validators/borrow.validator';

/**
 * Borrow Controller
 */
export class BorrowController {
  constructor(private borrowService: BorrowService) {}

  /**
   * POST /v1/borrows
   * Issue equipment. A duplicate scan inside the dedupe window answers 200
   * with the recorded lines instead of 201.
   */
  issueBorrow = asyncHandler(async (req: Request, res: Response) => {
    const staff = requireStaff(req);
    const { body } = await parseRequest(issueBorrowSchema, req);

    const outcome = await this.borrowService.issue(
      {
        borrowerRfid: body.borrower_rfid,
        instructorRfid: body.instructor_rfid,
        subject: body.subject,
        room: body.room,
        lines: body.items.map((line) => ({
          itemId: line.item_id,
          quantity: line.quantity,
          conditionBefore: line.condition_before ?? null,
        })),
      },
      staff
    );

    res
      .status(outcome.replayed ? 200 : 201)
      .json(createSuccessResponse(outcome, outcome.replayed ? 'Duplicate scan, borrow already recorded' : undefined));
  });
}
