import { Request, Response } from 'express';
import { TransactionService } from '../services/transaction.service';
import { createPaginatedResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { listTransactionsSchema, transactionReferenceSchema } from '../validators/transaction.validator';

/**
 * Transaction (history) Controller
 */
export class TransactionController {
  constructor(private transactionService: TransactionService) {}

  /**
   * GET /v1/transactions
   */
  listTransactions = asyncHandler(async (req: Request, res: Response) => {
    const { query } = await parseRequest(listTransactionsSchema, req);
    const page = { limit: query.limit, offset: query.offset };

    const result = await this.transactionService.listTransactions(
      {
        ...(query.borrower_id !== undefined && { borrowerId: query.borrower_id }),
        ...(query.item_id !== undefined && { itemId: query.item_id }),
        ...(query.status && { status: query.status }),
        ...(query.from && { from: query.from }),
        ...(query.to && { to: query.to }),
      },
      page
    );

    res.status(200).json(createPaginatedResponse(result.rows, page, result.total));
  });

  /**
   * GET /v1/transactions/:reference
   */
  getTransaction = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(transactionReferenceSchema, req);

    const transaction = await this.transactionService.getTransaction(params.reference);

    res.status(200).json(createSuccessResponse(transaction));
  });

  /**
   * GET /v1/transactions/:reference/slip
   * Borrow slip as PDF
   */
  getSlip = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(transactionReferenceSchema, req);

    const slip = await this.transactionService.renderBorrowSlip(params.reference);

    res
      .status(200)
      .type('application/pdf')
      .setHeader('Content-Disposition', `inline; filename="borrow-slip-${slip.referenceNumber}.pdf"`)
      .send(slip.pdf);
  });
}
