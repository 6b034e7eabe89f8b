import { Request, Response } from 'express';
import { BorrowerService } from '../services/borrower.service';
import type { UpdateBorrowerInput } from '../types/borrower.types';
import { createPaginatedResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import {
  borrowerIdSchema,
  borrowerRfidSchema,
  borrowerTransactionsSchema,
  createBorrowerSchema,
  listBorrowersSchema,
  updateBorrowerSchema,
} from '../validators/borrower.validator';

/**
 * Borrower Controller
 */
export class BorrowerController {
  constructor(private borrowerService: BorrowerService) {}

  /**
   * POST /v1/borrowers
   */
  createBorrower = asyncHandler(async (req: Request, res: Response) => {
    const { body } = await parseRequest(createBorrowerSchema, req);

    const borrower = await this.borrowerService.createBorrower({
      rfid: body.rfid,
      borrowerCode: body.borrower_code,
      firstName: body.first_name,
      lastName: body.last_name,
      department: body.department ?? null,
      course: body.course ?? null,
      role: body.role,
      email: body.email ?? null,
    });

    res.status(201).json(createSuccessResponse(borrower));
  });

  /**
   * GET /v1/borrowers
   */
  listBorrowers = asyncHandler(async (req: Request, res: Response) => {
    const { query } = await parseRequest(listBorrowersSchema, req);

    const borrowers = await this.borrowerService.listBorrowers({
      archived: query.archived,
      ...(query.role && { role: query.role }),
      ...(query.search && { search: query.search }),
    });

    res.status(200).json(createSuccessResponse(borrowers));
  });

  /**
   * GET /v1/borrowers/:id
   */
  getBorrower = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(borrowerIdSchema, req);

    const borrower = await this.borrowerService.getBorrower(params.id);

    res.status(200).json(createSuccessResponse(borrower));
  });

  /**
   * GET /v1/borrowers/rfid/:rfid
   * Badge scan lookup
   */
  getBorrowerByRfid = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(borrowerRfidSchema, req);

    const borrower = await this.borrowerService.getBorrowerByRfid(params.rfid);

    res.status(200).json(createSuccessResponse(borrower));
  });

  /**
   * PATCH /v1/borrowers/:id
   */
  updateBorrower = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = await parseRequest(updateBorrowerSchema, req);

    const changes: UpdateBorrowerInput = {};
    if (body.rfid !== undefined) changes.rfid = body.rfid;
    if (body.borrower_code !== undefined) changes.borrowerCode = body.borrower_code;
    if (body.first_name !== undefined) changes.firstName = body.first_name;
    if (body.last_name !== undefined) changes.lastName = body.last_name;
    if (body.department !== undefined) changes.department = body.department;
    if (body.course !== undefined) changes.course = body.course;
    if (body.role !== undefined) changes.role = body.role;
    if (body.email !== undefined) changes.email = body.email;

    const borrower = await this.borrowerService.updateBorrower(params.id, changes);

    res.status(200).json(createSuccessResponse(borrower, 'Borrower updated'));
  });

  /**
   * POST /v1/borrowers/:id/archive
   */
  archiveBorrower = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(borrowerIdSchema, req);

    const borrower = await this.borrowerService.archiveBorrower(params.id);

    res.status(200).json(createSuccessResponse(borrower, 'Borrower archived'));
  });

  /**
   * POST /v1/borrowers/:id/restore
   */
  restoreBorrower = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(borrowerIdSchema, req);

    const borrower = await this.borrowerService.restoreBorrower(params.id);

    res.status(200).json(createSuccessResponse(borrower, 'Borrower restored'));
  });

  /**
   * GET /v1/borrowers/:id/transactions
   */
  listTransactions = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = await parseRequest(borrowerTransactionsSchema, req);
    const page = { limit: query.limit, offset: query.offset };

    const result = await this.borrowerService.listTransactions(params.id, page);

    res.status(200).json(createPaginatedResponse(result.rows, page, result.total));
  });

  /**
   * GET /v1/borrowers/:id/open-items
   * Outstanding items grouped by item (what the return form offers)
   */
  listOpenItems = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(borrowerIdSchema, req);

    const items = await this.borrowerService.listOpenItems(params.id);

    res.status(200).json(createSuccessResponse(items));
  });
}
