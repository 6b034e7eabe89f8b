import { z } from 'zod';
import { BorrowerRole } from '../types/borrower.types';
import { booleanQuery, idParam, optionalText, paginationQuery } from './common.validator';

/**
 * Borrower validation schemas
 */

const borrowerFields = {
  rfid: z.string().trim().min(1, 'RFID is required').max(64),
  borrower_code: z.string().trim().min(1, 'Borrower code is required').max(64),
  first_name: z.string().trim().min(1, 'First name is required').max(100),
  last_name: z.string().trim().min(1, 'Last name is required').max(100),
  department: optionalText(150),
  course: optionalText(150),
  role: z.nativeEnum(BorrowerRole, {
    errorMap: () => ({ message: 'Role must be student, instructor or staff' }),
  }),
  email: z.string().trim().email('Invalid email address').nullish(),
};

export const createBorrowerSchema = z.object({
  body: z.object(borrowerFields),
});

export const updateBorrowerSchema = z.object({
  params: z.object({ id: idParam('Borrower') }),
  body: z
    .object(borrowerFields)
    .partial()
    .refine((body) => Object.values(body).some((value) => value !== undefined), {
      message: 'At least one field must be provided',
    }),
});

export const listBorrowersSchema = z.object({
  query: z.object({
    role: z.nativeEnum(BorrowerRole).optional(),
    search: z.string().trim().max(100).optional(),
    archived: booleanQuery,
  }),
});

export const borrowerIdSchema = z.object({
  params: z.object({ id: idParam('Borrower') }),
});

export const borrowerRfidSchema = z.object({
  params: z.object({ rfid: z.string().trim().min(1, 'RFID is required') }),
});

export const borrowerTransactionsSchema = z.object({
  params: z.object({ id: idParam('Borrower') }),
  query: z.object(paginationQuery),
});

export type CreateBorrowerRequest = z.infer<typeof createBorrowerSchema>;
