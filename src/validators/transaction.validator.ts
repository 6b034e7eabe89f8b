import { z } from 'zod';
import { TransactionStatus } from '../types/transaction.types';
import { idParam, isoDateEndQuery, isoDateQuery, paginationQuery } from './common.validator';

export const listTransactionsSchema = z.object({
  query: z.object({
    borrower_id: idParam('Borrower').optional(),
    item_id: idParam('Item').optional(),
    status: z.nativeEnum(TransactionStatus).optional(),
    from: isoDateQuery,
    to: isoDateEndQuery,
    ...paginationQuery,
  }),
});

// Accepts the numeric id or the zero-padded reference number
export const transactionReferenceSchema = z.object({
  params: z.object({
    reference: z.string().regex(/^\d{1,12}$/, 'Invalid transaction reference'),
  }),
});
