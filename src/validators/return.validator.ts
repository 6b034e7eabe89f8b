import { z } from 'zod';
import { idParam, optionalText } from './common.validator';

/**
 * Return validation schemas
 *
 * Quantities are accepted as sent (number or text); the reconciler skips
 * the ones that are not positive whole numbers instead of rejecting the form.
 */

const claims = z
  .array(
    z.object({
      item_name: z.string().trim().min(1, 'Item name is required'),
      quantity: z.union([z.number(), z.string(), z.null()]),
      condition: optionalText(255),
    })
  )
  .min(1, 'At least one item is required')
  .max(50);

export const submitReturnSchema = z.object({
  body: z.object({
    borrower_id: z
      .number({
        required_error: 'Borrower ID is required',
        invalid_type_error: 'Borrower ID must be a number',
      })
      .int()
      .positive(),
    items: claims,
  }),
});

export const kioskReturnSchema = z.object({
  body: z.object({
    borrower_rfid: z.string().trim().min(1, 'Borrower RFID is required'),
    items: claims,
  }),
});

export const pendingReturnIdSchema = z.object({
  params: z.object({ id: idParam('Pending return') }),
});
