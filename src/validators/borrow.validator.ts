import { z } from 'zod';
import { optionalText } from './common.validator';

/**
 * Borrow issue validation schema
 */
export const issueBorrowSchema = z.object({
  body: z.object({
    borrower_rfid: z.string().trim().min(1, 'Borrower RFID is required'),
    instructor_rfid: z.string().trim().min(1, 'Instructor RFID is required'),
    subject: z.string().trim().min(1, 'Subject is required').max(150),
    room: z.string().trim().min(1, 'Room is required').max(100),
    items: z
      .array(
        z.object({
          item_id: z
            .number({
              required_error: 'Item ID is required',
              invalid_type_error: 'Item ID must be a number',
            })
            .int()
            .positive(),
          quantity: z
            .number({
              required_error: 'Quantity is required',
              invalid_type_error: 'Quantity must be a number',
            })
            .int('Quantity must be an integer')
            .positive('Quantity must be positive'),
          condition_before: optionalText(255),
        })
      )
      .min(1, 'At least one item is required')
      .max(50)
      .refine((lines) => new Set(lines.map((line) => line.item_id)).size === lines.length, {
        message: 'Each item may appear only once per borrow',
      }),
  }),
});

export type IssueBorrowRequest = z.infer<typeof issueBorrowSchema>;
