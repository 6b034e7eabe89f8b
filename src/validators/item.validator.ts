import { z } from 'zod';
import { booleanQuery, idParam, optionalText } from './common.validator';

/**
 * Item validation schemas
 */

const totalQuantity = z
  .number({
    required_error: 'Total quantity is required',
    invalid_type_error: 'Total quantity must be a number',
  })
  .int('Total quantity must be an integer')
  .min(0, 'Total quantity cannot be negative');

// Create item request schema
export const createItemSchema = z.object({
  body: z.object({
    name: z.string().trim().min(1, 'Name is required').max(255, 'Name must be at most 255 characters'),
    category: optionalText(100),
    total_quantity: totalQuantity,
  }),
});

export const listItemsSchema = z.object({
  query: z.object({
    category: z.string().trim().min(1).optional(),
    archived: booleanQuery,
  }),
});

// Get item by ID schema
export const itemIdSchema = z.object({
  params: z.object({
    id: idParam('Item'),
  }),
});

export const updateItemSchema = z.object({
  params: z.object({
    id: idParam('Item'),
  }),
  body: z
    .object({
      name: z.string().trim().min(1, 'Name cannot be empty').max(255).optional(),
      category: optionalText(100),
      total_quantity: totalQuantity.optional(),
    })
    .refine((body) => Object.values(body).some((value) => value !== undefined), {
      message: 'At least one field must be provided',
    }),
});

// Infer TypeScript types from schemas
export type CreateItemRequest = z.infer<typeof createItemSchema>;
export type UpdateItemRequest = z.infer<typeof updateItemSchema>;
