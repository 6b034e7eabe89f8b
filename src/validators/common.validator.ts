import { z } from 'zod';

/**
 * Shared request fragments
 */

export const idParam = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} ID must be a number` })
    .int(`${label} ID must be an integer`)
    .positive(`${label} ID must be positive`);

// Query strings only ever carry "true"/"false"
export const booleanQuery = z
  .enum(['true', 'false'], { errorMap: () => ({ message: 'Must be "true" or "false"' }) })
  .optional()
  .transform((value) => value === 'true');

export const paginationQuery = {
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
};

export const isoDateQuery = z.coerce.date({ invalid_type_error: 'Must be an ISO date' }).optional();

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// Upper bound of a range: a bare date covers that whole day (UTC)
export const isoDateEndQuery = z
  .preprocess(
    (value) => (typeof value === 'string' && DATE_ONLY.test(value.trim()) ? `${value.trim()}T23:59:59.999Z` : value),
    z.coerce.date({ invalid_type_error: 'Must be an ISO date' })
  )
  .optional();

export const optionalText = (max: number) => z.string().trim().max(max).nullish();
