import { z } from 'zod';
import { isoDateEndQuery, isoDateQuery } from './common.validator';

export const reportRangeSchema = z.object({
  query: z.object({
    from: isoDateQuery,
    to: isoDateEndQuery,
  }),
});
