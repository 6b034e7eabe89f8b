import { Request } from 'express';
import { z } from 'zod';

/**
 * Validates request data (body, params, query) against a Zod schema and
 * returns the parsed, coerced result
 *
 * A ZodError propagates to the error middleware, which renders it as a
 * 400 VALIDATION_ERROR.
 *
 * Usage:
 * ```typescript
 * const { params } = await parseRequest(getItemSchema, req);
 * ```
 */
export async function parseRequest<T extends z.ZodTypeAny>(schema: T, req: Request): Promise<z.infer<T>> {
  return schema.parseAsync({
    body: req.body,
    params: req.params,
    query: req.query,
  });
}
