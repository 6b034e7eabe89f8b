import { createHash } from 'node:crypto';

/**
 * Key for one issued line
 *
 * Scans of the same item for the same borrower inside one dedupe window map
 * to the same key, and the unique index on transactions.idempotency_key turns
 * the repeat into a replay.
 */
export function borrowLineIdempotencyKey(
  borrowerId: number,
  itemId: number,
  at: Date,
  windowMs: number
): string {
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new Error(`Dedupe window must be a positive number of milliseconds, got ${windowMs}`);
  }

  const bucket = Math.floor(at.getTime() / windowMs);
  return createHash('sha256').update(`${borrowerId}:${itemId}:${bucket}`).digest('hex');
}
