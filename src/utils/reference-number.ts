const REFERENCE_NUMBER_WIDTH = 7;

/**
 * Human-facing reference number for a transaction id, e.g. 42 -> "0000042"
 */
export function formatReferenceNumber(transactionId: number): string {
  return String(transactionId).padStart(REFERENCE_NUMBER_WIDTH, '0');
}

/**
 * Accepts "0000042" or "42"; null for anything that is not a positive id
 */
export function parseReferenceNumber(reference: string): number | null {
  const trimmed = reference.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
