import { describe, expect, it } from 'vitest';
import { formatReferenceNumber, parseReferenceNumber } from '../src/utils/reference-number';
import { borrowLineIdempotencyKey } from '../src/utils/idempotency';

describe('reference numbers', () => {
  it('pads ids to seven digits', () => {
    expect(formatReferenceNumber(42)).toBe('0000042');
    expect(formatReferenceNumber(12345678)).toBe('12345678');
  });

  it('parses padded and plain ids', () => {
    expect(parseReferenceNumber('0000042')).toBe(42);
    expect(parseReferenceNumber(' 42 ')).toBe(42);
  });

  it('rejects anything that is not a positive id', () => {
    expect(parseReferenceNumber('0000000')).toBeNull();
    expect(parseReferenceNumber('12a')).toBeNull();
    expect(parseReferenceNumber('-3')).toBeNull();
    expect(parseReferenceNumber('')).toBeNull();
  });
});

describe('borrowLineIdempotencyKey', () => {
  const windowMs = 10_000;

  it('is stable inside one dedupe window', () => {
    const first = borrowLineIdempotencyKey(1, 2, new Date(20_000), windowMs);
    const second = borrowLineIdempotencyKey(1, 2, new Date(29_999), windowMs);

    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes with the window, the borrower and the item', () => {
    const base = borrowLineIdempotencyKey(1, 2, new Date(20_000), windowMs);

    expect(borrowLineIdempotencyKey(1, 2, new Date(30_000), windowMs)).not.toBe(base);
    expect(borrowLineIdempotencyKey(3, 2, new Date(20_000), windowMs)).not.toBe(base);
    expect(borrowLineIdempotencyKey(1, 4, new Date(20_000), windowMs)).not.toBe(base);
  });

  it('refuses a window that would put every scan in one bucket', () => {
    expect(() => borrowLineIdempotencyKey(1, 2, new Date(20_000), 0)).toThrow(
      'Dedupe window must be a positive number of milliseconds, got 0'
    );
    expect(() => borrowLineIdempotencyKey(1, 2, new Date(20_000), Number.NaN)).toThrow(
      'Dedupe window must be a positive number of milliseconds, got NaN'
    );
  });
});
