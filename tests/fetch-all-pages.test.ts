import { describe, expect, it } from 'vitest';
import { type FetchedPage, fetchAllPages } from '../src/utils/fetch-all-pages';

/**
 * Stand-in for a ranged PostgREST read over an in-memory table
 */
function rangedTable<T>(rows: T[], options: { maxRows?: number; withCount?: boolean } = {}) {
  const calls: Array<[number, number]> = [];
  const maxRows = options.maxRows ?? Number.POSITIVE_INFINITY;

  const fetchPage = async (from: number, to: number): Promise<FetchedPage<T>> => {
    calls.push([from, to]);
    const end = Math.min(to + 1, from + maxRows);
    return { rows: rows.slice(from, end), total: options.withCount === false ? null : rows.length };
  };

  return { calls, fetchPage };
}

describe('fetchAllPages', () => {
  it('reads past the first page of a large table', async () => {
    const ids = Array.from({ length: 2500 }, (_, index) => index + 1);
    const table = rangedTable(ids, { maxRows: 1000 });

    const rows = await fetchAllPages(table.fetchPage);

    expect(rows).toEqual(ids);
    expect(table.calls).toEqual([
      [0, 999],
      [1000, 1999],
      [2000, 2999],
    ]);
  });

  it('continues after a page the server cut short', async () => {
    const table = rangedTable(['a', 'b', 'c', 'd', 'e'], { maxRows: 2 });

    const rows = await fetchAllPages(table.fetchPage, 4);

    expect(rows).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(table.calls).toEqual([
      [0, 3],
      [2, 5],
      [4, 7],
    ]);
  });

  it('stops at a short page when no count is available', async () => {
    const table = rangedTable(['a', 'b', 'c', 'd', 'e'], { withCount: false });

    const rows = await fetchAllPages(table.fetchPage, 2);

    expect(rows).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(table.calls).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it('stops at an empty page when the table fills whole pages', async () => {
    const table = rangedTable(['a', 'b', 'c', 'd'], { withCount: false });

    const rows = await fetchAllPages(table.fetchPage, 2);

    expect(rows).toEqual(['a', 'b', 'c', 'd']);
    expect(table.calls).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it('makes a single call for an empty table', async () => {
    const table = rangedTable<string>([]);

    expect(await fetchAllPages(table.fetchPage)).toEqual([]);
    expect(table.calls).toEqual([[0, 999]]);
  });

  it('refuses a page size that is not a positive integer', async () => {
    const table = rangedTable(['a']);

    await expect(fetchAllPages(table.fetchPage, 0)).rejects.toThrow(
      'Page size must be a positive integer, got 0'
    );
    expect(table.calls).toEqual([]);
  });
});
