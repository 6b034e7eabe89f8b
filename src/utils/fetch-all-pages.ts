/**
 * One page of a ranged read; total is the exact row count when the query asked for it
 */
export interface FetchedPage<T> {
  rows: T[];
  total: number | null;
}

export const DEFAULT_PAGE_SIZE = 1000;

/**
 * Read every row of a query with consecutive inclusive ranges
 *
 * PostgREST caps a response at its max-rows setting without reporting it, so a
 * page may come back shorter than asked for. The next range starts after the
 * rows actually received, and reading stops once the exact count is reached
 * or a page comes back empty. Without a count, a short page ends the read.
 */
export async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => Promise<FetchedPage<T>>,
  pageSize: number = DEFAULT_PAGE_SIZE
): Promise<T[]> {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new Error(`Page size must be a positive integer, got ${pageSize}`);
  }

  const rows: T[] = [];

  for (;;) {
    const from = rows.length;
    const page = await fetchPage(from, from + pageSize - 1);
    rows.push(...page.rows);

    if (page.rows.length === 0) return rows;
    if (page.total !== null && rows.length >= page.total) return rows;
    if (page.total === null && page.rows.length < pageSize) return rows;
  }
}
