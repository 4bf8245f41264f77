/**
 * Paged reads for PostgREST, which caps the rows one request returns.
 * Queries passed here must be ordered by a unique key so pages neither
 * overlap nor skip rows.
 */

export const PAGE_SIZE = 1000;

/** Keeps `.in()` filters well inside URL length limits. */
export const IN_FILTER_CHUNK = 200;

export interface PageResult<T> {
  data: T[] | null;
  error: { message: string } | null;
  /** Total matching rows, present when the query asked for `count: 'exact'`. */
  count: number | null;
}

/**
 * Fetch pages until the reported total is reached, or a page comes back
 * empty. Without a count, a short page ends the read.
 */
export async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => PromiseLike<PageResult<T>>,
  what: string,
  pageSize = PAGE_SIZE
): Promise<T[]> {
  const rows: T[] = [];

  for (;;) {
    const { data, error, count } = await fetchPage(rows.length, rows.length + pageSize - 1);
    if (error) throw new Error(`Failed to fetch ${what}: ${error.message}`);

    const page = data ?? [];
    rows.push(...page);

    const done =
      page.length === 0 || (count !== null ? rows.length >= count : page.length < pageSize);
    if (done) return rows;
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
