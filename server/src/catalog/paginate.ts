export interface Page<T> {
  items: T[];
  pageNumber: number;
  pageCount: number;
  totalItems: number;
  hasPrevious: boolean;
  hasNext: boolean;
}

/**
 * Slice `items` into a 1-based page. Out-of-range page numbers land on the last page.
 */
export function paginate<T>(items: readonly T[], pageNumber: number, perPage: number): Page<T> {
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new Error("perPage must be a positive integer");
  }

  const pageCount = Math.max(1, Math.ceil(items.length / perPage));
  const current = Math.min(Math.max(1, Math.floor(pageNumber)), pageCount);
  const start = (current - 1) * perPage;

  return {
    items: items.slice(start, start + perPage),
    pageNumber: current,
    pageCount,
    totalItems: items.length,
    hasPrevious: current > 1,
    hasNext: current < pageCount
  };
}
