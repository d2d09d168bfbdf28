/**
 * Page/offset pagination math
 */

export interface PaginationSummary {
  currentPage: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasPrev: boolean;
  hasNext: boolean;
}

/**
 * Clamp to a whole page number >= 1
 */
export function normalizePage(page: number): number {
  if (!Number.isFinite(page)) {
    return 1;
  }
  return Math.max(1, Math.floor(page));
}

export function pageOffset(page: number, pageSize: number): number {
  return (normalizePage(page) - 1) * pageSize;
}

export function summarize(page: number, pageSize: number, totalItems: number): PaginationSummary {
  const currentPage = normalizePage(page);
  const totalPages = Math.ceil(totalItems / pageSize);
  return {
    currentPage,
    pageSize,
    totalItems,
    totalPages,
    hasPrev: currentPage > 1,
    hasNext: currentPage < totalPages
  };
}
