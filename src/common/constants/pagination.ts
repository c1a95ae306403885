/**
 * Pagination Constants
 *
 * Shared page-size limits for every listing endpoint.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default number of records per page */
export const DEFAULT_PAGE_SIZE = 20;

/** Maximum allowed records per page */
export const MAX_PAGE_SIZE = 200;

/** First page number (pages are 1-based) */
export const FIRST_PAGE = 1;

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a page size to the allowed range.
 *
 * @example
 * clampPageSize(undefined)    // 20
 * clampPageSize(500)          // 200
 * clampPageSize(-1)           // 1
 */
export function clampPageSize(
  size: number | undefined | null,
  defaultValue: number = DEFAULT_PAGE_SIZE,
  maxValue: number = MAX_PAGE_SIZE
): number {
  if (size === undefined || size === null || !Number.isFinite(size)) {
    return defaultValue;
  }
  return Math.min(Math.max(1, Math.trunc(size)), maxValue);
}

/**
 * Clamps a 1-based page number.
 */
export function clampPage(page: number | undefined | null): number {
  if (page === undefined || page === null || !Number.isFinite(page)) {
    return FIRST_PAGE;
  }
  return Math.max(FIRST_PAGE, Math.trunc(page));
}

/**
 * Normalizes page/size into limit/offset: offset = (page - 1) * size.
 */
export function normalizePagination(params: {
  page?: number | null | undefined;
  size?: number | null | undefined;
}): {
  page: number;
  limit: number;
  offset: number;
} {
  const page = clampPage(params.page);
  const limit = clampPageSize(params.size);
  return { page, limit, offset: (page - 1) * limit };
}
