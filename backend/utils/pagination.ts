/**
 * Pagination helpers for list endpoints.
 * Query params: `page` (1-based) and `per_page` (default 20, max 100).
 */

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

export interface PageRequest {
  page: number;
  perPage: number;
  skip: number;
}

function positiveInt(value: unknown): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 1 ? n : undefined;
}

/** Parse page/per_page from query params with safe bounds. */
export function parsePagination(query: Record<string, unknown>, defaults?: { perPage?: number }): PageRequest {
  const page = positiveInt(query.page) ?? 1;
  const perPage = Math.min(MAX_PER_PAGE, positiveInt(query.per_page) ?? defaults?.perPage ?? DEFAULT_PER_PAGE);
  return { page, perPage, skip: (page - 1) * perPage };
}

export interface PaginationMeta {
  page: number;
  per_page: number;
  total: number;
  pages: number;
}

export function paginationMeta(page: PageRequest, total: number): PaginationMeta {
  return {
    page: page.page,
    per_page: page.perPage,
    total,
    pages: Math.ceil(total / page.perPage),
  };
}
