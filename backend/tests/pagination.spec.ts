import { DEFAULT_PER_PAGE, MAX_PER_PAGE, paginationMeta, parsePagination } from '../utils/pagination.js';

describe('pagination', () => {
  it('defaults to the first page', () => {
    expect(parsePagination({})).toEqual({ page: 1, perPage: DEFAULT_PER_PAGE, skip: 0 });
  });

  it('reads page and per_page', () => {
    expect(parsePagination({ page: '3', per_page: '10' })).toEqual({ page: 3, perPage: 10, skip: 20 });
  });

  it('falls back on invalid values and caps the page size', () => {
    expect(parsePagination({ page: '0', per_page: 'abc' })).toEqual({ page: 1, perPage: DEFAULT_PER_PAGE, skip: 0 });
    expect(parsePagination({ page: '1.5', per_page: '-4' })).toEqual({ page: 1, perPage: DEFAULT_PER_PAGE, skip: 0 });
    expect(parsePagination({ per_page: '5000' }).perPage).toBe(MAX_PER_PAGE);
    expect(parsePagination({ page: ['2', '9'] })).toEqual({ page: 2, perPage: DEFAULT_PER_PAGE, skip: DEFAULT_PER_PAGE });
  });

  it('describes the result window', () => {
    expect(paginationMeta({ page: 2, perPage: 20, skip: 20 }, 41)).toEqual({ page: 2, per_page: 20, total: 41, pages: 3 });
    expect(paginationMeta({ page: 1, perPage: 20, skip: 0 }, 0)).toEqual({ page: 1, per_page: 20, total: 0, pages: 0 });
  });
});
