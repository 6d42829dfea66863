export const PAGE_SIZE = 20;

export interface Page<T> {
  count: number;
  page: number;
  pageSize: number;
  results: T[];
}

export function pageOf<T>(results: T[], count: number, page: number): Page<T> {
  return { count, page, pageSize: PAGE_SIZE, results };
}

export function skipFor(page: number): number {
  return (Math.max(page, 1) - 1) * PAGE_SIZE;
}
