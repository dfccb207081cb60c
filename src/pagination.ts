/**
 * Pagination state: the page currently shown for each document, keyed by document stem.
 *
 * All functions are pure; they return a new state and keep every page inside
 * [1, totalPages].
 */

export type PaginationState = Readonly<Record<string, number>>;

export const EMPTY_PAGINATION: PaginationState = {};

function storedPage(state: PaginationState, doc: string): number | undefined {
  return Object.hasOwn(state, doc) ? state[doc] : undefined;
}

export function clampPage(page: number, totalPages: number): number {
  const total = Math.max(1, Math.floor(totalPages));
  const value = Number.isFinite(page) ? Math.floor(page) : 1;
  return Math.min(Math.max(value, 1), total);
}

/**
 * Set the starting page for a document the first time it is shown. A document that
 * already has a page keeps it (re-clamped).
 */
export function initPage(state: PaginationState, doc: string, startPage: number, totalPages: number): PaginationState {
  const existing = storedPage(state, doc);
  const page = clampPage(existing ?? startPage, totalPages);
  if (existing === page) return state;
  return { ...state, [doc]: page };
}

export function currentPage(state: PaginationState, doc: string, totalPages: number): number {
  return clampPage(storedPage(state, doc) ?? 1, totalPages);
}

export function advance(state: PaginationState, doc: string, totalPages: number): PaginationState {
  const page = currentPage(state, doc, totalPages);
  return { ...state, [doc]: clampPage(Math.min(totalPages, page + 1), totalPages) };
}

export function retreat(state: PaginationState, doc: string, totalPages: number): PaginationState {
  const page = currentPage(state, doc, totalPages);
  return { ...state, [doc]: clampPage(Math.max(1, page - 1), totalPages) };
}

export type PageAction = 'next' | 'prev';

export function applyPageAction(state: PaginationState, doc: string, action: PageAction, totalPages: number): PaginationState {
  return action === 'next' ? advance(state, doc, totalPages) : retreat(state, doc, totalPages);
}

export function isPageAction(value: unknown): value is PageAction {
  return value === 'next' || value === 'prev';
}
