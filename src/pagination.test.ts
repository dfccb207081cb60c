import { describe, it, expect } from 'vitest';
import {
  EMPTY_PAGINATION,
  advance,
  applyPageAction,
  clampPage,
  currentPage,
  initPage,
  isPageAction,
  retreat,
} from './pagination.js';

describe('clampPage', () => {
  it('keeps pages inside [1, total]', () => {
    expect(clampPage(0, 5)).toBe(1);
    expect(clampPage(-3, 5)).toBe(1);
    expect(clampPage(9, 5)).toBe(5);
    expect(clampPage(3, 5)).toBe(3);
  });

  it('treats totals below one as a single page', () => {
    expect(clampPage(4, 0)).toBe(1);
  });
});

describe('initPage', () => {
  it('starts a new document at the clamped located page', () => {
    const state = initPage(EMPTY_PAGINATION, 'doc', 12, 8);
    expect(state).toEqual({ doc: 8 });
  });

  it('keeps the page of a document already shown', () => {
    const state = initPage({ doc: 3 }, 'doc', 6, 8);
    expect(state).toEqual({ doc: 3 });
  });

  it('handles document names that collide with object properties', () => {
    const state = initPage(EMPTY_PAGINATION, 'constructor', 2, 4);
    expect(currentPage(state, 'constructor', 4)).toBe(2);
  });
});

describe('advance / retreat', () => {
  it('moves one page at a time and stops at the ends', () => {
    let state = initPage(EMPTY_PAGINATION, 'doc', 2, 3);
    state = advance(state, 'doc', 3);
    expect(currentPage(state, 'doc', 3)).toBe(3);
    state = advance(state, 'doc', 3);
    expect(currentPage(state, 'doc', 3)).toBe(3);
    state = retreat(state, 'doc', 3);
    state = retreat(state, 'doc', 3);
    state = retreat(state, 'doc', 3);
    expect(currentPage(state, 'doc', 3)).toBe(1);
  });

  it('does not touch other documents', () => {
    const state = advance({ a: 1, b: 4 }, 'a', 10);
    expect(state).toEqual({ a: 2, b: 4 });
  });

  it('does not mutate the previous state', () => {
    const before = { doc: 2 };
    advance(before, 'doc', 5);
    expect(before).toEqual({ doc: 2 });
  });

  it('keeps the page within bounds for every action sequence', () => {
    const actions = ['next', 'next', 'prev', 'next', 'next', 'next', 'prev', 'prev', 'prev', 'prev', 'next'] as const;
    for (let total = 1; total <= 6; total++) {
      for (let start = -1; start <= total + 2; start++) {
        let state = initPage(EMPTY_PAGINATION, 'doc', start, total);
        for (const action of actions) {
          state = applyPageAction(state, 'doc', action, total);
          const page = state.doc;
          expect(page).toBeGreaterThanOrEqual(1);
          expect(page).toBeLessThanOrEqual(total);
        }
      }
    }
  });
});

describe('isPageAction', () => {
  it('accepts only next and prev', () => {
    expect(isPageAction('next')).toBe(true);
    expect(isPageAction('prev')).toBe(true);
    expect(isPageAction('first')).toBe(false);
    expect(isPageAction(undefined)).toBe(false);
  });
});
