/**
 * Tests for category filtering and in-cycle dedup
 */

import { describe, it, expect } from 'vitest';
import {
  dedupeById,
  filterItems,
  isAllowed,
  isDenied,
  normalizeAndFilter,
} from '../../src/catalog/filter';
import { makeItem } from '../fixtures/items';

describe('isDenied', () => {
  it('matches deny terms as case-insensitive substrings', () => {
    expect(isDenied('NBA', ['nba'])).toBe(true);
    expect(isDenied('NBA All-Stars', ['nba'])).toBe(true);
    expect(isDenied('Disney Princess', ['disney'])).toBe(true);
    expect(isDenied('Marvel', ['nba', 'disney'])).toBe(false);
  });

  it('ignores empty terms', () => {
    expect(isDenied('Marvel', [''])).toBe(false);
  });
});

describe('isAllowed', () => {
  it('lets everything through for All', () => {
    expect(isAllowed('Anything', 'All')).toBe(true);
  });

  it('matches whole categories case-insensitively', () => {
    expect(isAllowed('Marvel', ['marvel'])).toBe(true);
    expect(isAllowed('Marvel Studios', ['Marvel'])).toBe(false);
  });
});

describe('filterItems', () => {
  const items = [
    makeItem({ id: 'A', category: 'NBA' }),
    makeItem({ id: 'B', category: 'Marvel' }),
    makeItem({ id: 'C', category: 'Star Wars' }),
    makeItem({ id: 'D', category: 'Other' }),
  ];

  it('drops denied categories', () => {
    const result = filterItems(items, { fandoms: 'All', denyList: ['nba'] });
    expect(result.map(i => i.id)).toEqual(['B', 'C', 'D']);
  });

  it('gives the deny-list precedence over the allow-list', () => {
    const result = filterItems(items, { fandoms: ['NBA', 'Marvel'], denyList: ['nba'] });
    expect(result.map(i => i.id)).toEqual(['B']);
  });

  it('keeps only allowed categories', () => {
    const result = filterItems(items, { fandoms: ['star wars', 'other'], denyList: [] });
    expect(result.map(i => i.id)).toEqual(['C', 'D']);
  });
});

describe('dedupeById', () => {
  it('keeps the first occurrence in first-seen order', () => {
    const result = dedupeById([
      makeItem({ id: 'A', sourcePage: 'sale' }),
      makeItem({ id: 'B' }),
      makeItem({ id: 'A', sourcePage: 'exclusives' }),
    ]);

    expect(result.map(i => `${i.id}:${i.sourcePage}`)).toEqual(['A:sale', 'B:sale']);
  });
});

describe('normalizeAndFilter', () => {
  it('normalizes, filters and dedupes in one pass', () => {
    const result = normalizeAndFilter(
      [
        { pageId: 'sale', name: 'Pop! A', sku: 'A', salePrice: '10', license: 'NBA' },
        { pageId: 'sale', name: 'Pop! B', sku: 'B', salePrice: '12', license: 'Marvel' },
        { pageId: 'sale', sku: 'broken', salePrice: '1' },
        { pageId: 'exclusives', name: 'Pop! B', sku: 'B', salePrice: '12', license: 'Marvel' },
        { pageId: 'exclusives', name: 'Pop! C', sku: 'C', salePrice: '9', license: 'Star Wars' },
      ],
      { fandoms: 'All', denyList: ['nba'] },
      { region: 'pl', discoveredAt: '2026-10-19T08:00:00.000Z' }
    );

    expect(result.items.map(i => i.id)).toEqual(['B', 'C']);
    expect(result.items[0].sourcePage).toBe('sale');
    expect(result.droppedCount).toBe(1);
    expect(result.duplicateCount).toBe(1);
  });
});
