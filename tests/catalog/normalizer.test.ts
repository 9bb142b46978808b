/**
 * Tests for catalog entry normalization
 */

import { describe, it, expect } from 'vitest';
import {
  generateItemId,
  normalizeBadge,
  normalizeEntries,
  normalizeEntry,
  parseAvailability,
} from '../../src/catalog/normalizer';
import { EntryParseError } from '../../src/lib/errors';
import type { RawCatalogEntry } from '../../src/types';

const context = { region: 'pl', discoveredAt: '2026-10-19T08:00:00.000Z' };

const fullEntry: RawCatalogEntry = {
  pageId: 'sale',
  name: 'Spider-Man (Glow)',
  sku: '75123',
  productUrl: 'https://funko.com/pl/spider-man-glow/75123.html',
  salePrice: '14.99',
  originalPrice: '19.99',
  imageUrl: 'https://cdn.example.test/img/75123.png',
  license: ' Marvel ',
  badge: 'web exclusive',
};

describe('generateItemId', () => {
  it('uses the SKU when present', () => {
    expect(generateItemId('Anything', 'https://funko.com/x.html', '75123')).toBe('75123');
  });

  it('hashes title and URL otherwise', () => {
    expect(generateItemId('The Child', 'https://funko.com/pl/the-child/FNK-CHILD.html')).toBe(
      '70ea1dd1c910eec7'
    );
  });

  it('is stable for the same input and differs for another URL', () => {
    const first = generateItemId('Groot', 'https://funko.com/pl/groot.html');
    expect(first).toBe('b75287e997279e08');
    expect(generateItemId('Groot', 'https://funko.com/pl/groot.html')).toBe(first);
    expect(generateItemId('Groot', 'https://funko.com/de/groot.html')).not.toBe(first);
  });
});

describe('normalizeBadge', () => {
  it('title-cases badges', () => {
    expect(normalizeBadge('web EXCLUSIVE')).toBe('Web Exclusive');
  });

  it('drops placeholders', () => {
    expect(normalizeBadge('null')).toBeUndefined();
    expect(normalizeBadge(' None ')).toBeUndefined();
    expect(normalizeBadge('')).toBeUndefined();
    expect(normalizeBadge(undefined)).toBeUndefined();
  });
});

describe('parseAvailability', () => {
  it('reads the drop date of coming-soon items', () => {
    expect(parseAvailability('Coming Soon - Drops 16/02 at 05:30 PM GMT')).toEqual({
      availability: 'coming_soon',
      dropDate: '16/02 at 05:30 PM GMT',
    });
  });

  it('handles coming-soon text without a date', () => {
    expect(parseAvailability('Pre-order now')).toEqual({ availability: 'coming_soon' });
  });

  it('defaults to in stock', () => {
    expect(parseAvailability(undefined)).toEqual({ availability: 'in_stock' });
    expect(parseAvailability('Add to cart')).toEqual({ availability: 'in_stock' });
  });
});

describe('normalizeEntry', () => {
  it('builds a canonical item', () => {
    expect(normalizeEntry(fullEntry, context)).toEqual({
      id: '75123',
      title: 'Spider-Man (Glow)',
      category: 'Marvel',
      price: 14.99,
      originalPrice: 19.99,
      priceDrop: 5,
      currency: 'EUR',
      region: 'pl',
      imageUrl: 'https://cdn.example.test/img/75123.png',
      imageUrlAlt: undefined,
      productUrl: 'https://funko.com/pl/spider-man-glow/75123.html',
      badge: 'Web Exclusive',
      availability: 'in_stock',
      dropDate: undefined,
      sourcePage: 'sale',
      discoveredAt: '2026-10-19T08:00:00.000Z',
    });
  });

  it('defaults category, original price and image', () => {
    const item = normalizeEntry(
      { pageId: 'new-releases', name: 'Groot', productUrl: 'https://funko.com/pl/groot.html', salePrice: 12 },
      context
    );

    expect(item.id).toBe('b75287e997279e08');
    expect(item.category).toBe('Other');
    expect(item.originalPrice).toBe(0);
    expect(item.priceDrop).toBe(0);
    expect(item.imageUrl).toBe('');
  });

  it('uses the region currency', () => {
    expect(normalizeEntry(fullEntry, { ...context, region: 'gb' }).currency).toBe('GBP');
    expect(normalizeEntry(fullEntry, { ...context, region: '' }).currency).toBe('USD');
    expect(normalizeEntry(fullEntry, { ...context, region: 'xx' }).currency).toBe('EUR');
  });

  it('has no price drop when the original price is not higher', () => {
    const item = normalizeEntry({ ...fullEntry, originalPrice: '14.99' }, context);
    expect(item.priceDrop).toBe(0);
  });

  it('rejects an entry without an identifier', () => {
    const raw: RawCatalogEntry = { pageId: 'sale', name: 'Groot', salePrice: '10.00' };

    expect(() => normalizeEntry(raw, context)).toThrow(EntryParseError);
    expect(() => normalizeEntry(raw, context)).toThrow('identifier is missing');
  });

  it('rejects a blank title', () => {
    expect(() => normalizeEntry({ ...fullEntry, name: '   ' }, context)).toThrow('title is missing');
  });

  it('rejects a missing or malformed price', () => {
    expect(() => normalizeEntry({ ...fullEntry, salePrice: undefined }, context)).toThrow(EntryParseError);
    expect(() => normalizeEntry({ ...fullEntry, salePrice: 'n/a' }, context)).toThrow(EntryParseError);
    expect(() => normalizeEntry({ ...fullEntry, salePrice: '-1' }, context)).toThrow(EntryParseError);
  });
});

describe('normalizeEntries', () => {
  it('drops unusable entries and counts them', () => {
    const result = normalizeEntries(
      [
        fullEntry,
        { pageId: 'sale', sku: '1', salePrice: '5' },
        { pageId: 'sale', name: 'Groot', productUrl: 'https://funko.com/pl/groot.html', salePrice: '12' },
        { pageId: 'sale', name: 'No price', sku: '2' },
      ],
      context
    );

    expect(result.items.map(i => i.id)).toEqual(['75123', 'b75287e997279e08']);
    expect(result.droppedCount).toBe(2);
  });
});
