/**
 * Popcast — Catalog Normalizer
 *
 * Converts raw catalog entries into the canonical Item format.
 * Entries missing a title, an identifier or a price are dropped.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { Availability, Item, RawCatalogEntry } from '../types';
import { EntryParseError } from '../lib/errors';
import { currencyForRegion } from '../lib/regions';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'normalizer' });

export interface NormalizeContext {
  region: string;
  /** Wall-clock time of this fetch, shared by every item of the cycle */
  discoveredAt: string;
}

export interface NormalizeResult {
  items: Item[];
  droppedCount: number;
}

// ============================================================
// FIELD PARSING
// ============================================================

const price = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite().min(0));

const RequiredFieldsSchema = z
  .object({
    name: z.string().trim().min(1, 'title is missing'),
    salePrice: price,
    productUrl: z.string().trim().min(1).optional(),
    sku: z.string().trim().min(1).optional(),
  })
  .refine(entry => entry.productUrl || entry.sku, { message: 'identifier is missing' });

function parseOptionalPrice(value: string | number | undefined): number {
  const parsed = price.safeParse(value);
  return parsed.success ? parsed.data : 0;
}

/**
 * Stable item id: the SKU when the source gives one, otherwise a
 * 16-char SHA-256 of title and product URL.
 */
export function generateItemId(title: string, productUrl: string, sku?: string): string {
  if (sku) return sku;
  return createHash('sha256').update(`${title}|${productUrl}`).digest('hex').slice(0, 16);
}

/**
 * "web exclusive" -> "Web Exclusive"; placeholder badges are dropped.
 */
export function normalizeBadge(badge: string | undefined): string | undefined {
  const trimmed = badge?.trim();
  if (!trimmed || ['null', 'none'].includes(trimmed.toLowerCase())) return undefined;

  return trimmed
    .toLowerCase()
    .split(/\s+/)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Read availability and drop date from text such as
 * "Coming Soon - Drops 16/02 at 05:30 PM GMT".
 */
export function parseAvailability(text: string | undefined): {
  availability: Availability;
  dropDate?: string;
} {
  const lower = text?.toLowerCase() ?? '';
  if (!lower.includes('coming soon') && !lower.includes('pre-order')) {
    return { availability: 'in_stock' };
  }

  const date = lower.match(/(\d{1,2}\/\d{1,2}(?:\/\d{2,4})?)/);
  if (!date) return { availability: 'coming_soon' };

  const time = (text ?? '').match(/(\d{1,2}:\d{2}\s*(?:AM|PM)?(?:\s*GMT)?)/i);
  const dropDate = time ? `${date[1]} at ${time[1]}` : date[1];

  return { availability: 'coming_soon', dropDate };
}

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Normalize one raw entry. Throws EntryParseError when a required
 * field is missing or malformed.
 */
export function normalizeEntry(raw: RawCatalogEntry, context: NormalizeContext): Item {
  const parsed = RequiredFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EntryParseError(raw.pageId, parsed.error.issues.map(i => i.message).join(', '));
  }

  const { name, salePrice, productUrl, sku } = parsed.data;
  const originalPrice = parseOptionalPrice(raw.originalPrice);
  const priceDrop =
    originalPrice > 0 && salePrice < originalPrice
      ? Math.round((originalPrice - salePrice) * 100) / 100
      : 0;
  const { availability, dropDate } = parseAvailability(raw.availabilityText);

  return {
    id: generateItemId(name, productUrl ?? '', sku),
    title: name,
    category: raw.license?.trim() || 'Other',
    price: salePrice,
    originalPrice,
    priceDrop,
    currency: currencyForRegion(context.region),
    region: context.region,
    imageUrl: raw.imageUrl?.trim() ?? '',
    imageUrlAlt: raw.imageUrlAlt?.trim() || undefined,
    productUrl: productUrl ?? '',
    badge: normalizeBadge(raw.badge),
    availability,
    dropDate,
    sourcePage: raw.pageId,
    discoveredAt: context.discoveredAt,
  };
}

/**
 * Normalize a batch, dropping unusable entries.
 */
export function normalizeEntries(
  rawEntries: readonly RawCatalogEntry[],
  context: NormalizeContext
): NormalizeResult {
  const items: Item[] = [];
  let droppedCount = 0;

  for (const raw of rawEntries) {
    try {
      items.push(normalizeEntry(raw, context));
    } catch (error) {
      if (!(error instanceof EntryParseError)) throw error;
      droppedCount++;
      log.debug('Dropped catalog entry', { pageId: error.pageId, reason: error.message });
    }
  }

  return { items, droppedCount };
}
