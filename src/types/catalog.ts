/**
 * Popcast — Catalog Types
 *
 * Raw listings as scraped from a catalog page, and the canonical Item
 * every later stage works with.
 */

// ============================================================
// RAW ENTRIES
// ============================================================

/**
 * One listing tile before normalization. Every field is optional:
 * the normalizer decides what is usable.
 */
export interface RawCatalogEntry {
  pageId: string;
  name?: string;
  sku?: string;
  productUrl?: string;
  /** Sale price as it appears in the markup (usually a `content` attribute) */
  salePrice?: string | number;
  originalPrice?: string | number;
  imageUrl?: string;
  imageUrlAlt?: string;
  license?: string;
  badge?: string;
  availabilityText?: string;
}

/**
 * Outcome of fetching one configured page.
 */
export type PageFetchOutcome =
  | { pageId: string; ok: true; entries: RawCatalogEntry[]; durationMs: number }
  | { pageId: string; ok: false; error: string; durationMs: number };

// ============================================================
// ITEM
// ============================================================

export type Availability = 'in_stock' | 'coming_soon';

/**
 * Canonical product record. Built fresh every cycle, never mutated.
 */
export interface Item {
  readonly id: string;
  readonly title: string;
  /** Fandom / license tag; 'Other' when the source gives none */
  readonly category: string;
  readonly price: number;
  readonly originalPrice: number;
  readonly priceDrop: number;
  readonly currency: string;
  readonly region: string;
  readonly imageUrl: string;
  readonly imageUrlAlt?: string;
  readonly productUrl: string;
  readonly badge?: string;
  readonly availability: Availability;
  readonly dropDate?: string;
  readonly sourcePage: string;
  readonly discoveredAt: string;
}

// ============================================================
// FILTERING
// ============================================================

/**
 * `'All'` disables the allow-list; otherwise only listed categories pass.
 */
export type FandomSelection = 'All' | readonly string[];

export interface CategoryPolicy {
  fandoms: FandomSelection;
  denyList: readonly string[];
}
