/**
 * Popcast — Category Filter
 *
 * Deny-list first, then allow-list. Deny always wins.
 * Also removes repeats of the same item within one cycle.
 */

import type { CategoryPolicy, Item, RawCatalogEntry } from '../types';
import { normalizeEntries, type NormalizeContext } from './normalizer';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'filter' });

/**
 * True when the category contains any deny-list term (case-insensitive).
 */
export function isDenied(category: string, denyList: readonly string[]): boolean {
  const lower = category.toLowerCase();
  return denyList.some(term => term.length > 0 && lower.includes(term.toLowerCase()));
}

/**
 * True when the allow-list lets the category through.
 * 'All' (or an empty list) lets everything through.
 */
export function isAllowed(category: string, fandoms: CategoryPolicy['fandoms']): boolean {
  if (fandoms === 'All' || fandoms.length === 0) return true;
  const lower = category.toLowerCase();
  return fandoms.some(f => f.toLowerCase() === lower);
}

/**
 * Apply the category policy, preserving order.
 */
export function filterItems(items: readonly Item[], policy: CategoryPolicy): Item[] {
  const notDenied = items.filter(item => !isDenied(item.category, policy.denyList));
  const passed = notDenied.filter(item => isAllowed(item.category, policy.fandoms));

  log.debug('Category filter applied', {
    input: items.length,
    denied: items.length - notDenied.length,
    notAllowed: notDenied.length - passed.length,
    passed: passed.length,
  });

  return passed;
}

/**
 * Keep the first occurrence of every id, in first-seen order.
 */
export function dedupeById(items: readonly Item[]): Item[] {
  const seen = new Set<string>();
  const unique: Item[] = [];

  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    unique.push(item);
  }

  return unique;
}

export interface NormalizeAndFilterResult {
  items: Item[];
  droppedCount: number;
  duplicateCount: number;
}

/**
 * Raw entries → filtered, in-cycle-unique items.
 */
export function normalizeAndFilter(
  entries: readonly RawCatalogEntry[],
  policy: CategoryPolicy,
  context: NormalizeContext
): NormalizeAndFilterResult {
  const { items, droppedCount } = normalizeEntries(entries, context);
  const filtered = filterItems(items, policy);
  const unique = dedupeById(filtered);

  log.info('Catalog entries normalized', {
    entries: entries.length,
    dropped: droppedCount,
    filtered: filtered.length,
    duplicates: filtered.length - unique.length,
    remaining: unique.length,
  });

  return {
    items: unique,
    droppedCount,
    duplicateCount: filtered.length - unique.length,
  };
}
