/**
 * Popcast — Catalog Module
 *
 * Fetch, normalize and filter catalog listings.
 */

export { CatalogSource } from './base';

export {
  FunkoCatalogSource,
  parseCatalogPage,
  buildPageUrl,
  type FunkoSourceOptions,
} from './funko';

export {
  fetchPages,
  type FetchPagesOptions,
  type FetchPagesResult,
} from './fetcher';

export {
  normalizeEntry,
  normalizeEntries,
  generateItemId,
  normalizeBadge,
  parseAvailability,
  type NormalizeContext,
  type NormalizeResult,
} from './normalizer';

export {
  filterItems,
  dedupeById,
  isDenied,
  isAllowed,
  normalizeAndFilter,
  type NormalizeAndFilterResult,
} from './filter';
