/**
 * Popcast — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  RawCatalogEntry,
  PageFetchOutcome,
  Availability,
  Item,
  FandomSelection,
  CategoryPolicy,
} from './catalog';

export type {
  LedgerEntry,
  CycleFailureKind,
  CycleFailure,
  CycleResult,
} from './cycle';
