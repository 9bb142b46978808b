/**
 * Popcast — Ledger & Cycle Types
 */

import type { Item } from './catalog';

/**
 * One announced item. At most one entry per itemId.
 */
export interface LedgerEntry {
  itemId: string;
  announcedAt: string;
  sourcePage?: string;
}

export type CycleFailureKind =
  | 'source_fetch'
  | 'image_resolution'
  | 'publish'
  | 'ledger_unavailable'
  | 'all_sources_failed';

export interface CycleFailure {
  kind: CycleFailureKind;
  message: string;
  pageId?: string;
  itemId?: string;
}

/**
 * Summary of a single Fetch → Filter → Select → Announce pass.
 * Ephemeral: logged and handed to listeners, never persisted.
 */
export interface CycleResult {
  cycleId: string;
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  /** Raw entries returned by all pages */
  fetchedCount: number;
  /** Raw entries dropped because a required field was missing */
  droppedCount: number;
  /** Items left after normalization, category filtering and in-cycle dedup */
  filteredCount: number;
  /** Filtered items not yet in the ledger, in pipeline order */
  eligibleItems: Item[];
  /** Eligible items picked for this cycle (after the per-cycle cap) */
  selectedItems: Item[];
  announcedCount: number;
  announcedIds: string[];
  failures: CycleFailure[];
  /** All pages failed or the ledger became unavailable */
  degraded: boolean;
  /** Shutdown was requested before every selected item was processed */
  interrupted: boolean;
}
