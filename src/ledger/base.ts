/**
 * Popcast — Ledger
 *
 * Durable record of announced item ids: the single source of truth for
 * "has this been announced". Implementations must survive restarts.
 *
 * The pipeline always publishes first and records second, so a crash in
 * between can only cause a repeat announcement, never a silently skipped one.
 */

import type { LedgerEntry } from '../types';

export interface Ledger {
  /** Human-readable backend name for logs */
  readonly backend: string;

  /**
   * Connect to / load the store. Throws LedgerUnavailableError when the
   * store cannot be read or written.
   */
  open(): Promise<void>;

  /** True iff an entry exists for this id. */
  contains(itemId: string): Promise<boolean>;

  /**
   * Record an announcement. Recording an id that is already present is a
   * no-op: no error, no second entry.
   */
  record(itemId: string, announcedAt: Date, sourcePage?: string): Promise<void>;

  /** Snapshot of all entries; callers get their own copy. */
  entries(): Promise<LedgerEntry[]>;

  /** Flush pending writes and release resources. */
  close(): Promise<void>;
}
