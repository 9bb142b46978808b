/**
 * Popcast — In-memory Ledger
 *
 * Non-durable ledger for tests and one-off inspection runs.
 */

import type { Ledger } from './base';
import type { LedgerEntry } from '../types';

export class MemoryLedger implements Ledger {
  readonly backend = 'memory';

  private readonly index = new Map<string, LedgerEntry>();

  constructor(seed: readonly LedgerEntry[] = []) {
    for (const entry of seed) {
      if (!this.index.has(entry.itemId)) this.index.set(entry.itemId, { ...entry });
    }
  }

  async open(): Promise<void> {}

  async contains(itemId: string): Promise<boolean> {
    return this.index.has(itemId);
  }

  async record(itemId: string, announcedAt: Date, sourcePage?: string): Promise<void> {
    if (this.index.has(itemId)) return;
    this.index.set(itemId, { itemId, announcedAt: announcedAt.toISOString(), sourcePage });
  }

  async entries(): Promise<LedgerEntry[]> {
    return Array.from(this.index.values(), entry => ({ ...entry }));
  }

  async close(): Promise<void> {}
}
