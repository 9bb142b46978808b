/**
 * Popcast — Ledger Module
 */

import type { LedgerConfig } from '../config';
import { createLedgerClient } from '../db/client';
import type { Ledger } from './base';
import { FileLedger } from './file';
import { SupabaseLedger } from './supabase';

export type { Ledger } from './base';
export { FileLedger } from './file';
export { MemoryLedger } from './memory';
export { SupabaseLedger } from './supabase';

/**
 * Build the configured ledger. Call `open()` before the first cycle.
 */
export function createLedger(config: LedgerConfig): Ledger {
  switch (config.backend) {
    case 'file':
      return new FileLedger(config.path);
    case 'supabase':
      return new SupabaseLedger(
        createLedgerClient({ url: config.url, serviceRoleKey: config.serviceRoleKey }),
        config.table
      );
  }
}
