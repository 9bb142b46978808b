/**
 * Popcast — Supabase Ledger
 *
 * Ledger backed by a Postgres table through Supabase:
 *
 *   create table announced_items (
 *     item_id      text primary key,
 *     announced_at timestamptz not null,
 *     source_page  text
 *   );
 *
 * The primary key makes `record` idempotent (upsert, ignore duplicates).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Ledger } from './base';
import type { LedgerEntry } from '../types';
import { describeSupabaseError } from '../db/client';
import { LedgerUnavailableError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const LedgerRowSchema = z.object({
  item_id: z.string(),
  announced_at: z.string(),
  source_page: z.string().nullable().optional(),
});

export class SupabaseLedger implements Ledger {
  readonly backend = 'supabase';

  private readonly log = logger.child({ component: 'ledger', backend: 'supabase' });

  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = 'announced_items'
  ) {}

  async open(): Promise<void> {
    await this.run('probe', async () => {
      const { error } = await this.client.from(this.table).select('item_id').limit(1);
      if (error) throw new Error(describeSupabaseError(error));
    });
    this.log.info('Ledger reachable', { table: this.table });
  }

  async contains(itemId: string): Promise<boolean> {
    return this.run('lookup', async () => {
      const { data, error } = await this.client
        .from(this.table)
        .select('item_id')
        .eq('item_id', itemId)
        .limit(1);
      if (error) throw new Error(describeSupabaseError(error));
      return z.array(LedgerRowSchema.pick({ item_id: true })).parse(data ?? []).length > 0;
    });
  }

  async record(itemId: string, announcedAt: Date, sourcePage?: string): Promise<void> {
    await this.run('record', async () => {
      const { error } = await this.client.from(this.table).upsert(
        {
          item_id: itemId,
          announced_at: announcedAt.toISOString(),
          source_page: sourcePage ?? null,
        },
        { onConflict: 'item_id', ignoreDuplicates: true }
      );
      if (error) throw new Error(describeSupabaseError(error));
    });
  }

  async entries(): Promise<LedgerEntry[]> {
    return this.run('list', async () => {
      const { data, error } = await this.client
        .from(this.table)
        .select('item_id, announced_at, source_page')
        .order('announced_at', { ascending: true });
      if (error) throw new Error(describeSupabaseError(error));

      return z
        .array(LedgerRowSchema)
        .parse(data ?? [])
        .map(row => ({
          itemId: row.item_id,
          announcedAt: row.announced_at,
          sourcePage: row.source_page ?? undefined,
        }));
    });
  }

  async close(): Promise<void> {}

  /**
   * Any failure talking to the table means the ledger is unavailable.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new LedgerUnavailableError(`Ledger ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
