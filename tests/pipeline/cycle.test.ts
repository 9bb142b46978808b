/**
 * Tests for a full Fetch → Filter → Select → Announce cycle
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import { CatalogSource } from '../../src/catalog/base';
import { runCycle, formatCycleSummary, type CycleDeps, type CycleSettings } from '../../src/pipeline/cycle';
import type { ImageFetcher, Publisher } from '../../src/delivery/types';
import { FileLedger } from '../../src/ledger/file';
import { MemoryLedger } from '../../src/ledger/memory';
import type { Ledger } from '../../src/ledger';
import { LedgerUnavailableError, SourceFetchError } from '../../src/lib/errors';
import type { CycleResult, RawCatalogEntry } from '../../src/types';

class FixtureSource extends CatalogSource {
  readonly name = 'fixture';

  constructor(private readonly pages: Record<string, RawCatalogEntry[] | 'fail'>) {
    super();
  }

  async fetch(pageId: string): Promise<RawCatalogEntry[]> {
    const page = this.pages[pageId];
    if (page === undefined || page === 'fail') {
      throw new SourceFetchError(pageId, `HTTP 503 for ${pageId}`, { status: 503 });
    }
    return page;
  }
}

const raw = (pageId: string, sku: string, license: string): RawCatalogEntry => ({
  pageId,
  sku,
  name: `Pop! ${sku}`,
  productUrl: `https://funko.com/pl/${sku}.html`,
  salePrice: '14.99',
  imageUrl: `https://cdn.example.test/img/${sku}.png`,
  license,
});

const settings: CycleSettings = {
  region: 'pl',
  scrapePages: ['sale'],
  maxPostsPerCheck: 0,
  postDelaySeconds: 0,
  fandoms: 'All',
  denyList: ['nba'],
  dryRun: false,
  imageFailurePolicy: 'skip',
  fetchConcurrency: 3,
  requestTimeoutMs: 1000,
};

function makeDeps(source: CatalogSource, ledger: Ledger) {
  const announce = vi.fn<Publisher['announce']>(async ({ item }) => ({ postId: `post-${item.id}` }));
  const resolve = vi.fn<ImageFetcher['resolve']>(async () => ({
    bytes: new Uint8Array([1]),
    mimeType: 'image/png',
  }));
  const deps: CycleDeps = {
    source,
    ledger,
    publisher: { name: 'fake', announce },
    imageFetcher: { resolve },
  };
  return { deps, announce, resolve };
}

const ids = (items: CycleResult['eligibleItems']) => items.map(item => item.id);

describe('runCycle', () => {
  const abcSource = () =>
    new FixtureSource({
      sale: [raw('sale', 'A', 'NBA'), raw('sale', 'B', 'Movies'), raw('sale', 'C', 'Movies')],
    });

  it('announces one item per cycle under a cap of one', async () => {
    const ledger = new MemoryLedger();
    const { deps } = makeDeps(abcSource(), ledger);
    const capped = { ...settings, maxPostsPerCheck: 1 };

    const first = await runCycle(deps, capped);

    expect(first.filteredCount).toBe(2);
    expect(ids(first.eligibleItems)).toEqual(['B', 'C']);
    expect(ids(first.selectedItems)).toEqual(['B']);
    expect(first.announcedIds).toEqual(['B']);
    expect((await ledger.entries()).map(e => e.itemId)).toEqual(['B']);

    const second = await runCycle(deps, capped);

    expect(ids(second.eligibleItems)).toEqual(['C']);
    expect(second.announcedIds).toEqual(['C']);
    expect((await ledger.entries()).map(e => e.itemId)).toEqual(['B', 'C']);
  });

  it('never announces an item twice across cycles and restarts', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'popcast-cycle-'));
    const path = join(dir, 'announced.jsonl');

    try {
      const firstLedger = new FileLedger(path);
      await firstLedger.open();
      const first = makeDeps(abcSource(), firstLedger);
      await runCycle(first.deps, settings);
      await firstLedger.close();

      const secondLedger = new FileLedger(path);
      await secondLedger.open();
      const second = makeDeps(abcSource(), secondLedger);
      const result = await runCycle(second.deps, settings);

      expect(first.announce).toHaveBeenCalledTimes(2);
      expect(second.announce).not.toHaveBeenCalled();
      expect(result.announcedCount).toBe(0);
      expect(result.eligibleItems).toEqual([]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('still announces from healthy pages when some fail', async () => {
    const source = new FixtureSource({
      sale: [raw('sale', 'A', 'Marvel')],
      'new-releases': 'fail',
      exclusives: [raw('exclusives', 'B', 'Marvel')],
      'coming-soon': 'fail',
      'back-in-stock': [raw('back-in-stock', 'C', 'Marvel')],
    });
    const { deps } = makeDeps(source, new MemoryLedger());

    const result = await runCycle(deps, {
      ...settings,
      scrapePages: ['sale', 'new-releases', 'exclusives', 'coming-soon', 'back-in-stock'],
    });

    expect(result.announcedIds).toEqual(['A', 'B', 'C']);
    expect(result.failures.filter(f => f.kind === 'source_fetch').map(f => f.pageId)).toEqual([
      'new-releases',
      'coming-soon',
    ]);
    expect(result.degraded).toBe(false);
  });

  it('reports a degraded cycle when every page fails', async () => {
    const { deps, announce } = makeDeps(new FixtureSource({ sale: 'fail' }), new MemoryLedger());

    const result = await runCycle(deps, settings);

    expect(result.degraded).toBe(true);
    expect(result.fetchedCount).toBe(0);
    expect(result.failures.map(f => f.kind)).toEqual(['source_fetch', 'all_sources_failed']);
    expect(announce).not.toHaveBeenCalled();
  });

  it('aborts as degraded when the ledger is unavailable during selection', async () => {
    const ledger = new MemoryLedger();
    vi.spyOn(ledger, 'contains').mockRejectedValue(new LedgerUnavailableError('Ledger lookup failed: offline'));
    const { deps, announce } = makeDeps(abcSource(), ledger);

    const result = await runCycle(deps, settings);

    expect(result.degraded).toBe(true);
    expect(result.filteredCount).toBe(2);
    expect(result.selectedItems).toEqual([]);
    expect(result.failures).toEqual([{ kind: 'ledger_unavailable', message: 'Ledger lookup failed: offline' }]);
    expect(announce).not.toHaveBeenCalled();
  });

  it('computes the selection without side effects in dry-run', async () => {
    const ledger = new MemoryLedger();
    const { deps, announce } = makeDeps(abcSource(), ledger);

    const result = await runCycle(deps, { ...settings, dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(ids(result.selectedItems)).toEqual(['B', 'C']);
    expect(result.announcedCount).toBe(0);
    expect(announce).not.toHaveBeenCalled();
    expect(await ledger.entries()).toEqual([]);
  });

  it('counts entries dropped during normalization', async () => {
    const source = new FixtureSource({
      sale: [raw('sale', 'B', 'Movies'), { pageId: 'sale', name: 'No id', salePrice: '5' }],
    });
    const { deps } = makeDeps(source, new MemoryLedger());

    const result = await runCycle(deps, settings);

    expect(result.fetchedCount).toBe(2);
    expect(result.droppedCount).toBe(1);
    expect(result.failures).toEqual([]);
  });

  it('uses the injected clock for timestamps and ledger entries', async () => {
    const ledger = new MemoryLedger();
    const { deps } = makeDeps(abcSource(), ledger);
    const now = () => new Date('2026-10-19T08:00:00.000Z');

    const result = await runCycle(deps, { ...settings, maxPostsPerCheck: 1 }, { now });

    expect(result.startedAt).toBe('2026-10-19T08:00:00.000Z');
    expect(result.selectedItems[0].discoveredAt).toBe('2026-10-19T08:00:00.000Z');
    expect(await ledger.entries()).toEqual([
      { itemId: 'B', announcedAt: '2026-10-19T08:00:00.000Z', sourcePage: 'sale' },
    ]);
  });
});

describe('formatCycleSummary', () => {
  it('renders counts and flags on one line', () => {
    const result: CycleResult = {
      cycleId: 'abc123',
      startedAt: '2026-10-19T08:00:00.000Z',
      completedAt: '2026-10-19T08:00:05.000Z',
      dryRun: true,
      fetchedCount: 3,
      droppedCount: 0,
      filteredCount: 2,
      eligibleItems: [],
      selectedItems: [],
      announcedCount: 0,
      announcedIds: [],
      failures: [],
      degraded: false,
      interrupted: false,
    };

    expect(formatCycleSummary(result)).toBe(
      'Cycle abc123 finished: fetched=3 dropped=0 filtered=2 eligible=0 selected=0 announced=0 failures=0 [dry-run]'
    );
  });
});
