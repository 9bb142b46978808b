/**
 * Popcast — Cycle
 *
 * One Fetch → Normalize/Filter → Select → Announce pass.
 * Stages run strictly in sequence; only the fetch stage is parallel inside.
 */

import { nanoid } from 'nanoid';
import type { CycleFailure, CycleResult, Item } from '../types';
import type { PopcastConfig } from '../config';
import type { CatalogSource } from '../catalog/base';
import type { Ledger } from '../ledger';
import type { ImageFetcher, Publisher } from '../delivery';
import { fetchPages } from '../catalog/fetcher';
import { normalizeAndFilter } from '../catalog/filter';
import { selectItems } from '../selection/selector';
import { announceItems } from '../delivery/announcer';
import { LedgerUnavailableError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'cycle' });

// ============================================================
// TYPES
// ============================================================

export interface CycleDeps {
  source: CatalogSource;
  ledger: Ledger;
  publisher: Publisher;
  imageFetcher: ImageFetcher;
}

export type CycleSettings = Pick<
  PopcastConfig,
  | 'region'
  | 'scrapePages'
  | 'maxPostsPerCheck'
  | 'postDelaySeconds'
  | 'fandoms'
  | 'denyList'
  | 'dryRun'
  | 'imageFailurePolicy'
  | 'fetchConcurrency'
  | 'requestTimeoutMs'
>;

export interface CycleControl {
  /** True once shutdown was requested; checked between items */
  shouldStop?: () => boolean;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
}

// ============================================================
// RUN
// ============================================================

/**
 * Run one cycle. Per-page and per-item problems are reported in
 * `failures`; a ledger outage aborts the cycle as degraded.
 */
export async function runCycle(
  deps: CycleDeps,
  settings: CycleSettings,
  control: CycleControl = {}
): Promise<CycleResult> {
  const now = control.now ?? (() => new Date());
  const cycleId = nanoid(10);
  const startedAt = now();

  log.info('Cycle started', { cycleId, pages: settings.scrapePages, dryRun: settings.dryRun });

  const failures: CycleFailure[] = [];
  const base = {
    cycleId,
    startedAt: startedAt.toISOString(),
    dryRun: settings.dryRun,
  };

  // 1. Fetch
  const fetched = await fetchPages(deps.source, settings.scrapePages, settings.region, {
    concurrency: settings.fetchConcurrency,
    timeoutMs: settings.requestTimeoutMs,
  });
  failures.push(...fetched.failures);

  if (fetched.allFailed) {
    return finish({
      ...base,
      completedAt: now().toISOString(),
      fetchedCount: 0,
      droppedCount: 0,
      filteredCount: 0,
      eligibleItems: [],
      selectedItems: [],
      announcedCount: 0,
      announcedIds: [],
      failures,
      degraded: true,
      interrupted: false,
    });
  }

  // 2. Normalize and filter
  const filtered = normalizeAndFilter(
    fetched.entries,
    { fandoms: settings.fandoms, denyList: settings.denyList },
    { region: settings.region, discoveredAt: startedAt.toISOString() }
  );

  const counts = {
    fetchedCount: fetched.entries.length,
    droppedCount: filtered.droppedCount,
    filteredCount: filtered.items.length,
  };

  // 3. Select
  let eligibleItems: Item[];
  let selectedItems: Item[];
  try {
    const selection = await selectItems(filtered.items, deps.ledger, settings.maxPostsPerCheck);
    eligibleItems = selection.eligible;
    selectedItems = selection.selected;
  } catch (error) {
    if (!(error instanceof LedgerUnavailableError)) throw error;
    log.error('Ledger unavailable during selection, aborting cycle', { cycleId, error: errorMessage(error) });
    failures.push({ kind: 'ledger_unavailable', message: error.message });
    return finish({
      ...base,
      ...counts,
      completedAt: now().toISOString(),
      eligibleItems: [],
      selectedItems: [],
      announcedCount: 0,
      announcedIds: [],
      failures,
      degraded: true,
      interrupted: false,
    });
  }

  // 4. Announce
  const announced = await announceItems(selectedItems, deps, {
    dryRun: settings.dryRun,
    imageFailurePolicy: settings.imageFailurePolicy,
    postDelayMs: settings.postDelaySeconds * 1000,
    callTimeoutMs: settings.requestTimeoutMs,
    shouldStop: control.shouldStop,
    sleep: control.sleep,
    now,
  });
  failures.push(...announced.failures);

  return finish({
    ...base,
    ...counts,
    completedAt: now().toISOString(),
    eligibleItems,
    selectedItems,
    announcedCount: announced.announcedIds.length,
    announcedIds: announced.announcedIds,
    failures,
    degraded: announced.ledgerFailed,
    interrupted: announced.interrupted,
  });
}

function finish(result: CycleResult): CycleResult {
  const summary = formatCycleSummary(result);
  if (result.degraded) {
    log.warn(summary, { cycleId: result.cycleId });
  } else {
    log.info(summary, { cycleId: result.cycleId });
  }
  for (const failure of result.failures) {
    log.warn(`Cycle failure: ${failure.kind}`, {
      cycleId: result.cycleId,
      pageId: failure.pageId,
      itemId: failure.itemId,
      message: failure.message,
    });
  }
  return result;
}

// ============================================================
// SUMMARY
// ============================================================

/**
 * One-line summary of a finished cycle.
 */
export function formatCycleSummary(result: CycleResult): string {
  const parts = [
    `fetched=${result.fetchedCount}`,
    `dropped=${result.droppedCount}`,
    `filtered=${result.filteredCount}`,
    `eligible=${result.eligibleItems.length}`,
    `selected=${result.selectedItems.length}`,
    `announced=${result.announcedCount}`,
    `failures=${result.failures.length}`,
  ];

  const flags = [
    result.dryRun && 'dry-run',
    result.degraded && 'degraded',
    result.interrupted && 'interrupted',
  ].filter(Boolean);

  const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
  return `Cycle ${result.cycleId} finished: ${parts.join(' ')}${suffix}`;
}
