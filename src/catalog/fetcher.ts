/**
 * Popcast — Page Fetcher
 *
 * Fetches every configured page from a catalog source with bounded
 * parallelism. A failing page is recorded and skipped; the rest still run.
 * Output is reassembled in configured page order, not completion order.
 */

import type { CatalogSource } from './base';
import type { CycleFailure, PageFetchOutcome, RawCatalogEntry } from '../types';
import { mapSettledWithConcurrency } from '../lib/async';
import { AllSourcesFailedError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'fetcher' });

export interface FetchPagesOptions {
  /** Maximum simultaneous page requests */
  concurrency: number;
  /** Per-page timeout in ms */
  timeoutMs: number;
}

export interface FetchPagesResult {
  outcomes: PageFetchOutcome[];
  /** Entries of all successful pages: page order, then within-page order */
  entries: RawCatalogEntry[];
  failures: CycleFailure[];
  /** Every page failed (or none were configured) */
  allFailed: boolean;
}

/**
 * Fetch all pages. Never throws; per-page errors end up in `failures`.
 */
export async function fetchPages(
  source: CatalogSource,
  pages: readonly string[],
  region: string,
  options: FetchPagesOptions
): Promise<FetchPagesResult> {
  const settled = await mapSettledWithConcurrency(pages, options.concurrency, pageId =>
    source.safeFetch(pageId, region, options.timeoutMs)
  );

  const outcomes: PageFetchOutcome[] = settled.map((result, index) =>
    result.status === 'fulfilled'
      ? result.value
      : { pageId: pages[index], ok: false, error: errorMessage(result.reason), durationMs: 0 }
  );

  const entries: RawCatalogEntry[] = [];
  const failures: CycleFailure[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      entries.push(...outcome.entries);
    } else {
      failures.push({ kind: 'source_fetch', pageId: outcome.pageId, message: outcome.error });
    }
  }

  const allFailed = outcomes.every(o => !o.ok);

  if (allFailed) {
    const error = new AllSourcesFailedError(pages.length);
    failures.push({ kind: error.kind, message: error.message });
    log.warn('Degraded cycle: no catalog page could be fetched', { pages: pages.length });
  } else {
    log.info('Catalog pages fetched', {
      pages: pages.length,
      failed: failures.length,
      entries: entries.length,
    });
  }

  return { outcomes, entries, failures, allFailed };
}
