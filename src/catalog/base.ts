/**
 * Popcast — Catalog Source Base
 *
 * Abstract base class for catalog sources.
 * Each source implements `fetch` for one page; `safeFetch` adds the
 * per-call timeout, logging and error capture.
 */

import type { PageFetchOutcome, RawCatalogEntry } from '../types';
import { withTimeout } from '../lib/async';
import { logger, errorMessage, type Logger } from '../lib/logger';

/**
 * Abstract base class for catalog sources.
 */
export abstract class CatalogSource {
  abstract readonly name: string;

  protected logger: Logger = logger.child({ source: this.constructor.name });

  /**
   * Fetch raw listing entries for one page.
   * Throws on any failure (network, status, markup).
   */
  abstract fetch(pageId: string, region: string): Promise<RawCatalogEntry[]>;

  /**
   * Execute fetch with a timeout, logging and error capture.
   * Never throws.
   */
  async safeFetch(pageId: string, region: string, timeoutMs: number): Promise<PageFetchOutcome> {
    const startTime = Date.now();
    this.logger.debug('Starting page fetch', { pageId, region });

    try {
      const entries = await withTimeout(
        this.fetch(pageId, region),
        timeoutMs,
        `${this.name} page "${pageId}"`
      );
      const durationMs = Date.now() - startTime;

      this.logger.info('Page fetch completed', {
        pageId,
        entries: entries.length,
        durationMs,
      });

      return { pageId, ok: true, entries, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = errorMessage(error);

      this.logger.warn('Page fetch failed', { pageId, error: message, durationMs });

      return { pageId, ok: false, error: message, durationMs };
    }
  }
}
