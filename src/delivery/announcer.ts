/**
 * Popcast — Announcer
 *
 * Publishes selected items one at a time and records each success in the
 * ledger. Order per item: resolve images, publish, record.
 *
 * The product image follows the image failure policy. The in-box image is
 * optional: it is only added next to a resolved product image, and losing
 * it never holds a post back.
 *
 * An item is recorded only after its publish succeeded, and published at
 * most once per call. A ledger write failure stops the batch: the item
 * was posted but is not remembered, so carrying on risks repeats.
 */

import type { Item, CycleFailure } from '../types';
import type { Ledger } from '../ledger';
import type { ImageFailurePolicy } from '../config';
import type { AnnouncementImage, ImageFetcher, Publisher } from './types';
import { formatAltText, formatPackagingAltText, formatPostText } from './post-format';
import { withTimeout, sleep as defaultSleep } from '../lib/async';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'announcer' });

// ============================================================
// TYPES
// ============================================================

export interface AnnouncerDeps {
  ledger: Ledger;
  publisher: Publisher;
  imageFetcher: ImageFetcher;
}

export interface AnnounceOptions {
  dryRun: boolean;
  imageFailurePolicy: ImageFailurePolicy;
  /** Pause between successful posts; 0 disables */
  postDelayMs: number;
  /** Per-call timeout for each image download and the publish */
  callTimeoutMs: number;
  /** Checked before each item; true once shutdown was requested */
  shouldStop?: () => boolean;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
}

export interface AnnounceResult {
  /** Items published this call, in publish order (dry-run: none) */
  announcedIds: string[];
  /** Items that would have been published (dry-run only) */
  previewIds: string[];
  failures: CycleFailure[];
  /** Stopped early because shutdown was requested */
  interrupted: boolean;
  /** Stopped early because the ledger could not be written */
  ledgerFailed: boolean;
}

// ============================================================
// ANNOUNCE
// ============================================================

export async function announceItems(
  items: readonly Item[],
  deps: AnnouncerDeps,
  options: AnnounceOptions
): Promise<AnnounceResult> {
  const shouldStop = options.shouldStop ?? (() => false);
  const pause = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());

  const result: AnnounceResult = {
    announcedIds: [],
    previewIds: [],
    failures: [],
    interrupted: false,
    ledgerFailed: false,
  };
  const attempted = new Set<string>();

  for (const item of items) {
    if (shouldStop()) {
      result.interrupted = true;
      log.info('Shutdown requested, stopping before next item', { itemId: item.id });
      break;
    }

    if (attempted.has(item.id)) continue;
    attempted.add(item.id);

    const text = formatPostText(item);

    if (options.dryRun) {
      log.info('[dry-run] Would announce', { itemId: item.id, title: item.title, text });
      result.previewIds.push(item.id);
      continue;
    }

    if (result.announcedIds.length > 0 && options.postDelayMs > 0) {
      await pause(options.postDelayMs);
      if (shouldStop()) {
        result.interrupted = true;
        break;
      }
    }

    const images: AnnouncementImage[] = [];
    try {
      const data = await withTimeout(
        deps.imageFetcher.resolve(item.imageUrl),
        options.callTimeoutMs,
        `Image for ${item.id}`
      );
      images.push({ url: item.imageUrl, data, alt: formatAltText(item) });
    } catch (error) {
      result.failures.push({ kind: 'image_resolution', itemId: item.id, message: errorMessage(error) });
      if (options.imageFailurePolicy === 'skip') {
        log.warn('Image unavailable, skipping item this cycle', { itemId: item.id, error: errorMessage(error) });
        continue;
      }
      log.warn('Image unavailable, posting text only', { itemId: item.id, error: errorMessage(error) });
    }

    if (images.length > 0 && item.imageUrlAlt) {
      try {
        const data = await withTimeout(
          deps.imageFetcher.resolve(item.imageUrlAlt),
          options.callTimeoutMs,
          `Packaging image for ${item.id}`
        );
        images.push({ url: item.imageUrlAlt, data, alt: formatPackagingAltText(item) });
      } catch (error) {
        log.warn('Packaging image unavailable, posting the product image only', {
          itemId: item.id,
          error: errorMessage(error),
        });
      }
    }

    try {
      const receipt = await withTimeout(
        deps.publisher.announce({ item, text, images }),
        options.callTimeoutMs,
        `Publish ${item.id}`
      );
      log.info('Announced', { itemId: item.id, postId: receipt.postId, publisher: deps.publisher.name });
    } catch (error) {
      result.failures.push({ kind: 'publish', itemId: item.id, message: errorMessage(error) });
      log.error('Publish failed, item stays eligible', { itemId: item.id, error: errorMessage(error) });
      continue;
    }

    result.announcedIds.push(item.id);

    try {
      await deps.ledger.record(item.id, now(), item.sourcePage);
    } catch (error) {
      result.failures.push({ kind: 'ledger_unavailable', itemId: item.id, message: errorMessage(error) });
      result.ledgerFailed = true;
      log.error('Announced but not recorded, stopping', { itemId: item.id, error: errorMessage(error) });
      break;
    }
  }

  return result;
}
