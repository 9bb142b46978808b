/**
 * Popcast — Selector
 *
 * Picks which filtered items to announce this cycle.
 * Deterministic: output order is input order, never completion or hash order.
 */

import type { Item } from '../types';
import type { Ledger } from '../ledger';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'selector' });

export interface SelectionResult {
  /** Items not yet in the ledger, in input order */
  eligible: Item[];
  /** The first `maxPerCycle` eligible items (all of them when the cap is 0) */
  selected: Item[];
  /** Items skipped because the ledger already has them */
  alreadyAnnounced: number;
}

/**
 * Apply the per-cycle cap. 0 means unlimited.
 */
export function applyCap<T>(items: readonly T[], maxPerCycle: number): T[] {
  return maxPerCycle > 0 ? items.slice(0, maxPerCycle) : [...items];
}

/**
 * Compute eligible and selected items. Ledger errors propagate
 * (LedgerUnavailableError), since selecting without the ledger could
 * repeat announcements.
 */
export async function selectItems(
  items: readonly Item[],
  ledger: Ledger,
  maxPerCycle: number
): Promise<SelectionResult> {
  const eligible: Item[] = [];

  // Sequential lookups keep the ledger single-reader and the order fixed.
  for (const item of items) {
    if (!(await ledger.contains(item.id))) {
      eligible.push(item);
    }
  }

  const selected = applyCap(eligible, maxPerCycle);

  if (selected.length < eligible.length) {
    log.info('Per-cycle cap reached, remainder stays eligible', {
      eligible: eligible.length,
      selected: selected.length,
      deferred: eligible.length - selected.length,
    });
  }

  return {
    eligible,
    selected,
    alreadyAnnounced: items.length - eligible.length,
  };
}
