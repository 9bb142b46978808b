/**
 * Popcast — Pipeline Module
 *
 * Wires configured components into cycles and the scheduler.
 */

import type { PopcastConfig } from '../config';
import type { Ledger } from '../ledger';
import type { CycleDeps } from './cycle';
import { FunkoCatalogSource } from '../catalog';
import { HttpImageFetcher, createPublisher } from '../delivery';

export { runCycle, formatCycleSummary } from './cycle';
export type { CycleControl, CycleDeps, CycleSettings } from './cycle';
export { Scheduler } from './scheduler';
export type { CycleListener, CycleRunner, SchedulerOptions, SchedulerState } from './scheduler';

/**
 * Build the production dependencies of a cycle around an opened ledger.
 */
export function createCycleDeps(config: PopcastConfig, ledger: Ledger): CycleDeps {
  return {
    source: new FunkoCatalogSource({ timeoutMs: config.requestTimeoutMs }),
    ledger,
    publisher: createPublisher(config.publisher, config.requestTimeoutMs),
    imageFetcher: new HttpImageFetcher({ timeoutMs: config.requestTimeoutMs }),
  };
}
