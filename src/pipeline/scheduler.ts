/**
 * Popcast — Scheduler
 *
 * Runs cycles back to back with a fixed wait in between.
 *
 *   idle ──start/timer──▶ running ──cycle done──▶ idle
 *     │                      │
 *     └──requestShutdown─────┴──▶ shutting_down (terminal)
 *
 * Cycles never overlap. A shutdown request while running lets the item in
 * flight finish, skips the rest and starts no new cycle.
 */

import type { CycleResult } from '../types';
import type { CycleControl } from './cycle';
import { sleep as defaultSleep } from '../lib/async';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'scheduler' });

export type SchedulerState = 'idle' | 'running' | 'shutting_down';

export type CycleRunner = (control: CycleControl) => Promise<CycleResult>;

export type CycleListener = (result: CycleResult) => void;

export interface SchedulerOptions {
  intervalMs: number;
  /** Resolves true when the wait elapsed, false when aborted */
  sleep?: (ms: number, signal: AbortSignal) => Promise<boolean>;
}

export class Scheduler {
  private currentState: SchedulerState = 'idle';
  private stopRequested = false;
  private completed = 0;
  private readonly abort = new AbortController();
  private readonly listeners = new Set<CycleListener>();
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<boolean>;

  constructor(
    private readonly runCycle: CycleRunner,
    private readonly options: SchedulerOptions
  ) {
    this.wait = options.sleep ?? defaultSleep;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get cyclesCompleted(): number {
    return this.completed;
  }

  get shutdownRequested(): boolean {
    return this.stopRequested;
  }

  /**
   * Subscribe to finished cycles. Returns an unsubscribe function.
   */
  onCycle(listener: CycleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Run cycles until shutdown. The first cycle starts immediately.
   * Resolves once the scheduler reaches `shutting_down`.
   */
  async start(): Promise<void> {
    log.info('Scheduler started', { intervalMs: this.options.intervalMs });

    while (!this.stopRequested) {
      try {
        await this.runOnce();
      } catch (error) {
        log.error('Cycle crashed, waiting for the next one', { error: errorMessage(error) });
      }

      if (this.stopRequested) break;

      log.info('Waiting for next cycle', { minutes: Math.round(this.options.intervalMs / 60000) });
      await this.wait(this.options.intervalMs, this.abort.signal);
    }

    this.currentState = 'shutting_down';
    log.info('Scheduler stopped', { cycles: this.completed });
  }

  /**
   * Run exactly one cycle and notify listeners.
   */
  async runOnce(): Promise<CycleResult> {
    if (this.currentState === 'running') {
      throw new Error('A cycle is already running');
    }

    this.currentState = 'running';
    try {
      const result = await this.runCycle({ shouldStop: () => this.stopRequested });
      this.completed++;
      this.emit(result);
      return result;
    } finally {
      this.currentState = this.stopRequested ? 'shutting_down' : 'idle';
    }
  }

  /**
   * Ask the scheduler to stop. Idempotent.
   */
  requestShutdown(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;

    if (this.currentState === 'running') {
      log.info('Shutdown requested, finishing current item');
    } else {
      log.info('Shutdown requested');
      this.currentState = 'shutting_down';
    }

    this.abort.abort();
  }

  private emit(result: CycleResult): void {
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        log.error('Cycle listener failed', { error: errorMessage(error) });
      }
    }
  }
}
