/**
 * Popcast — File Ledger
 *
 * Append-only JSON-lines log, one LedgerEntry per line.
 * The whole log is replayed into memory on open; every record appends
 * exactly one line. Readers of the file never need a lock: lines are only
 * ever added. A torn last line is skipped on replay and terminated on open,
 * so the next append starts on a line of its own.
 */

import { appendFile, mkdir, open as openFile, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Ledger } from './base';
import type { LedgerEntry } from '../types';
import { LedgerUnavailableError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const LedgerLineSchema = z.object({
  itemId: z.string().min(1),
  announcedAt: z.string().min(1),
  sourcePage: z.string().optional(),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileLedger implements Ledger {
  readonly backend = 'file';

  private readonly index = new Map<string, LedgerEntry>();
  private opened = false;
  // Single writer: every record runs after the previous one settles.
  private writeChain: Promise<void> = Promise.resolve();
  private readonly log = logger.child({ component: 'ledger', backend: 'file' });

  constructor(readonly path: string) {}

  async open(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      // Creates the file if needed and proves it is writable.
      const handle = await openFile(this.path, 'a');
      await handle.close();
    } catch (error) {
      throw new LedgerUnavailableError(`Ledger file ${this.path} is not writable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let content = '';
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new LedgerUnavailableError(`Ledger file ${this.path} is not readable: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    this.index.clear();
    let skipped = 0;

    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      const entry = this.parseLine(line);
      if (!entry) {
        skipped++;
        continue;
      }
      if (!this.index.has(entry.itemId)) {
        this.index.set(entry.itemId, entry);
      }
    }

    if (skipped > 0) {
      this.log.warn('Skipped malformed ledger lines', { path: this.path, skipped });
    }

    if (content !== '' && !content.endsWith('\n')) {
      try {
        await appendFile(this.path, '\n', 'utf-8');
      } catch (error) {
        throw new LedgerUnavailableError(`Failed to terminate torn line in ${this.path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      this.log.warn('Terminated torn last ledger line', { path: this.path });
    }

    this.opened = true;
    this.log.info('Ledger loaded', { path: this.path, entries: this.index.size });
  }

  async contains(itemId: string): Promise<boolean> {
    this.assertOpen();
    return this.index.has(itemId);
  }

  record(itemId: string, announcedAt: Date, sourcePage?: string): Promise<void> {
    const write = this.writeChain.then(async () => {
      this.assertOpen();
      if (this.index.has(itemId)) return;

      const entry: LedgerEntry = { itemId, announcedAt: announcedAt.toISOString(), sourcePage };

      try {
        await appendFile(this.path, `${JSON.stringify(entry)}\n`, 'utf-8');
      } catch (error) {
        throw new LedgerUnavailableError(`Failed to append to ledger ${this.path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      this.index.set(itemId, entry);
    });

    // Keep the chain alive after a failed write; the caller still sees the error.
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  async entries(): Promise<LedgerEntry[]> {
    this.assertOpen();
    return Array.from(this.index.values(), entry => ({ ...entry }));
  }

  async close(): Promise<void> {
    await this.writeChain;
    this.opened = false;
  }

  private parseLine(line: string): LedgerEntry | null {
    try {
      const parsed = LedgerLineSchema.safeParse(JSON.parse(line));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new LedgerUnavailableError(`Ledger ${this.path} is not open`);
    }
  }
}
