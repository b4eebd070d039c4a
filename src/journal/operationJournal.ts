import { appendFile, mkdir } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { dirname } from 'node:path';

import type { Logger } from 'pino';

import type { ErrorCode } from '../errors.js';

export type JournalResult = 'success' | 'error' | 'blocked';

export interface JournalEntry {
  id: string;
  timestamp: string;
  tool: string;
  result: JournalResult;
  durationMs?: number;
  errorCode?: ErrorCode;
  message?: string;
  details?: Record<string, unknown>;
}

export interface JournalQuery {
  tool?: string;
  result?: JournalResult;
  since?: string;
  limit?: number;
}

export interface OperationJournalOptions {
  maxEntries: number;
  persistPath?: string;
  logger?: Logger;
}

export class OperationJournal {
  private readonly entries: JournalEntry[] = [];
  private readonly maxEntries: number;
  private readonly persistPath?: string;
  private readonly logger?: Logger;
  private persistQueue: Promise<void> = Promise.resolve();
  private persistDirReady = false;

  constructor(opts: OperationJournalOptions) {
    this.maxEntries = Number.isFinite(opts.maxEntries) ? Math.max(1, Math.floor(opts.maxEntries)) : 1;
    this.persistPath = opts.persistPath;
    this.logger = opts.logger;
  }

  async record(entry: Omit<JournalEntry, 'id' | 'timestamp'>): Promise<JournalEntry> {
    const created: JournalEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry
    };

    this.entries.push(created);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    await this.persist(created);
    return created;
  }

  query(query: JournalQuery = {}): JournalEntry[] {
    const sinceMs = query.since ? Date.parse(query.since) : Number.NaN;
    const limit = query.limit && Number.isFinite(query.limit) ? Math.max(1, query.limit) : 100;

    const filtered = this.entries.filter((entry) => {
      if (query.tool && entry.tool !== query.tool) {
        return false;
      }
      if (query.result && entry.result !== query.result) {
        return false;
      }
      if (Number.isFinite(sinceMs) && Date.parse(entry.timestamp) < sinceMs) {
        return false;
      }
      return true;
    });

    return filtered.slice(-limit).reverse();
  }

  /** Journal persistence is best effort: a failed append is logged, never raised to the tool call. */
  private async persist(entry: JournalEntry): Promise<void> {
    const persistPath = this.persistPath;
    if (!persistPath) {
      return;
    }

    const line = `${JSON.stringify(entry)}\n`;
    const write = this.persistQueue.then(async () => {
      if (!this.persistDirReady) {
        await mkdir(dirname(persistPath), { recursive: true });
        this.persistDirReady = true;
      }
      await appendFile(persistPath, line, 'utf8');
    });

    this.persistQueue = write.catch((error: unknown) => {
      this.logger?.warn({ path: persistPath, err: error }, 'Journal append failed');
    });
    await this.persistQueue;
  }
}
