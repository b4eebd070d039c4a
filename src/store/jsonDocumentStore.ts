import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Logger } from 'pino';
import type { z } from 'zod/v4';

import { HousekeeperError } from '../errors.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively rebuilds plain objects with their keys in code-point order. */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }
  if (!isObject(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

export function serializeDocument(value: unknown): string {
  return `${JSON.stringify(sortKeys(value), null, 2)}\n`;
}

function errorCode(error: unknown): string | undefined {
  if (isObject(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface JsonDocumentStoreOptions<T> {
  path: string;
  schema: z.ZodType<T>;
  logger?: Logger;
}

/**
 * One JSON document on disk, overwritten whole on every write. Writes go
 * through a temp file and a rename, one at a time.
 */
export class JsonDocumentStore<T> {
  readonly path: string;

  private readonly schema: z.ZodType<T>;
  private readonly logger?: Logger;
  private persistQueue: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(opts: JsonDocumentStoreOptions<T>) {
    this.path = opts.path;
    this.schema = opts.schema;
    this.logger = opts.logger;
  }

  /** `null` when the document is absent or does not match its schema. */
  async read(): Promise<T | null> {
    await this.persistQueue;

    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new HousekeeperError('INTERNAL', `Cannot read ${this.path}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      this.logger?.warn({ path: this.path, err: error }, 'Ignoring document that is not valid JSON');
      return null;
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      this.logger?.warn({ path: this.path, issues: result.error.issues.length }, 'Ignoring document with unexpected shape');
      return null;
    }
    return result.data;
  }

  async write(value: T): Promise<void> {
    const content = serializeDocument(value);
    const tmpPath = `${this.path}.${process.pid}.tmp`;

    const write = this.persistQueue.then(async () => {
      if (!this.dirReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.dirReady = true;
      }
      await writeFile(tmpPath, content, 'utf8');
      await rename(tmpPath, this.path);
    });

    this.persistQueue = write.catch((error: unknown) => {
      this.logger?.error({ path: this.path, err: error }, 'Document write failed');
    });
    await write;
  }
}
