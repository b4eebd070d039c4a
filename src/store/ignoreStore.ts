import type { JsonDocumentStore } from './jsonDocumentStore.js';

function normalizeFingerprints(fingerprints: Iterable<string>): string[] {
  const out: string[] = [];
  for (const raw of fingerprints) {
    const trimmed = raw.trim();
    if (trimmed) {
      out.push(trimmed);
    }
  }
  return out;
}

/**
 * Persisted set of suppressed fingerprints. Adding a present fingerprint or
 * removing an absent one changes nothing.
 */
export class IgnoreStore {
  constructor(private readonly document: JsonDocumentStore<string[]>) {}

  async list(): Promise<string[]> {
    const stored = await this.document.read();
    return [...new Set(stored ?? [])].sort();
  }

  async asSet(): Promise<Set<string>> {
    return new Set(await this.list());
  }

  async add(fingerprints: Iterable<string>): Promise<string[]> {
    const current = await this.asSet();
    for (const fingerprint of normalizeFingerprints(fingerprints)) {
      current.add(fingerprint);
    }
    return this.save(current);
  }

  async remove(fingerprints: Iterable<string>): Promise<string[]> {
    const current = await this.asSet();
    for (const fingerprint of normalizeFingerprints(fingerprints)) {
      current.delete(fingerprint);
    }
    return this.save(current);
  }

  async clear(): Promise<void> {
    await this.document.write([]);
  }

  private async save(fingerprints: Set<string>): Promise<string[]> {
    const sorted = [...fingerprints].sort();
    await this.document.write(sorted);
    return sorted;
  }
}
