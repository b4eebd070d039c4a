import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { OperationJournal } from '../../src/journal/operationJournal.js';

describe('OperationJournal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns newest entries first and filters by tool and result', async () => {
    const journal = new OperationJournal({ maxEntries: 10 });
    await journal.record({ tool: 'housekeeping.audit.run', result: 'success' });
    await journal.record({ tool: 'housekeeping.plan.apply', result: 'blocked', errorCode: 'POLICY_DENY' });
    await journal.record({ tool: 'housekeeping.plan.apply', result: 'success' });

    expect(journal.query().map((entry) => `${entry.tool}:${entry.result}`)).toEqual([
      'housekeeping.plan.apply:success',
      'housekeeping.plan.apply:blocked',
      'housekeeping.audit.run:success'
    ]);
    expect(journal.query({ tool: 'housekeeping.plan.apply', result: 'blocked' })).toHaveLength(1);
    expect(journal.query({ limit: 1 })[0]?.result).toBe('success');
  });

  test('drops the oldest entries past the cap', async () => {
    const journal = new OperationJournal({ maxEntries: 2 });
    await journal.record({ tool: 'a', result: 'success' });
    await journal.record({ tool: 'b', result: 'success' });
    await journal.record({ tool: 'c', result: 'success' });

    expect(journal.query().map((entry) => entry.tool)).toEqual(['c', 'b']);
  });

  test('filters by timestamp', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T09:00:00.000Z'));
    const journal = new OperationJournal({ maxEntries: 10 });
    await journal.record({ tool: 'early', result: 'success' });
    vi.setSystemTime(new Date('2026-03-01T11:00:00.000Z'));
    await journal.record({ tool: 'late', result: 'success' });

    expect(journal.query({ since: '2026-03-01T10:00:00.000Z' }).map((entry) => entry.tool)).toEqual(['late']);
  });

  describe('persistence', () => {
    let dir = '';

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'housekeeper-journal-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('appends one JSON line per entry', async () => {
      const persistPath = join(dir, 'logs', 'journal.jsonl');
      const journal = new OperationJournal({ maxEntries: 10, persistPath });
      const first = await journal.record({ tool: 'housekeeping.plan.create', result: 'success', durationMs: 4 });
      await journal.record({ tool: 'housekeeping.plan.apply', result: 'error', errorCode: 'TRANSPORT' });

      const lines = (await readFile(persistPath, 'utf8')).trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0] ?? '')).toEqual(first);
      expect(JSON.parse(lines[1] ?? '')).toMatchObject({ tool: 'housekeeping.plan.apply', errorCode: 'TRANSPORT' });
    });
  });
});
