import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { FileRuleSource, parseRuleDocument } from '../../src/rules/ruleSet.js';

describe('parseRuleDocument', () => {
  test('parses every section with defaults', () => {
    const { rules, diagnostics, error } = parseRuleDocument({
      area_renames: [{ from: 'Lounge', to: 'Living Room', requires_approval: false }],
      entity_remove: { ids: ['sensor.old'], regex: [{ pattern: '^sensor\\.legacy_' }] },
      entity_hide: { ids: [], regex: [{ pattern: 'battery', requires_approval: false }] },
      entity_area: [{ pattern: '^light\\.garden', area: 'Garden', overwrite: true }],
      device_area: [{ pattern: 'Hue', area: 'Hall' }],
      helper_area_rules: [{ area: 'Office', keywords: ['Desk', ' pc ', 3] }]
    });

    expect(error).toBeUndefined();
    expect(diagnostics).toEqual([]);
    expect(rules.areaRenames).toEqual([{ from: 'Lounge', to: 'Living Room', requiresApproval: false }]);
    expect(rules.entityRemove.ids).toEqual(['sensor.old']);
    expect(rules.entityRemove.regex[0]?.requiresApproval).toBe(true);
    expect(rules.entityHide.regex[0]?.requiresApproval).toBe(false);
    expect(rules.entityArea[0]?.overwrite).toBe(true);
    expect(rules.deviceArea[0]?.overwrite).toBe(false);
    expect(rules.helperAreaRules).toEqual([{ area: 'Office', keywords: ['desk', 'pc'], requiresApproval: true }]);
  });

  test('regexes search case-insensitively without anchoring', () => {
    const { rules } = parseRuleDocument({ entity_hide: { regex: [{ pattern: 'BATTERY' }] } });
    const regex = rules.entityHide.regex[0]?.regex;
    expect(regex?.test('sensor.phone_battery_level')).toBe(true);
  });

  test('drops invalid entries one by one with diagnostics', () => {
    const { rules, diagnostics } = parseRuleDocument({
      area_renames: [{ from: 'A' }, { from: 'B', to: 'C' }],
      entity_remove: { ids: ['', 'sensor.ok'], regex: [{ pattern: '(' }] },
      entity_area: 'nope',
      helper_area_rules: [{ area: 'Office', keywords: [''] }]
    });

    expect(rules.areaRenames).toEqual([{ from: 'B', to: 'C', requiresApproval: true }]);
    expect(rules.entityRemove.ids).toEqual(['sensor.ok']);
    expect(rules.entityRemove.regex).toEqual([]);
    expect(rules.helperAreaRules).toEqual([]);
    expect(diagnostics).toHaveLength(5);
    expect(diagnostics.some((line) => line.startsWith('area_renames[0]:'))).toBe(true);
    expect(diagnostics).toContain('entity_remove.ids[0]: expected a non-empty string');
    expect(diagnostics).toContain('entity_remove.regex[0]: invalid regex /(/');
    expect(diagnostics).toContain('entity_area: expected a list');
    expect(diagnostics).toContain('helper_area_rules[0]: no usable keywords');
  });

  test('rejects a non-object root', () => {
    const parsed = parseRuleDocument(['not', 'rules']);
    expect(parsed.error).toBe('Rules file root must be an object');
    expect(parsed.rules.areaRenames).toEqual([]);
  });
});

describe('FileRuleSource', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'housekeeper-rules-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reports a missing file without throwing', async () => {
    const path = join(dir, 'rules.json');
    const loaded = await new FileRuleSource(path).load();
    expect(loaded.provenance).toEqual({ path, error: 'No rules file found', diagnostics: [] });
    expect(loaded.rules.entityRemove).toEqual({ ids: [], regex: [] });
  });

  test('reports invalid JSON', async () => {
    const path = join(dir, 'rules.json');
    await writeFile(path, '{ nope', 'utf8');
    const loaded = await new FileRuleSource(path).load();
    expect(loaded.provenance.error?.startsWith('Rules file is not valid JSON: ')).toBe(true);
  });

  test('loads a valid file', async () => {
    const path = join(dir, 'rules.json');
    await writeFile(path, JSON.stringify({ entity_remove: { ids: ['sensor.old'] } }), 'utf8');
    const loaded = await new FileRuleSource(path).load();
    expect(loaded.provenance).toEqual({ path, diagnostics: [] });
    expect(loaded.rules.entityRemove.ids).toEqual(['sensor.old']);
  });
});
