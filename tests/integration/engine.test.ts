import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { createEngineFromConfig, type HousekeeperEngine } from '../../src/engine/engine.js';
import { area, device, entity, FakeRegistry, silentLogger } from '../fakes/fakeRegistry.js';

function kitchenRegistry(): FakeRegistry {
  return new FakeRegistry({
    areas: [area('kitchen', 'Kitchen')],
    devices: [device('dev1', { name: 'Kitchen Hub' })],
    entities: [
      entity('light.kitchen_lamp', { deviceId: 'dev1', areaId: 'kitchen' }),
      entity('sensor.kitchen_temp', { deviceId: 'dev1', areaId: 'kitchen' })
    ]
  });
}

describe('HousekeeperEngine', () => {
  let dir = '';
  let registry: FakeRegistry;
  let engine: HousekeeperEngine;

  function makeEngine(client: FakeRegistry): HousekeeperEngine {
    return createEngineFromConfig(
      {
        registryUrl: 'http://registry.local:8123',
        dataDir: dir,
        rulesPath: join(dir, 'rules.json'),
        fallbackAreaName: 'Unassigned'
      },
      { client, logger: silentLogger() }
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'housekeeper-engine-'));
    registry = kitchenRegistry();
    engine = makeEngine(registry);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reports health from the area list', async () => {
    const health = await engine.health();
    expect(health).toMatchObject({ ok: true, registryUrl: 'http://registry.local:8123', areas: 1 });
  });

  test('audits without proposing anything', async () => {
    const report = await engine.audit();
    expect(report.counts.devicesWithoutArea).toBe(1);
    expect(report.counts.entitiesWithoutEffectiveArea).toBe(0);
    expect(registry.mutations()).toEqual([]);
  });

  test('plans, applies and rolls back a device area backfill', async () => {
    const plan = await engine.plan({ fallback: false });
    expect(plan.actions).toHaveLength(1);
    expect(plan.actions[0]).toMatchObject({
      type: 'set_device_area',
      payload: { deviceId: 'dev1', areaId: 'kitchen' },
      confidence: 0.98,
      requiresApproval: false
    });
    expect(plan.rules.error).toBe('No rules file found');

    const stored = await engine.getPlan();
    expect(stored?.actions.map((action) => action.id)).toEqual(plan.actions.map((action) => action.id));

    const applied = await engine.apply([]);
    expect(applied.applied).toEqual([plan.actions[0]?.id]);
    expect(registry.findDevice('dev1')?.areaId).toBe('kitchen');
    await expect(engine.getRollback()).resolves.toMatchObject({
      steps: [{ kind: 'device_update', targetId: 'dev1', before: { areaId: null } }]
    });

    const rolledBack = await engine.rollback();
    expect(rolledBack).toEqual({ ok: true, reverted: 1, errors: [] });
    expect(registry.findDevice('dev1')?.areaId).toBeNull();
  });

  test('applies rule actions only once approved', async () => {
    await writeFile(join(dir, 'rules.json'), JSON.stringify({ entity_hide: { ids: ['sensor.kitchen_temp'] } }), 'utf8');

    const plan = await engine.plan({ fallback: false });
    const hide = plan.actions.find((action) => action.type === 'hide_entity');
    expect(hide).toMatchObject({ payload: { entityId: 'sensor.kitchen_temp', hiddenBy: 'user' }, requiresApproval: true });

    const first = await engine.apply([]);
    expect(first.skipped).toEqual([{ id: hide?.id, reason: 'requires_approval' }]);
    expect(registry.findEntity('sensor.kitchen_temp')?.hiddenBy).toBeNull();

    await engine.apply([hide?.id ?? '']);
    expect(registry.findEntity('sensor.kitchen_temp')?.hiddenBy).toBe('user');
  });

  test('refuses to apply without a stored plan', async () => {
    await expect(engine.apply([])).rejects.toMatchObject({
      code: 'VALIDATION',
      message: 'No plan found; create one before applying'
    });
    expect(registry.mutations()).toEqual([]);
  });

  test('leaves ignored proposals out of later plans', async () => {
    await expect(engine.ignore(['set_device_area:dev1'])).resolves.toEqual(['set_device_area:dev1']);

    const ignoredPlan = await engine.plan({ fallback: false });
    expect(ignoredPlan.actions).toEqual([]);
    expect(ignoredPlan.ignoredCount).toBe(1);

    await engine.unignore(['set_device_area:dev1']);
    const restored = await engine.plan({ fallback: false });
    expect(restored.actions.map((action) => action.type)).toEqual(['set_device_area']);
    await expect(engine.listIgnored()).resolves.toEqual([]);
  });

  test('reports a missing rollback record', async () => {
    await expect(engine.rollback()).resolves.toEqual({
      ok: false,
      reverted: 0,
      errors: [],
      detail: 'No rollback record found'
    });
  });

  test('closes the registry client', async () => {
    await engine.close();
    expect(registry.closed).toBe(1);
  });
});
