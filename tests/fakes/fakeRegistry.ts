import pino, { type Logger } from 'pino';

import { HousekeeperError } from '../../src/errors.js';
import type {
  Area,
  AreaUpdate,
  Device,
  DeviceUpdate,
  Entity,
  EntityUpdate,
  LiveState,
  RegistryClient
} from '../../src/registry/types.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function area(areaId: string, name: string): Area {
  return { areaId, name };
}

export function device(id: string, overrides: Partial<Omit<Device, 'id'>> = {}): Device {
  return { id, name: id, nameByUser: null, areaId: null, ...overrides };
}

export function entity(entityId: string, overrides: Partial<Omit<Entity, 'entityId'>> = {}): Entity {
  return {
    entityId,
    uniqueId: null,
    platform: null,
    name: null,
    originalName: null,
    deviceId: null,
    areaId: null,
    hiddenBy: null,
    disabledBy: null,
    ...overrides
  };
}

export function state(entityId: string, value: string | null = 'on', attributes: Record<string, unknown> = {}): LiveState {
  return { entityId, state: value, attributes };
}

export interface FakeRegistrySeed {
  areas?: Area[];
  devices?: Device[];
  entities?: Entity[];
  states?: LiveState[];
}

export interface RecordedCall {
  method: string;
  targetId?: string;
  update?: unknown;
}

/** In-memory registry. Every entity gets an "on" state unless the seed lists states. */
export class FakeRegistry implements RegistryClient {
  areas: Area[];
  devices: Device[];
  entities: Entity[];
  states: LiveState[];
  readonly calls: RecordedCall[] = [];
  closed = 0;

  private readonly failures = new Map<string, { error: HousekeeperError; remaining: number }>();

  constructor(seed: FakeRegistrySeed = {}) {
    this.areas = (seed.areas ?? []).map((item) => ({ ...item }));
    this.devices = (seed.devices ?? []).map((item) => ({ ...item }));
    this.entities = (seed.entities ?? []).map((item) => ({ ...item }));
    this.states = seed.states ?? this.entities.map((item) => state(item.entityId));
  }

  /** The next `times` calls of `method` on `targetId` throw `error`. */
  failOn(method: string, targetId: string, error: HousekeeperError, times = Number.POSITIVE_INFINITY): void {
    this.failures.set(`${method}:${targetId}`, { error, remaining: times });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  mutations(): RecordedCall[] {
    return this.calls.filter((call) => !call.method.startsWith('list') && call.method !== 'getLiveStates');
  }

  findEntity(entityId: string): Entity | undefined {
    return this.entities.find((item) => item.entityId === entityId);
  }

  findDevice(deviceId: string): Device | undefined {
    return this.devices.find((item) => item.id === deviceId);
  }

  private check(method: string, targetId: string): void {
    const key = `${method}:${targetId}`;
    const failure = this.failures.get(key);
    if (!failure) {
      return;
    }
    failure.remaining -= 1;
    if (failure.remaining <= 0) {
      this.failures.delete(key);
    }
    throw failure.error;
  }

  async listAreas(): Promise<Area[]> {
    this.calls.push({ method: 'listAreas' });
    return this.areas.map((item) => ({ ...item }));
  }

  async createArea(name: string): Promise<Area> {
    this.calls.push({ method: 'createArea', targetId: name });
    this.check('createArea', name);
    const created = { areaId: name.toLowerCase().replace(/[^a-z0-9]+/g, '_'), name };
    this.areas.push(created);
    return { ...created };
  }

  async updateArea(areaId: string, update: AreaUpdate): Promise<Area> {
    this.calls.push({ method: 'updateArea', targetId: areaId, update: { ...update } });
    this.check('updateArea', areaId);
    const found = this.areas.find((item) => item.areaId === areaId);
    if (!found) {
      throw new HousekeeperError('REGISTRY', `Area ${areaId} not found`, { registryCode: 'not_found' });
    }
    found.name = update.name;
    return { ...found };
  }

  async listDevices(): Promise<Device[]> {
    this.calls.push({ method: 'listDevices' });
    return this.devices.map((item) => ({ ...item }));
  }

  async updateDevice(deviceId: string, update: DeviceUpdate): Promise<void> {
    this.calls.push({ method: 'updateDevice', targetId: deviceId, update: { ...update } });
    this.check('updateDevice', deviceId);
    const found = this.findDevice(deviceId);
    if (!found) {
      throw new HousekeeperError('REGISTRY', `Device ${deviceId} not found`, { registryCode: 'not_found' });
    }
    if ('areaId' in update) {
      found.areaId = update.areaId ?? null;
    }
    if ('nameByUser' in update) {
      found.nameByUser = update.nameByUser ?? null;
    }
  }

  async listEntities(): Promise<Entity[]> {
    this.calls.push({ method: 'listEntities' });
    return this.entities.map((item) => ({ ...item }));
  }

  async updateEntity(entityId: string, update: EntityUpdate): Promise<void> {
    this.calls.push({ method: 'updateEntity', targetId: entityId, update: { ...update } });
    this.check('updateEntity', entityId);
    const found = this.findEntity(entityId);
    if (!found) {
      throw new HousekeeperError('REGISTRY', `Entity ${entityId} not found`, { registryCode: 'not_found' });
    }
    if ('areaId' in update) {
      found.areaId = update.areaId ?? null;
    }
    if ('name' in update) {
      found.name = update.name ?? null;
    }
    if ('hiddenBy' in update) {
      found.hiddenBy = update.hiddenBy ?? null;
    }
    if ('disabledBy' in update) {
      found.disabledBy = update.disabledBy ?? null;
    }
  }

  async removeEntity(entityId: string): Promise<void> {
    this.calls.push({ method: 'removeEntity', targetId: entityId });
    this.check('removeEntity', entityId);
    this.entities = this.entities.filter((item) => item.entityId !== entityId);
  }

  async getLiveStates(): Promise<LiveState[]> {
    this.calls.push({ method: 'getLiveStates' });
    return this.states.map((item) => ({ ...item }));
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}
