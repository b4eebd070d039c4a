import type { Area, Device, Entity, LiveState, RegistryClient } from './types.js';

export interface RegistrySnapshot {
  areas: Area[];
  devices: Device[];
  entities: Entity[];
  statesByEntityId: ReadonlyMap<string, LiveState>;
  areaById: ReadonlyMap<string, Area>;
  deviceById: ReadonlyMap<string, Device>;
  entitiesByDeviceId: ReadonlyMap<string, Entity[]>;
  entityIds: ReadonlySet<string>;
}

export function buildSnapshot(input: {
  areas: Area[];
  devices: Device[];
  entities: Entity[];
  states: LiveState[];
}): RegistrySnapshot {
  const statesByEntityId = new Map<string, LiveState>();
  for (const state of input.states) {
    statesByEntityId.set(state.entityId, state);
  }

  const areaById = new Map<string, Area>();
  for (const area of input.areas) {
    areaById.set(area.areaId, area);
  }

  const deviceById = new Map<string, Device>();
  for (const device of input.devices) {
    deviceById.set(device.id, device);
  }

  const entitiesByDeviceId = new Map<string, Entity[]>();
  const entityIds = new Set<string>();
  for (const entity of input.entities) {
    entityIds.add(entity.entityId);
    if (!entity.deviceId) {
      continue;
    }
    const linked = entitiesByDeviceId.get(entity.deviceId);
    if (linked) {
      linked.push(entity);
    } else {
      entitiesByDeviceId.set(entity.deviceId, [entity]);
    }
  }

  return {
    areas: input.areas,
    devices: input.devices,
    entities: input.entities,
    statesByEntityId,
    areaById,
    deviceById,
    entitiesByDeviceId,
    entityIds
  };
}

/** Pulls every registry collection in sequence; no call overlaps another. */
export async function fetchSnapshot(client: RegistryClient): Promise<RegistrySnapshot> {
  const areas = await client.listAreas();
  const devices = await client.listDevices();
  const entities = await client.listEntities();
  const states = await client.getLiveStates();
  return buildSnapshot({ areas, devices, entities, states });
}

export function isActiveState(state: LiveState | undefined): boolean {
  if (!state || state.state === null) {
    return false;
  }
  return state.state !== 'unavailable';
}

export function isEntityActive(snapshot: RegistrySnapshot, entity: Entity): boolean {
  return isActiveState(snapshot.statesByEntityId.get(entity.entityId));
}

export function effectiveAreaId(snapshot: RegistrySnapshot, entity: Entity): string | null {
  if (entity.areaId) {
    return entity.areaId;
  }
  if (!entity.deviceId) {
    return null;
  }
  return snapshot.deviceById.get(entity.deviceId)?.areaId ?? null;
}

export function deviceDisplayName(device: Device): string {
  return device.nameByUser || device.name || '';
}

export function friendlyName(snapshot: RegistrySnapshot, entity: Entity): string {
  const value = snapshot.statesByEntityId.get(entity.entityId)?.attributes.friendly_name;
  return typeof value === 'string' ? value : '';
}

export function entityDisplayName(snapshot: RegistrySnapshot, entity: Entity): string {
  return entity.name || entity.originalName || friendlyName(snapshot, entity);
}
