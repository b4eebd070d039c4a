import type { Area, Device, DeviceUpdate, Entity, EntityUpdate, LiveState } from './types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toOptionalString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.length ? value : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function asRecords(payload: unknown): Record<string, unknown>[] {
  if (!Array.isArray(payload)) {
    return [];
  }
  return payload.filter(isObject);
}

export function normalizeArea(raw: unknown): Area | null {
  if (!isObject(raw)) {
    return null;
  }
  const areaId = toOptionalString(raw.area_id);
  const name = toOptionalString(raw.name);
  if (!areaId || !name) {
    return null;
  }
  return { areaId, name };
}

export function normalizeAreas(payload: unknown): Area[] {
  const result: Area[] = [];
  for (const record of asRecords(payload)) {
    const area = normalizeArea(record);
    if (area) {
      result.push(area);
    }
  }
  return result;
}

export function normalizeDevices(payload: unknown): Device[] {
  const result: Device[] = [];
  for (const record of asRecords(payload)) {
    const id = toOptionalString(record.id);
    if (!id) {
      continue;
    }
    result.push({
      id,
      name: toOptionalString(record.name) ?? '',
      nameByUser: toOptionalString(record.name_by_user),
      areaId: toOptionalString(record.area_id)
    });
  }
  return result;
}

export function normalizeEntities(payload: unknown): Entity[] {
  const result: Entity[] = [];
  for (const record of asRecords(payload)) {
    const entityId = toOptionalString(record.entity_id);
    if (!entityId) {
      continue;
    }
    result.push({
      entityId,
      uniqueId: toOptionalString(record.unique_id),
      platform: toOptionalString(record.platform),
      name: toOptionalString(record.name),
      originalName: toOptionalString(record.original_name),
      deviceId: toOptionalString(record.device_id),
      areaId: toOptionalString(record.area_id),
      hiddenBy: toOptionalString(record.hidden_by),
      disabledBy: toOptionalString(record.disabled_by)
    });
  }
  return result;
}

export function normalizeLiveStates(payload: unknown): LiveState[] {
  const result: LiveState[] = [];
  for (const record of asRecords(payload)) {
    const entityId = toOptionalString(record.entity_id);
    if (!entityId) {
      continue;
    }
    result.push({
      entityId,
      state: typeof record.state === 'string' ? record.state : null,
      attributes: isObject(record.attributes) ? { ...record.attributes } : {}
    });
  }
  return result;
}

export function entityUpdateToWire(update: EntityUpdate): Record<string, string | null> {
  const wire: Record<string, string | null> = {};
  if (update.areaId !== undefined) {
    wire.area_id = update.areaId;
  }
  if (update.name !== undefined) {
    wire.name = update.name;
  }
  if (update.hiddenBy !== undefined) {
    wire.hidden_by = update.hiddenBy;
  }
  if (update.disabledBy !== undefined) {
    wire.disabled_by = update.disabledBy;
  }
  return wire;
}

export function deviceUpdateToWire(update: DeviceUpdate): Record<string, string | null> {
  const wire: Record<string, string | null> = {};
  if (update.areaId !== undefined) {
    wire.area_id = update.areaId;
  }
  if (update.nameByUser !== undefined) {
    wire.name_by_user = update.nameByUser;
  }
  return wire;
}
