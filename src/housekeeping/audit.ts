import {
  deviceDisplayName,
  effectiveAreaId,
  entityDisplayName,
  isEntityActive,
  type RegistrySnapshot
} from '../registry/snapshot.js';
import { isGenericMediaName, isHelperEntityId, suffixDuplicateBase } from './text.js';

export interface AuditReport {
  generatedAt: string;
  counts: {
    areas: number;
    devices: number;
    entities: number;
    devicesWithoutArea: number;
    entitiesWithoutEffectiveArea: number;
    suffixDuplicateEntities: number;
    uniqueIdDuplicateGroups: number;
    genericMediaPlayers: number;
    helpers: number;
  };
  devicesWithoutArea: Array<{ deviceId: string; name: string }>;
  entitiesWithoutEffectiveArea: Array<{ entityId: string; name: string; deviceId: string | null }>;
  suffixDuplicateEntities: Array<{ entityId: string; baseEntityId: string }>;
  uniqueIdDuplicates: Array<{ uniqueId: string; entityIds: string[] }>;
  genericMediaPlayers: Array<{ entityId: string; currentName: string; effectiveAreaId: string | null }>;
  helpers: Array<{ entityId: string; effectiveAreaId: string | null }>;
  areaIdByName: Record<string, string>;
  areaNameById: Record<string, string>;
}

/** Groups entity ids by unique id, keeping registry order inside each group. */
export function groupByUniqueId(snapshot: RegistrySnapshot): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const entity of snapshot.entities) {
    if (!entity.uniqueId) {
      continue;
    }
    const group = groups.get(entity.uniqueId);
    if (group) {
      group.push(entity.entityId);
    } else {
      groups.set(entity.uniqueId, [entity.entityId]);
    }
  }
  return groups;
}

/** Read-only statistics over a snapshot. Never proposes actions. */
export function auditSnapshot(snapshot: RegistrySnapshot, now: Date = new Date()): AuditReport {
  const devicesWithoutArea = snapshot.devices
    .filter((device) => !device.areaId)
    .map((device) => ({ deviceId: device.id, name: deviceDisplayName(device) }));

  const entitiesWithoutEffectiveArea: AuditReport['entitiesWithoutEffectiveArea'] = [];
  const genericMediaPlayers: AuditReport['genericMediaPlayers'] = [];
  const helpers: AuditReport['helpers'] = [];
  const suffixDuplicateEntities: AuditReport['suffixDuplicateEntities'] = [];

  for (const entity of snapshot.entities) {
    const base = suffixDuplicateBase(entity.entityId);
    if (base && snapshot.entityIds.has(base)) {
      suffixDuplicateEntities.push({ entityId: entity.entityId, baseEntityId: base });
    }

    if (!isEntityActive(snapshot, entity)) {
      continue;
    }

    const areaId = effectiveAreaId(snapshot, entity);
    if (!areaId) {
      entitiesWithoutEffectiveArea.push({
        entityId: entity.entityId,
        name: entity.name || entity.originalName || '',
        deviceId: entity.deviceId
      });
    }

    if (entity.entityId.startsWith('media_player.')) {
      const currentName = entityDisplayName(snapshot, entity);
      if (isGenericMediaName(currentName)) {
        genericMediaPlayers.push({ entityId: entity.entityId, currentName, effectiveAreaId: areaId });
      }
    }

    if (isHelperEntityId(entity.entityId)) {
      helpers.push({ entityId: entity.entityId, effectiveAreaId: areaId });
    }
  }

  const uniqueIdDuplicates: AuditReport['uniqueIdDuplicates'] = [];
  for (const [uniqueId, entityIds] of groupByUniqueId(snapshot)) {
    if (entityIds.length > 1) {
      uniqueIdDuplicates.push({ uniqueId, entityIds: [...entityIds].sort() });
    }
  }

  const areaIdByName: Record<string, string> = {};
  const areaNameById: Record<string, string> = {};
  for (const area of snapshot.areas) {
    areaIdByName[area.name] = area.areaId;
    areaNameById[area.areaId] = area.name;
  }

  return {
    generatedAt: now.toISOString(),
    counts: {
      areas: snapshot.areas.length,
      devices: snapshot.devices.length,
      entities: snapshot.entities.length,
      devicesWithoutArea: devicesWithoutArea.length,
      entitiesWithoutEffectiveArea: entitiesWithoutEffectiveArea.length,
      suffixDuplicateEntities: suffixDuplicateEntities.length,
      uniqueIdDuplicateGroups: uniqueIdDuplicates.length,
      genericMediaPlayers: genericMediaPlayers.length,
      helpers: helpers.length
    },
    devicesWithoutArea,
    entitiesWithoutEffectiveArea,
    suffixDuplicateEntities,
    uniqueIdDuplicates,
    genericMediaPlayers,
    helpers,
    areaIdByName,
    areaNameById
  };
}
