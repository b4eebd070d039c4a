import { randomUUID } from 'node:crypto';

import {
  deviceDisplayName,
  effectiveAreaId,
  entityDisplayName,
  friendlyName,
  isEntityActive,
  type RegistrySnapshot
} from '../registry/snapshot.js';
import type { Area, Entity } from '../registry/types.js';
import type { RuleProvenance, RuleSet } from '../rules/ruleSet.js';
import { groupByUniqueId } from './audit.js';
import { fingerprint } from './fingerprint.js';
import type { Action, Plan } from './model.js';
import {
  intersects,
  isGenericMediaName,
  isSubset,
  mediaBaseLabel,
  suffixDuplicateBase,
  tokenize,
  type MediaBaseLabel
} from './text.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type ActionDraft = DistributiveOmit<Action, 'id'>;

export interface FallbackOptions {
  enabled: boolean;
  areaName: string;
}

export interface PlanInput {
  snapshot: RegistrySnapshot;
  rules: RuleSet;
  provenance: RuleProvenance;
  ignored: ReadonlySet<string>;
  fallback: FallbackOptions;
  now?: Date;
  createId?: () => string;
}

type FallbackTarget = { areaId: string } | { areaName: string };

/**
 * Working state shared by every pass. The marker sets stand in for mutations
 * that earlier passes proposed but nothing has applied yet.
 */
interface PlanState {
  snapshot: RegistrySnapshot;
  rules: RuleSet;
  fallback: FallbackOptions;
  createId: () => string;
  actions: Action[];
  plannedArea: Set<string>;
  plannedDeviceArea: Set<string>;
  plannedRemoved: Set<string>;
  plannedHidden: Set<string>;
  areasByLowerName: Map<string, Area[]>;
  sortedEntityIds: string[];
  needsFallback: boolean;
  fallbackTarget: FallbackTarget | null;
}

function compareStrings(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

function emit(state: PlanState, draft: ActionDraft): void {
  state.actions.push({ id: state.createId(), ...draft });
}

function findArea(state: PlanState, name: string): Area | undefined {
  return state.areasByLowerName.get(name.trim().toLowerCase())?.[0];
}

function hasPendingArea(state: PlanState, entity: Entity): boolean {
  if (state.plannedArea.has(entity.entityId)) {
    return true;
  }
  return entity.deviceId !== null && state.plannedDeviceArea.has(entity.deviceId);
}

function renameAreasFromRules(state: PlanState): void {
  for (const rule of state.rules.areaRenames) {
    if (rule.from === rule.to) {
      continue;
    }
    const sources = state.areasByLowerName.get(rule.from.toLowerCase()) ?? [];
    const targets = state.areasByLowerName.get(rule.to.toLowerCase()) ?? [];
    const source = sources[0];
    if (sources.length !== 1 || !source || targets.length !== 0) {
      continue;
    }
    emit(state, {
      type: 'rename_area',
      payload: { areaId: source.areaId, name: rule.to },
      reason: `Rule: rename area '${rule.from}' -> '${rule.to}'.`,
      confidence: 0.9,
      requiresApproval: rule.requiresApproval
    });
  }
}

function removeEntitiesFromRules(state: PlanState): void {
  const { entityRemove } = state.rules;

  for (const entityId of entityRemove.ids) {
    if (!state.snapshot.entityIds.has(entityId) || state.plannedRemoved.has(entityId)) {
      continue;
    }
    emit(state, {
      type: 'remove_entity',
      payload: { entityId },
      reason: 'Rule: explicit entity removal.',
      confidence: 1,
      requiresApproval: true
    });
    state.plannedRemoved.add(entityId);
  }

  for (const rule of entityRemove.regex) {
    for (const entityId of state.sortedEntityIds) {
      if (state.plannedRemoved.has(entityId) || !rule.regex.test(entityId)) {
        continue;
      }
      emit(state, {
        type: 'remove_entity',
        payload: { entityId },
        reason: `Rule: entity_id matches /${rule.pattern}/.`,
        confidence: 0.95,
        requiresApproval: rule.requiresApproval
      });
      state.plannedRemoved.add(entityId);
    }
  }
}

function hideEntitiesFromRules(state: PlanState): void {
  const { entityHide } = state.rules;

  for (const entityId of entityHide.ids) {
    if (!state.snapshot.entityIds.has(entityId) || state.plannedHidden.has(entityId)) {
      continue;
    }
    emit(state, {
      type: 'hide_entity',
      payload: { entityId, hiddenBy: 'user' },
      reason: 'Rule: explicit entity hide.',
      confidence: 1,
      requiresApproval: true
    });
    state.plannedHidden.add(entityId);
  }

  for (const rule of entityHide.regex) {
    for (const entityId of state.sortedEntityIds) {
      if (state.plannedHidden.has(entityId) || !rule.regex.test(entityId)) {
        continue;
      }
      emit(state, {
        type: 'hide_entity',
        payload: { entityId, hiddenBy: 'user' },
        reason: `Rule: entity_id matches /${rule.pattern}/.`,
        confidence: 0.95,
        requiresApproval: rule.requiresApproval
      });
      state.plannedHidden.add(entityId);
    }
  }
}

function inheritDeviceAreas(state: PlanState): void {
  const { snapshot } = state;
  for (const entity of snapshot.entities) {
    if (state.plannedRemoved.has(entity.entityId) || !isEntityActive(snapshot, entity)) {
      continue;
    }
    if (entity.areaId || !entity.deviceId) {
      continue;
    }
    const deviceAreaId = snapshot.deviceById.get(entity.deviceId)?.areaId;
    if (!deviceAreaId) {
      continue;
    }
    emit(state, {
      type: 'set_entity_area',
      payload: { entityId: entity.entityId, areaId: deviceAreaId },
      reason: 'Entity has no area; its device has one, so the entity inherits it.',
      confidence: 1,
      requiresApproval: false
    });
    state.plannedArea.add(entity.entityId);
  }
}

function backfillDeviceAreas(state: PlanState): void {
  const { snapshot } = state;
  for (const device of snapshot.devices) {
    if (device.areaId) {
      continue;
    }
    // Explicit entity areas only: inherited ones would come from this very device.
    const explicitAreas = new Set<string>();
    for (const entity of snapshot.entitiesByDeviceId.get(device.id) ?? []) {
      if (entity.areaId && isEntityActive(snapshot, entity)) {
        explicitAreas.add(entity.areaId);
      }
    }
    const [areaId] = [...explicitAreas];
    if (explicitAreas.size !== 1 || !areaId) {
      continue;
    }
    emit(state, {
      type: 'set_device_area',
      payload: { deviceId: device.id, areaId },
      reason: 'Device has no area; all linked active entities share exactly one explicit area.',
      confidence: 0.98,
      requiresApproval: false
    });
    state.plannedDeviceArea.add(device.id);
  }
}

function matchAreasByTokens(state: PlanState): void {
  const { snapshot } = state;
  const areaTokens = snapshot.areas.map((area) => ({ area, tokens: tokenize(area.name) }));

  for (const entity of snapshot.entities) {
    if (hasPendingArea(state, entity) || state.plannedRemoved.has(entity.entityId)) {
      continue;
    }
    if (!isEntityActive(snapshot, entity) || entity.areaId) {
      continue;
    }
    if (entity.deviceId && snapshot.deviceById.get(entity.deviceId)?.areaId) {
      continue;
    }

    const haystack = tokenize(
      [entity.entityId, entity.name ?? '', entity.originalName ?? '', friendlyName(snapshot, entity)].join(' ')
    );
    const matches = areaTokens.filter(({ tokens }) => tokens.size > 0 && isSubset(tokens, haystack));
    const [match] = matches;

    if (matches.length === 1 && match) {
      emit(state, {
        type: 'set_entity_area',
        payload: { entityId: entity.entityId, areaId: match.area.areaId },
        reason: `Token match to area name '${match.area.name}' from entity metadata.`,
        confidence: 0.95,
        requiresApproval: false
      });
      state.plannedArea.add(entity.entityId);
    } else if (state.fallback.enabled) {
      state.needsFallback = true;
    }
  }
}

function createFallbackArea(state: PlanState): void {
  if (!state.fallback.enabled) {
    return;
  }

  const existing = findArea(state, state.fallback.areaName);
  if (existing) {
    state.fallbackTarget = { areaId: existing.areaId };
    return;
  }
  if (!state.needsFallback) {
    return;
  }

  emit(state, {
    type: 'create_area',
    payload: { name: state.fallback.areaName },
    reason: 'Fallback area requested so every entity ends up with an effective area.',
    confidence: 0.6,
    requiresApproval: true
  });
  state.fallbackTarget = { areaName: state.fallback.areaName };
}

function placeIntoFallbackArea(state: PlanState): void {
  const target = state.fallbackTarget;
  if (!state.fallback.enabled || !target) {
    return;
  }

  const { snapshot } = state;
  for (const entity of snapshot.entities) {
    if (hasPendingArea(state, entity) || state.plannedRemoved.has(entity.entityId)) {
      continue;
    }
    if (!isEntityActive(snapshot, entity) || effectiveAreaId(snapshot, entity)) {
      continue;
    }
    emit(state, {
      type: 'set_entity_area',
      payload: { entityId: entity.entityId, ...target },
      reason: `Fallback: put entity into area '${state.fallback.areaName}'.`,
      confidence: 0.6,
      requiresApproval: true
    });
    state.plannedArea.add(entity.entityId);
  }
}

function removeSuffixDuplicates(state: PlanState): void {
  for (const entity of state.snapshot.entities) {
    if (state.plannedRemoved.has(entity.entityId)) {
      continue;
    }
    const base = suffixDuplicateBase(entity.entityId);
    if (!base || !state.snapshot.entityIds.has(base)) {
      continue;
    }
    emit(state, {
      type: 'remove_entity',
      payload: { entityId: entity.entityId },
      reason: `Entity id looks like a suffix duplicate of '${base}'.`,
      confidence: 0.9,
      requiresApproval: true
    });
    state.plannedRemoved.add(entity.entityId);
  }
}

function hideUniqueIdDuplicates(state: PlanState): void {
  for (const [uniqueId, entityIds] of groupByUniqueId(state.snapshot)) {
    if (entityIds.length <= 1) {
      continue;
    }
    const [kept, ...others] = [...entityIds].sort(compareStrings);
    for (const entityId of others) {
      if (state.plannedHidden.has(entityId) || state.plannedRemoved.has(entityId)) {
        continue;
      }
      emit(state, {
        type: 'hide_entity',
        payload: { entityId, hiddenBy: 'user' },
        reason: `Duplicate unique_id '${uniqueId}'. Keeping '${kept}', hiding '${entityId}'.`,
        confidence: 0.9,
        requiresApproval: true
      });
      state.plannedHidden.add(entityId);
    }
  }
}

function applyAreaPatternRules(state: PlanState): void {
  const { snapshot } = state;

  for (const rule of state.rules.entityArea) {
    const target = findArea(state, rule.area);
    if (!target) {
      continue;
    }
    for (const entity of snapshot.entities) {
      if (state.plannedRemoved.has(entity.entityId) || !isEntityActive(snapshot, entity)) {
        continue;
      }
      if (!rule.overwrite && (effectiveAreaId(snapshot, entity) || hasPendingArea(state, entity))) {
        continue;
      }
      if (entity.areaId === target.areaId || !rule.regex.test(entity.entityId)) {
        continue;
      }
      emit(state, {
        type: 'set_entity_area',
        payload: { entityId: entity.entityId, areaId: target.areaId },
        reason: `Rule: entity_id matches /${rule.pattern}/ -> area '${rule.area}'.`,
        confidence: 0.9,
        requiresApproval: rule.requiresApproval
      });
      state.plannedArea.add(entity.entityId);
    }
  }

  for (const rule of state.rules.deviceArea) {
    const target = findArea(state, rule.area);
    if (!target) {
      continue;
    }
    for (const device of snapshot.devices) {
      if (!rule.overwrite && (device.areaId || state.plannedDeviceArea.has(device.id))) {
        continue;
      }
      const name = deviceDisplayName(device);
      if (!name || device.areaId === target.areaId || !rule.regex.test(name)) {
        continue;
      }
      emit(state, {
        type: 'set_device_area',
        payload: { deviceId: device.id, areaId: target.areaId },
        reason: `Rule: device name matches /${rule.pattern}/ -> area '${rule.area}'.`,
        confidence: 0.9,
        requiresApproval: rule.requiresApproval
      });
      state.plannedDeviceArea.add(device.id);
    }
  }
}

function applyHelperKeywordRules(state: PlanState): void {
  const { snapshot } = state;
  if (!state.rules.helperAreaRules.length) {
    return;
  }

  for (const entity of snapshot.entities) {
    if (!isEntityActive(snapshot, entity) || state.plannedRemoved.has(entity.entityId)) {
      continue;
    }
    if (hasPendingArea(state, entity) || effectiveAreaId(snapshot, entity)) {
      continue;
    }

    const tokens = tokenize(`${entity.entityId} ${entity.originalName ?? ''} ${entity.name ?? ''}`);
    for (const rule of state.rules.helperAreaRules) {
      if (!intersects(rule.keywords, tokens)) {
        continue;
      }
      const target = findArea(state, rule.area);
      if (!target) {
        continue;
      }
      emit(state, {
        type: 'set_entity_area',
        payload: { entityId: entity.entityId, areaId: target.areaId },
        reason: `Rule: keyword match suggests area '${rule.area}'.`,
        confidence: 0.85,
        requiresApproval: rule.requiresApproval
      });
      state.plannedArea.add(entity.entityId);
      break;
    }
  }
}

function renameGenericMediaPlayers(state: PlanState): void {
  const { snapshot } = state;
  const groups = new Map<string, { areaId: string; base: MediaBaseLabel; items: Array<{ entityId: string; current: string }> }>();

  for (const entity of snapshot.entities) {
    if (!entity.entityId.startsWith('media_player.') || state.plannedRemoved.has(entity.entityId)) {
      continue;
    }
    if (!isEntityActive(snapshot, entity)) {
      continue;
    }
    const areaId = effectiveAreaId(snapshot, entity);
    if (!areaId) {
      continue;
    }
    const current = entityDisplayName(snapshot, entity);
    if (!isGenericMediaName(current)) {
      continue;
    }

    const base = mediaBaseLabel(entity.entityId, current);
    const key = `${areaId}\u0000${base}`;
    const group = groups.get(key);
    if (group) {
      group.items.push({ entityId: entity.entityId, current });
    } else {
      groups.set(key, { areaId, base, items: [{ entityId: entity.entityId, current }] });
    }
  }

  for (const { areaId, base, items } of groups.values()) {
    const sorted = [...items].sort((left, right) => compareStrings(left.entityId, right.entityId));
    const areaName = snapshot.areaById.get(areaId)?.name ?? areaId;
    const numbered = sorted.length > 1;

    sorted.forEach(({ entityId, current }, index) => {
      const name = numbered ? `${base} ${areaName} ${index + 1}` : `${base} ${areaName}`;
      emit(state, {
        type: 'rename_entity',
        payload: { entityId, name },
        reason: `Generic media player name '${current}' -> '${name}' based on effective area.`,
        confidence: 0.8,
        requiresApproval: true
      });
    });
  }
}

const PASSES: ReadonlyArray<(state: PlanState) => void> = [
  renameAreasFromRules,
  removeEntitiesFromRules,
  hideEntitiesFromRules,
  inheritDeviceAreas,
  backfillDeviceAreas,
  matchAreasByTokens,
  createFallbackArea,
  placeIntoFallbackArea,
  removeSuffixDuplicates,
  hideUniqueIdDuplicates,
  applyAreaPatternRules,
  applyHelperKeywordRules,
  renameGenericMediaPlayers
];

/**
 * Runs every pass in order over one snapshot, then drops actions whose
 * fingerprint is ignored. Identical inputs give identical actions apart from ids.
 */
export function buildPlan(input: PlanInput): Plan {
  const { snapshot } = input;

  const areasByLowerName = new Map<string, Area[]>();
  for (const area of snapshot.areas) {
    const key = area.name.trim().toLowerCase();
    const existing = areasByLowerName.get(key);
    if (existing) {
      existing.push(area);
    } else {
      areasByLowerName.set(key, [area]);
    }
  }

  const state: PlanState = {
    snapshot,
    rules: input.rules,
    fallback: input.fallback,
    createId: input.createId ?? randomUUID,
    actions: [],
    plannedArea: new Set(),
    plannedDeviceArea: new Set(),
    plannedRemoved: new Set(),
    plannedHidden: new Set(),
    areasByLowerName,
    sortedEntityIds: [...snapshot.entityIds].sort(compareStrings),
    needsFallback: false,
    fallbackTarget: null
  };

  for (const pass of PASSES) {
    pass(state);
  }

  const visible = state.actions.filter((action) => !input.ignored.has(fingerprint(action)));

  const areaNameById: Record<string, string> = {};
  for (const area of snapshot.areas) {
    areaNameById[area.areaId] = area.name;
  }

  return {
    createdAt: (input.now ?? new Date()).toISOString(),
    fallbackEnabled: input.fallback.enabled,
    rules: input.provenance,
    actions: visible,
    areaNameById,
    ignoredCount: state.actions.length - visible.length
  };
}
