import type { DeviceUpdate, EntityUpdate } from '../registry/types.js';
import type { RuleProvenance } from '../rules/ruleSet.js';

export const ACTION_TYPES = [
  'set_entity_area',
  'set_device_area',
  'rename_entity',
  'rename_device',
  'remove_entity',
  'hide_entity',
  'rename_area',
  'create_area'
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

/** `areaName` targets a grouping that does not exist yet; apply resolves it by name. */
export type SetEntityAreaPayload = { entityId: string; areaId?: string; areaName?: string };
export type SetDeviceAreaPayload = { deviceId: string; areaId: string };
export type RenameEntityPayload = { entityId: string; name: string };
export type RenameDevicePayload = { deviceId: string; name: string };
export type RemoveEntityPayload = { entityId: string };
export type HideEntityPayload = { entityId: string; hiddenBy: string };
export type RenameAreaPayload = { areaId: string; name: string };
export type CreateAreaPayload = { name: string };

export type ActionPayloads = {
  set_entity_area: SetEntityAreaPayload;
  set_device_area: SetDeviceAreaPayload;
  rename_entity: RenameEntityPayload;
  rename_device: RenameDevicePayload;
  remove_entity: RemoveEntityPayload;
  hide_entity: HideEntityPayload;
  rename_area: RenameAreaPayload;
  create_area: CreateAreaPayload;
};

interface ActionBase {
  id: string;
  reason: string;
  confidence: number;
  requiresApproval: boolean;
}

export type ActionOf<K extends ActionType> = ActionBase & { type: K; payload: ActionPayloads[K] };

export type Action = { [K in ActionType]: ActionOf<K> }[ActionType];

/** An action as read back from disk, before its payload has been checked. */
export interface StoredAction extends ActionBase {
  type: string;
  payload: Record<string, unknown>;
}

export interface PlanDocument<TAction> {
  createdAt: string;
  fallbackEnabled: boolean;
  rules: RuleProvenance;
  actions: TAction[];
  areaNameById: Record<string, string>;
  ignoredCount: number;
}

export type Plan = PlanDocument<Action>;
export type StoredPlan = PlanDocument<StoredAction>;

export type RollbackStep =
  | { kind: 'entity_update'; targetId: string; before: EntityUpdate }
  | { kind: 'device_update'; targetId: string; before: DeviceUpdate }
  | { kind: 'area_update'; targetId: string; before: { name: string | null } }
  | { kind: 'note'; targetId: string; before: Record<string, string | null>; note: string }
  | { kind: 'entity_restore_note'; targetId: string; before: Record<string, string | null> | null; note: string };

export interface RollbackRecord {
  createdAt: string;
  planCreatedAt: string;
  steps: RollbackStep[];
}

export interface SkippedAction {
  id: string;
  reason: string;
}

export interface FailedAction {
  id: string;
  code: string;
  error: string;
}

export interface ApplyResult {
  applied: string[];
  skipped: SkippedAction[];
  failed: FailedAction[];
  rollback: RollbackRecord;
}

export interface RollbackError {
  step: RollbackStep;
  error: string;
}

export interface RollbackResult {
  ok: boolean;
  reverted: number;
  errors: RollbackError[];
  detail?: string;
}
