import type { Logger } from 'pino';
import { z } from 'zod/v4';

import { asHousekeeperError, describeError, isRegistryRejection } from '../errors.js';
import type { Area, Device, Entity, RegistryClient } from '../registry/types.js';
import type {
  ApplyResult,
  CreateAreaPayload,
  FailedAction,
  HideEntityPayload,
  RemoveEntityPayload,
  RenameAreaPayload,
  RenameDevicePayload,
  RenameEntityPayload,
  RollbackStep,
  SetDeviceAreaPayload,
  SetEntityAreaPayload,
  SkippedAction,
  StoredAction,
  StoredPlan
} from './model.js';

const id = z.string().trim().min(1);

const setEntityAreaSchema: z.ZodType<SetEntityAreaPayload> = z.object({
  entityId: id,
  areaId: id.optional(),
  areaName: id.optional()
});
const setDeviceAreaSchema: z.ZodType<SetDeviceAreaPayload> = z.object({ deviceId: id, areaId: id });
const renameEntitySchema: z.ZodType<RenameEntityPayload> = z.object({ entityId: id, name: id });
const renameDeviceSchema: z.ZodType<RenameDevicePayload> = z.object({ deviceId: id, name: id });
const removeEntitySchema: z.ZodType<RemoveEntityPayload> = z.object({ entityId: id });
const hideEntitySchema: z.ZodType<HideEntityPayload> = z.object({ entityId: id, hiddenBy: id.default('user') });
const renameAreaSchema: z.ZodType<RenameAreaPayload> = z.object({ areaId: id, name: id });
const createAreaSchema: z.ZodType<CreateAreaPayload> = z.object({ name: id });

type Outcome = { status: 'applied' } | { status: 'skipped'; reason: string };

const APPLIED: Outcome = { status: 'applied' };

function skipped(reason: string): Outcome {
  return { status: 'skipped', reason };
}

async function withPayload<T>(
  schema: z.ZodType<T>,
  raw: Record<string, unknown>,
  handler: (payload: T) => Promise<Outcome>
): Promise<Outcome> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? 'payload')))];
    return skipped(`missing ${fields.join('/')}`);
  }
  return handler(parsed.data);
}

export interface ApplyOptions {
  client: RegistryClient;
  logger: Logger;
  now?: () => Date;
}

/**
 * One pass over a stored plan. Registry state is read once up front and kept
 * current as mutations succeed, so every captured `before` reflects the value
 * the mutation replaced.
 */
class ApplyRun {
  readonly steps: RollbackStep[] = [];

  private readonly entities = new Map<string, Entity>();
  private readonly devices = new Map<string, Device>();
  private readonly areas = new Map<string, Area>();
  private readonly areaIdByName = new Map<string, string>();

  constructor(
    private readonly client: RegistryClient,
    state: { areas: Area[]; devices: Device[]; entities: Entity[] }
  ) {
    for (const entity of state.entities) {
      this.entities.set(entity.entityId, { ...entity });
    }
    for (const device of state.devices) {
      this.devices.set(device.id, { ...device });
    }
    for (const area of state.areas) {
      this.rememberArea(area);
    }
  }

  run(action: StoredAction): Promise<Outcome> {
    switch (action.type) {
      case 'set_entity_area':
        return withPayload(setEntityAreaSchema, action.payload, (payload) => this.setEntityArea(payload));
      case 'set_device_area':
        return withPayload(setDeviceAreaSchema, action.payload, (payload) => this.setDeviceArea(payload));
      case 'rename_entity':
        return withPayload(renameEntitySchema, action.payload, (payload) => this.renameEntity(payload));
      case 'rename_device':
        return withPayload(renameDeviceSchema, action.payload, (payload) => this.renameDevice(payload));
      case 'remove_entity':
        return withPayload(removeEntitySchema, action.payload, (payload) => this.removeEntity(payload));
      case 'hide_entity':
        return withPayload(hideEntitySchema, action.payload, (payload) => this.hideEntity(payload));
      case 'rename_area':
        return withPayload(renameAreaSchema, action.payload, (payload) => this.renameArea(payload));
      case 'create_area':
        return withPayload(createAreaSchema, action.payload, (payload) => this.createArea(payload));
      default:
        return Promise.resolve(skipped(`unsupported action type ${action.type}`));
    }
  }

  /** Drops steps recorded for an action whose mutation did not go through. */
  discardStepsFrom(mark: number): void {
    this.steps.splice(mark);
  }

  private rememberArea(area: Area): void {
    this.areas.set(area.areaId, { ...area });
    this.areaIdByName.set(area.name.trim().toLowerCase(), area.areaId);
  }

  private async setEntityArea(payload: SetEntityAreaPayload): Promise<Outcome> {
    let areaId = payload.areaId;
    if (!areaId && payload.areaName) {
      areaId = this.areaIdByName.get(payload.areaName.trim().toLowerCase());
      if (!areaId) {
        return skipped(`area '${payload.areaName}' does not exist`);
      }
    }
    if (!areaId) {
      return skipped('missing areaId/areaName');
    }

    const entity = this.entities.get(payload.entityId);
    this.steps.push({ kind: 'entity_update', targetId: payload.entityId, before: { areaId: entity?.areaId ?? null } });
    await this.client.updateEntity(payload.entityId, { areaId });
    if (entity) {
      entity.areaId = areaId;
    }
    return APPLIED;
  }

  private async setDeviceArea(payload: SetDeviceAreaPayload): Promise<Outcome> {
    const device = this.devices.get(payload.deviceId);
    this.steps.push({ kind: 'device_update', targetId: payload.deviceId, before: { areaId: device?.areaId ?? null } });
    await this.client.updateDevice(payload.deviceId, { areaId: payload.areaId });
    if (device) {
      device.areaId = payload.areaId;
    }
    return APPLIED;
  }

  private async renameEntity(payload: RenameEntityPayload): Promise<Outcome> {
    const entity = this.entities.get(payload.entityId);
    this.steps.push({ kind: 'entity_update', targetId: payload.entityId, before: { name: entity?.name ?? null } });
    await this.client.updateEntity(payload.entityId, { name: payload.name });
    if (entity) {
      entity.name = payload.name;
    }
    return APPLIED;
  }

  private async renameDevice(payload: RenameDevicePayload): Promise<Outcome> {
    const device = this.devices.get(payload.deviceId);
    this.steps.push({
      kind: 'device_update',
      targetId: payload.deviceId,
      before: { nameByUser: device?.nameByUser ?? null }
    });
    await this.client.updateDevice(payload.deviceId, { nameByUser: payload.name });
    if (device) {
      device.nameByUser = payload.name;
    }
    return APPLIED;
  }

  private async removeEntity(payload: RemoveEntityPayload): Promise<Outcome> {
    const entity = this.entities.get(payload.entityId);
    this.steps.push({
      kind: 'entity_restore_note',
      targetId: payload.entityId,
      before: entity
        ? {
            areaId: entity.areaId,
            deviceId: entity.deviceId,
            disabledBy: entity.disabledBy,
            hiddenBy: entity.hiddenBy,
            name: entity.name,
            originalName: entity.originalName,
            platform: entity.platform,
            uniqueId: entity.uniqueId
          }
        : null,
      note: 'Removed entities are not restored automatically; re-add the integration to bring it back.'
    });
    await this.client.removeEntity(payload.entityId);
    this.entities.delete(payload.entityId);
    return APPLIED;
  }

  private async hideEntity(payload: HideEntityPayload): Promise<Outcome> {
    const entity = this.entities.get(payload.entityId);
    this.steps.push({
      kind: 'entity_update',
      targetId: payload.entityId,
      before: { hiddenBy: entity?.hiddenBy ?? null, disabledBy: entity?.disabledBy ?? null }
    });

    try {
      await this.client.updateEntity(payload.entityId, { hiddenBy: payload.hiddenBy });
      if (entity) {
        entity.hiddenBy = payload.hiddenBy;
      }
    } catch (error: unknown) {
      if (!isRegistryRejection(error)) {
        throw error;
      }
      // Registry refused hiding; disabling keeps the entity out of view as well.
      await this.client.updateEntity(payload.entityId, { disabledBy: payload.hiddenBy });
      if (entity) {
        entity.disabledBy = payload.hiddenBy;
      }
    }
    return APPLIED;
  }

  private async renameArea(payload: RenameAreaPayload): Promise<Outcome> {
    const area = this.areas.get(payload.areaId);
    this.steps.push({ kind: 'area_update', targetId: payload.areaId, before: { name: area?.name ?? null } });
    const updated = await this.client.updateArea(payload.areaId, { name: payload.name });
    if (area) {
      this.areaIdByName.delete(area.name.trim().toLowerCase());
    }
    this.rememberArea(updated);
    return APPLIED;
  }

  private async createArea(payload: CreateAreaPayload): Promise<Outcome> {
    if (this.areaIdByName.has(payload.name.trim().toLowerCase())) {
      return APPLIED;
    }
    const created = await this.client.createArea(payload.name);
    this.rememberArea(created);
    this.steps.push({
      kind: 'note',
      targetId: created.areaId,
      before: {},
      note: `Created area '${created.name}'; rollback leaves it in place.`
    });
    return APPLIED;
  }
}

/**
 * Executes a stored plan in order. Actions that need approval run only when
 * their id is approved. A failing action is recorded and the rest still run.
 * Only the initial registry read can make this throw.
 */
export async function applyPlan(
  plan: StoredPlan,
  approvedIds: ReadonlySet<string>,
  options: ApplyOptions
): Promise<ApplyResult> {
  const { client, logger } = options;
  const now = options.now ?? (() => new Date());

  const areas = await client.listAreas();
  const devices = await client.listDevices();
  const entities = await client.listEntities();
  const run = new ApplyRun(client, { areas, devices, entities });

  const applied: string[] = [];
  const skippedActions: SkippedAction[] = [];
  const failed: FailedAction[] = [];

  for (const action of plan.actions) {
    if (action.requiresApproval && !approvedIds.has(action.id)) {
      skippedActions.push({ id: action.id, reason: 'requires_approval' });
      continue;
    }

    const mark = run.steps.length;
    try {
      const outcome = await run.run(action);
      if (outcome.status === 'applied') {
        applied.push(action.id);
      } else {
        skippedActions.push({ id: action.id, reason: outcome.reason });
      }
    } catch (error: unknown) {
      run.discardStepsFrom(mark);
      const normalized = asHousekeeperError(error);
      logger.warn({ actionId: action.id, type: action.type, code: normalized.code }, 'Action failed');
      failed.push({ id: action.id, code: normalized.code, error: describeError(normalized) });
    }
  }

  logger.info(
    { applied: applied.length, skipped: skippedActions.length, failed: failed.length },
    'Plan applied'
  );

  return {
    applied,
    skipped: skippedActions,
    failed,
    rollback: {
      createdAt: now().toISOString(),
      planCreatedAt: plan.createdAt,
      steps: run.steps
    }
  };
}
