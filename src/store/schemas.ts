import { z } from 'zod/v4';

import type { RollbackRecord, RollbackStep, StoredAction, StoredPlan } from '../housekeeping/model.js';

const nullableField = z.string().nullable().optional();

export const storedActionSchema: z.ZodType<StoredAction> = z.object({
  id: z.string().min(1),
  type: z.string(),
  payload: z.record(z.string(), z.unknown()),
  reason: z.string(),
  confidence: z.number(),
  requiresApproval: z.boolean()
});

export const storedPlanSchema: z.ZodType<StoredPlan> = z.object({
  createdAt: z.string(),
  fallbackEnabled: z.boolean(),
  rules: z.object({
    path: z.string().nullable(),
    error: z.string().optional(),
    diagnostics: z.array(z.string())
  }),
  actions: z.array(storedActionSchema),
  areaNameById: z.record(z.string(), z.string()),
  ignoredCount: z.number().int().nonnegative()
});

const beforeFieldsSchema = z.record(z.string(), z.string().nullable());

export const rollbackStepSchema: z.ZodType<RollbackStep> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('entity_update'),
    targetId: z.string(),
    before: z.object({
      areaId: nullableField,
      name: nullableField,
      hiddenBy: nullableField,
      disabledBy: nullableField
    })
  }),
  z.object({
    kind: z.literal('device_update'),
    targetId: z.string(),
    before: z.object({ areaId: nullableField, nameByUser: nullableField })
  }),
  z.object({
    kind: z.literal('area_update'),
    targetId: z.string(),
    before: z.object({ name: z.string().nullable() })
  }),
  z.object({
    kind: z.literal('note'),
    targetId: z.string(),
    before: beforeFieldsSchema,
    note: z.string()
  }),
  z.object({
    kind: z.literal('entity_restore_note'),
    targetId: z.string(),
    before: beforeFieldsSchema.nullable(),
    note: z.string()
  })
]);

export const rollbackRecordSchema: z.ZodType<RollbackRecord> = z.object({
  createdAt: z.string(),
  planCreatedAt: z.string(),
  steps: z.array(rollbackStepSchema)
});

export const ignoredFingerprintsSchema = z.array(z.string());
