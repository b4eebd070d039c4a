import type { Logger } from 'pino';

import { describeError } from '../errors.js';
import type { RegistryClient } from '../registry/types.js';
import type { RollbackError, RollbackRecord, RollbackResult, RollbackStep } from './model.js';

export const NO_ROLLBACK_DETAIL = 'No rollback record found';

/** `true` when the step changed registry state; `false` when there was nothing to send. */
async function revertStep(client: RegistryClient, step: RollbackStep): Promise<boolean> {
  switch (step.kind) {
    case 'entity_update':
      await client.updateEntity(step.targetId, step.before);
      return true;
    case 'device_update':
      await client.updateDevice(step.targetId, step.before);
      return true;
    case 'area_update':
      if (!step.before.name) {
        return false;
      }
      await client.updateArea(step.targetId, { name: step.before.name });
      return true;
    case 'note':
    case 'entity_restore_note':
      return false;
  }
}

/**
 * Undoes a rollback record newest step first. A failing step is recorded and
 * the older steps are still attempted.
 */
export async function rollbackChanges(
  record: RollbackRecord | null,
  options: { client: RegistryClient; logger: Logger }
): Promise<RollbackResult> {
  if (!record) {
    return { ok: false, reverted: 0, errors: [], detail: NO_ROLLBACK_DETAIL };
  }

  const { client, logger } = options;
  const errors: RollbackError[] = [];
  let reverted = 0;

  for (const step of [...record.steps].reverse()) {
    try {
      if (await revertStep(client, step)) {
        reverted += 1;
      }
    } catch (error: unknown) {
      logger.warn({ kind: step.kind, targetId: step.targetId, err: error }, 'Rollback step failed');
      errors.push({ step, error: describeError(error) });
    }
  }

  logger.info({ reverted, errors: errors.length }, 'Rollback finished');
  return { ok: errors.length === 0, reverted, errors };
}
