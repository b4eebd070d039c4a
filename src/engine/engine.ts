import { join } from 'node:path';

import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { HousekeeperError } from '../errors.js';
import { applyPlan } from '../housekeeping/applyExecutor.js';
import { auditSnapshot, type AuditReport } from '../housekeeping/audit.js';
import type { ApplyResult, Plan, RollbackRecord, RollbackResult, StoredPlan } from '../housekeeping/model.js';
import { buildPlan } from '../housekeeping/planner.js';
import { rollbackChanges } from '../housekeeping/rollbackExecutor.js';
import { fetchSnapshot } from '../registry/snapshot.js';
import type { RegistryClient } from '../registry/types.js';
import { FileRuleSource, type RuleSource } from '../rules/ruleSet.js';
import { IgnoreStore } from '../store/ignoreStore.js';
import { JsonDocumentStore } from '../store/jsonDocumentStore.js';
import { ignoredFingerprintsSchema, rollbackRecordSchema, storedPlanSchema } from '../store/schemas.js';
import { OperationLock } from './operationLock.js';

export interface HealthReport {
  ok: true;
  registryUrl: string;
  areas: number;
  checkedAt: string;
}

export interface HousekeeperEngineOptions {
  client: RegistryClient;
  registryUrl: string;
  rules: RuleSource;
  planStore: JsonDocumentStore<StoredPlan>;
  rollbackStore: JsonDocumentStore<RollbackRecord>;
  ignoreStore: IgnoreStore;
  fallbackAreaName: string;
  logger: Logger;
  now?: () => Date;
  createId?: () => string;
}

/**
 * The one context object every caller-facing operation goes through.
 * Plan, apply, rollback and ignore-set changes run one at a time.
 */
export class HousekeeperEngine {
  private readonly client: RegistryClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lock = new OperationLock();

  constructor(private readonly opts: HousekeeperEngineOptions) {
    this.client = opts.client;
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
  }

  async health(): Promise<HealthReport> {
    const areas = await this.client.listAreas();
    return {
      ok: true,
      registryUrl: this.opts.registryUrl,
      areas: areas.length,
      checkedAt: this.now().toISOString()
    };
  }

  async audit(): Promise<AuditReport> {
    const snapshot = await fetchSnapshot(this.client);
    return auditSnapshot(snapshot, this.now());
  }

  plan(options: { fallback: boolean }): Promise<Plan> {
    return this.lock.run(async () => {
      const snapshot = await fetchSnapshot(this.client);
      const { rules, provenance } = await this.opts.rules.load();
      if (provenance.error) {
        this.logger.warn({ path: provenance.path, error: provenance.error }, 'Planning without rules');
      }
      if (provenance.diagnostics.length) {
        this.logger.warn({ path: provenance.path, diagnostics: provenance.diagnostics }, 'Dropped invalid rule entries');
      }

      const plan = buildPlan({
        snapshot,
        rules,
        provenance,
        ignored: await this.opts.ignoreStore.asSet(),
        fallback: { enabled: options.fallback, areaName: this.opts.fallbackAreaName },
        now: this.now(),
        createId: this.opts.createId
      });

      await this.opts.planStore.write(plan);
      this.logger.info({ actions: plan.actions.length, ignored: plan.ignoredCount }, 'Plan created');
      return plan;
    });
  }

  getPlan(): Promise<StoredPlan | null> {
    return this.opts.planStore.read();
  }

  apply(approvedIds: Iterable<string>): Promise<ApplyResult> {
    const approved = new Set(approvedIds);
    return this.lock.run(async () => {
      const plan = await this.opts.planStore.read();
      if (!plan) {
        throw new HousekeeperError('VALIDATION', 'No plan found; create one before applying');
      }

      const result = await applyPlan(plan, approved, { client: this.client, logger: this.logger, now: this.now });
      await this.opts.rollbackStore.write(result.rollback);
      return result;
    });
  }

  rollback(): Promise<RollbackResult> {
    return this.lock.run(async () => {
      const record = await this.opts.rollbackStore.read();
      return rollbackChanges(record, { client: this.client, logger: this.logger });
    });
  }

  getRollback(): Promise<RollbackRecord | null> {
    return this.opts.rollbackStore.read();
  }

  listIgnored(): Promise<string[]> {
    return this.opts.ignoreStore.list();
  }

  ignore(fingerprints: string[]): Promise<string[]> {
    return this.lock.run(() => this.opts.ignoreStore.add(fingerprints));
  }

  unignore(fingerprints: string[]): Promise<string[]> {
    return this.lock.run(() => this.opts.ignoreStore.remove(fingerprints));
  }

  clearIgnored(): Promise<void> {
    return this.lock.run(() => this.opts.ignoreStore.clear());
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/** Wires the file-backed stores and rule source under the configured data directory. */
export function createEngineFromConfig(
  config: Pick<AppConfig, 'registryUrl' | 'dataDir' | 'rulesPath' | 'fallbackAreaName'>,
  deps: { client: RegistryClient; logger: Logger }
): HousekeeperEngine {
  const { client, logger } = deps;
  return new HousekeeperEngine({
    client,
    logger,
    registryUrl: config.registryUrl,
    rules: new FileRuleSource(config.rulesPath),
    planStore: new JsonDocumentStore({ path: join(config.dataDir, 'plan.json'), schema: storedPlanSchema, logger }),
    rollbackStore: new JsonDocumentStore({
      path: join(config.dataDir, 'rollback.json'),
      schema: rollbackRecordSchema,
      logger
    }),
    ignoreStore: new IgnoreStore(
      new JsonDocumentStore({ path: join(config.dataDir, 'ignored.json'), schema: ignoredFingerprintsSchema, logger })
    ),
    fallbackAreaName: config.fallbackAreaName
  });
}
