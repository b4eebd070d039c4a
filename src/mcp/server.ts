import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import type { HousekeeperEngine } from '../engine/engine.js';
import { actionableErrorFields, asHousekeeperError, type ErrorCode } from '../errors.js';
import { fingerprint } from '../housekeeping/fingerprint.js';
import type { PlanDocument, StoredAction } from '../housekeeping/model.js';
import type { JournalResult, OperationJournal } from '../journal/operationJournal.js';
import type { PolicyEngine } from '../policy/policyEngine.js';

export interface ServerDependencies {
  engine: HousekeeperEngine;
  logger: Logger;
  policy: PolicyEngine;
  journal: OperationJournal;
  version?: string;
}

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown) {
  const structuredContent: Record<string, unknown> = {
    result: data
  };
  return {
    content: [
      {
        type: 'text' as const,
        text: toJsonText(data)
      }
    ],
    structuredContent
  };
}

function errorResult(code: ErrorCode, message: string, details?: unknown) {
  const actionable = actionableErrorFields(code);
  const error =
    details === undefined
      ? {
          code,
          message,
          ...actionable
        }
      : {
          code,
          message,
          ...actionable,
          details
        };
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: toJsonText({
          error
        })
      }
    ],
    structuredContent: {
      error
    }
  };
}

function parseLimit(value: number | undefined, fallback: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(1, Math.floor(value)));
}

/** Actions as callers see them: each one carries the fingerprint used to ignore it. */
function withFingerprints<T extends StoredAction>(plan: PlanDocument<T>) {
  return {
    ...plan,
    actions: plan.actions.map((action) => ({ ...action, fingerprint: fingerprint(action) }))
  };
}

const fingerprintListSchema = z.array(z.string().trim().min(1)).min(1);

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { engine, policy, journal, logger } = deps;

  const server = new McpServer(
    {
      name: 'mcp-registry-housekeeper',
      version: deps.version ?? '1.0.0'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  async function journaled<T>(tool: string, details: Record<string, unknown>, fn: () => Promise<T>) {
    const started = Date.now();
    try {
      const data = await fn();
      await journal.record({
        tool,
        result: 'success',
        durationMs: Date.now() - started,
        details
      });
      return successResult(data);
    } catch (error) {
      const mapped = asHousekeeperError(error);
      logger.warn({ tool, code: mapped.code, message: mapped.message }, 'Tool call failed');
      await journal.record({
        tool,
        result: 'error',
        durationMs: Date.now() - started,
        errorCode: mapped.code,
        message: mapped.message,
        details
      });
      return errorResult(mapped.code, mapped.message, mapped.details);
    }
  }

  async function guardedMutation<T>(
    tool: string,
    confirm: boolean | undefined,
    details: Record<string, unknown>,
    fn: () => Promise<T>
  ) {
    const decision = policy.evaluateMutation({ tool, confirm });
    if (!decision.allowed) {
      const message = decision.reasons.join(' ');
      await journal.record({
        tool,
        result: 'blocked',
        errorCode: 'POLICY_DENY',
        message,
        details
      });
      return errorResult('POLICY_DENY', message, { reasons: decision.reasons });
    }
    return journaled(tool, details, fn);
  }

  server.registerTool(
    'housekeeping.health.get',
    {
      description: 'Check that the registry is reachable and the access token is accepted.'
    },
    async () => {
      return journaled('housekeeping.health.get', {}, () => engine.health());
    }
  );

  server.registerTool(
    'housekeeping.audit.run',
    {
      description:
        'Read-only registry audit: devices without area, entities without effective area, duplicate ids, ' +
        'generic media player names and helper entities.'
    },
    async () => {
      return journaled('housekeeping.audit.run', {}, () => engine.audit());
    }
  );

  server.registerTool(
    'housekeeping.plan.create',
    {
      description:
        'Derive a fresh cleanup plan from the live registry and the rules file, replacing the stored plan. ' +
        'Nothing is changed in the registry.',
      inputSchema: {
        fallback: z
          .boolean()
          .optional()
          .default(false)
          .describe('Put entities that end up without an area into the fallback area.')
      }
    },
    async ({ fallback }) => {
      return journaled('housekeeping.plan.create', { fallback }, async () => {
        return withFingerprints(await engine.plan({ fallback }));
      });
    }
  );

  server.registerTool(
    'housekeeping.plan.get',
    {
      description: 'Return the stored plan, or null when none has been created.'
    },
    async () => {
      return journaled('housekeeping.plan.get', {}, async () => {
        const plan = await engine.getPlan();
        return plan ? withFingerprints(plan) : null;
      });
    }
  );

  server.registerTool(
    'housekeeping.plan.apply',
    {
      description:
        'Apply the stored plan. Actions that require approval run only when their id is listed in approvedIds. ' +
        'Returns applied, skipped and failed action ids; the rollback record is replaced.',
      inputSchema: {
        approvedIds: z.array(z.string()).optional().default([]),
        confirm: z.boolean().optional()
      }
    },
    async ({ approvedIds, confirm }) => {
      return guardedMutation('housekeeping.plan.apply', confirm, { approved: approvedIds.length }, () =>
        engine.apply(approvedIds)
      );
    }
  );

  server.registerTool(
    'housekeeping.rollback.run',
    {
      description:
        'Revert the last apply, newest change first. Created areas and removed entities are not reverted.',
      inputSchema: {
        confirm: z.boolean().optional()
      }
    },
    async ({ confirm }) => {
      return guardedMutation('housekeeping.rollback.run', confirm, {}, () => engine.rollback());
    }
  );

  server.registerTool(
    'housekeeping.rollback.get',
    {
      description: 'Return the stored rollback record, or null when nothing has been applied.'
    },
    async () => {
      return journaled('housekeeping.rollback.get', {}, () => engine.getRollback());
    }
  );

  server.registerTool(
    'housekeeping.ignore.list',
    {
      description: 'List ignored action fingerprints.'
    },
    async () => {
      return journaled('housekeeping.ignore.list', {}, async () => ({ fingerprints: await engine.listIgnored() }));
    }
  );

  server.registerTool(
    'housekeeping.ignore.add',
    {
      description: 'Ignore fingerprints so matching actions are left out of future plans.',
      inputSchema: {
        fingerprints: fingerprintListSchema
      }
    },
    async ({ fingerprints }) => {
      return journaled('housekeeping.ignore.add', { fingerprints }, async () => ({
        fingerprints: await engine.ignore(fingerprints)
      }));
    }
  );

  server.registerTool(
    'housekeeping.ignore.remove',
    {
      description: 'Stop ignoring the given fingerprints.',
      inputSchema: {
        fingerprints: fingerprintListSchema
      }
    },
    async ({ fingerprints }) => {
      return journaled('housekeeping.ignore.remove', { fingerprints }, async () => ({
        fingerprints: await engine.unignore(fingerprints)
      }));
    }
  );

  server.registerTool(
    'housekeeping.ignore.clear',
    {
      description: 'Forget every ignored fingerprint.'
    },
    async () => {
      return journaled('housekeeping.ignore.clear', {}, async () => {
        await engine.clearIgnored();
        return { fingerprints: [] };
      });
    }
  );

  server.registerTool(
    'housekeeping.journal.query',
    {
      description: 'Query the in-memory journal of tool calls made against this server.',
      inputSchema: {
        tool: z.string().optional(),
        result: z.enum(['success', 'error', 'blocked']).optional(),
        since: z.string().optional(),
        limit: z.number().optional().default(100)
      }
    },
    async ({ tool, result, since, limit }) => {
      const query: { tool?: string; result?: JournalResult; since?: string; limit: number } = {
        tool,
        result,
        since,
        limit: parseLimit(limit, 100, 10_000)
      };
      // Reading the journal is not itself journaled.
      return successResult({ entries: journal.query(query) });
    }
  );

  server.registerResource(
    'housekeeping-plan-current',
    'housekeeping://plan/current',
    {
      title: 'Current Housekeeping Plan',
      description: 'The stored plan with action fingerprints.',
      mimeType: 'application/json'
    },
    async () => {
      const plan = await engine.getPlan();
      return {
        contents: [
          {
            uri: 'housekeeping://plan/current',
            mimeType: 'application/json',
            text: toJsonText(plan ? withFingerprints(plan) : null)
          }
        ]
      };
    }
  );

  server.registerPrompt(
    'housekeeping_review',
    {
      title: 'Registry Housekeeping Review',
      description: 'Prompt template for the audit, plan, approve and apply workflow.',
      argsSchema: {
        focus: z.string().optional().describe('Area or kind of cleanup to concentrate on.')
      }
    },
    async ({ focus }) => {
      return {
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text:
                `Focus: ${focus ?? 'whole registry'}\n` +
                'Run housekeeping.audit.run, then housekeeping.plan.create. Review actions with requiresApproval=true ' +
                'and list the ids you approve. Apply with housekeeping.plan.apply confirm=true. ' +
                'Use housekeeping.ignore.add with an action fingerprint to stop it from coming back, and ' +
                'housekeeping.rollback.run if an apply needs to be undone.'
            }
          }
        ]
      };
    }
  );

  return server;
}
