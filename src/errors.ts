export type ErrorCode =
  | 'AUTH'
  | 'TRANSPORT'
  | 'TIMEOUT'
  | 'REGISTRY'
  | 'VALIDATION'
  | 'POLICY_DENY'
  | 'INTERNAL'
  | 'UNKNOWN';

export interface SuggestedToolCall {
  name: string;
  args?: Record<string, unknown>;
}

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
  suggestedNextToolCalls: SuggestedToolCall[];
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  AUTH: {
    retryable: false,
    fixHint: 'Verify the registry access token (HOUSEKEEPER_REGISTRY_TOKEN) before retrying.',
    suggestedNextToolCalls: [{ name: 'housekeeping.health.get' }]
  },
  TRANSPORT: {
    retryable: true,
    fixHint: 'Check registry host reachability; the connection is re-established on the next call.',
    suggestedNextToolCalls: [{ name: 'housekeeping.health.get' }]
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Retry the operation and increase HOUSEKEEPER_REQUEST_TIMEOUT_MS if the registry is slow.',
    suggestedNextToolCalls: [{ name: 'housekeeping.health.get' }]
  },
  REGISTRY: {
    retryable: false,
    fixHint: 'The registry rejected the request; inspect the registry error code and the affected object.',
    suggestedNextToolCalls: [{ name: 'housekeeping.audit.run' }]
  },
  VALIDATION: {
    retryable: false,
    fixHint: 'Create a fresh plan before applying, and approve only action ids from that plan.',
    suggestedNextToolCalls: [{ name: 'housekeeping.plan.create' }]
  },
  POLICY_DENY: {
    retryable: false,
    fixHint: 'Pass confirm=true, or disable read-only mode (HOUSEKEEPER_SAFE_MODE=read_write).',
    suggestedNextToolCalls: [{ name: 'housekeeping.journal.query', args: { result: 'blocked', limit: 10 } }]
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect logs and the operation journal.',
    suggestedNextToolCalls: [{ name: 'housekeeping.journal.query', args: { result: 'error', limit: 20 } }]
  },
  UNKNOWN: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, check connectivity and inspect logs.',
    suggestedNextToolCalls: [
      { name: 'housekeeping.health.get' },
      { name: 'housekeeping.journal.query', args: { result: 'error', limit: 20 } }
    ]
  }
};

const TRANSPORT_CODES: ReadonlySet<ErrorCode> = new Set(['AUTH', 'TRANSPORT', 'TIMEOUT']);

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code] ?? ACTIONABLE_ERROR_DEFAULTS.UNKNOWN;
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint,
    suggestedNextToolCalls: defaults.suggestedNextToolCalls.map((item) => ({
      name: item.name,
      ...(item.args ? { args: { ...item.args } } : {})
    }))
  };
}

export class HousekeeperError extends Error {
  public readonly code: ErrorCode;
  public readonly registryCode?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      registryCode?: string;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HousekeeperError';
    this.code = code;
    this.registryCode = options?.registryCode;
    this.details = options?.details;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asHousekeeperError(value: unknown): HousekeeperError {
  if (value instanceof HousekeeperError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new HousekeeperError('TIMEOUT', err.message, { cause: err });
  }

  return new HousekeeperError('INTERNAL', err.message, { cause: err });
}

/** Connection-level failures: the registry was not reached or the session broke. */
export function isTransportError(value: unknown): boolean {
  return value instanceof HousekeeperError && TRANSPORT_CODES.has(value.code);
}

/** The registry answered and refused the request. */
export function isRegistryRejection(value: unknown): boolean {
  return value instanceof HousekeeperError && value.code === 'REGISTRY';
}

export function describeError(value: unknown): string {
  const err = asHousekeeperError(value);
  return err.registryCode ? `${err.registryCode}: ${err.message}` : err.message;
}
