import type { AppConfig } from '../config.js';

export interface MutationPolicyInput {
  tool: string;
  confirm?: boolean;
}

export interface MutationPolicyDecision {
  allowed: boolean;
  reasons: string[];
}

/** Gates the tools that change registry state. Planning and reads are never gated. */
export class PolicyEngine {
  constructor(private readonly config: Pick<AppConfig, 'safeMode' | 'requireConfirm'>) {}

  evaluateMutation(input: MutationPolicyInput): MutationPolicyDecision {
    const reasons: string[] = [];

    if (this.config.safeMode === 'read_only') {
      reasons.push('Server is running in read-only mode (HOUSEKEEPER_SAFE_MODE=read_only).');
    }

    if (this.config.requireConfirm && input.confirm !== true) {
      reasons.push(`${input.tool} requires confirm=true.`);
    }

    return { allowed: reasons.length === 0, reasons };
  }
}
