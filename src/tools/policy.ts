/**
 * Per-tool policy gate.
 */

import { PolicyDeniedError } from '../errors.js';
import type { SessionLease } from './session-guard.js';
import type { ToolExecutor } from './registry.js';

export type ToolDecision = 'allow' | 'prompt' | 'deny';

/**
 * `standard` consults the stored policy; `unrestricted` allows every tool
 * (within the optional allowlist). Fixed for the lifetime of a session.
 */
export type PermissionMode = 'standard' | 'unrestricted';

export interface ToolPolicyConfig {
  /** Decision for tools without an explicit entry (default: 'prompt') */
  default: ToolDecision;
  tools: Record<string, ToolDecision>;
}

export interface ToolPolicyGuardOptions {
  mode?: PermissionMode | undefined;
  /** In unrestricted mode, tools outside this list are denied */
  allowlist?: readonly string[] | undefined;
}

export type Authorization =
  | { decision: 'deny'; reason: string }
  | { decision: 'allow' | 'prompt'; lease: SessionLease | null };

export interface PolicyStatus {
  tool: string;
  decision: ToolDecision;
  source: 'mode' | 'allowlist' | 'explicit' | 'default';
}

export class ToolPolicyGuard {
  readonly mode: PermissionMode;
  private readonly policy: ToolPolicyConfig;
  private readonly allowlist: ReadonlySet<string> | undefined;
  private readonly tools: ToolExecutor;

  constructor(policy: ToolPolicyConfig, tools: ToolExecutor, options: ToolPolicyGuardOptions = {}) {
    this.policy = { default: policy.default, tools: { ...policy.tools } };
    this.tools = tools;
    this.mode = options.mode ?? 'standard';
    this.allowlist = options.allowlist ? new Set(options.allowlist) : undefined;
  }

  /** Pure policy lookup. */
  decide(toolName: string): ToolDecision {
    return this.explain(toolName).decision;
  }

  explain(toolName: string): PolicyStatus {
    if (this.mode === 'unrestricted') {
      if (this.allowlist && !this.allowlist.has(toolName)) {
        return { tool: toolName, decision: 'deny', source: 'allowlist' };
      }
      return { tool: toolName, decision: 'allow', source: 'mode' };
    }

    const explicit = this.policy.tools[toolName];
    if (explicit) {
      return { tool: toolName, decision: explicit, source: 'explicit' };
    }
    return { tool: toolName, decision: this.policy.default, source: 'default' };
  }

  /**
   * Decide, then reserve a session slot for session-based tools that may run.
   * A denied tool acquires nothing.
   *
   * @throws ResourceExhaustedError when no session slot is free
   */
  authorize(toolName: string): Authorization {
    const decision = this.decide(toolName);
    if (decision === 'deny') {
      return { decision, reason: new PolicyDeniedError(toolName).message };
    }

    const registration = this.tools.get(toolName);
    const lease = registration?.sessionBased ? this.tools.sessionGuard.acquire() : null;
    return { decision, lease };
  }

  /** Effective decision for every registered tool. */
  describe(): PolicyStatus[] {
    return this.tools
      .definitions()
      .map((def) => this.explain(def.function.name))
      .sort((a, b) => a.tool.localeCompare(b.tool));
  }
}
