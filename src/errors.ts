/**
 * Error types raised by the turn runtime.
 *
 * Only ConfigurationError and a ProviderFailureError that escapes every
 * recovery path are hard failures; the others are recorded and the turn goes on.
 */

import type { ZodError } from 'zod';

/**
 * A tool call was rejected by the active tool policy.
 */
export class PolicyDeniedError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' execution denied by policy`);
    this.name = 'PolicyDeniedError';
  }
}

/**
 * A bounded resource (session-based tool slots) is exhausted.
 */
export class ResourceExhaustedError extends Error {
  constructor(
    public readonly resource: string,
    public readonly limit: number,
    public readonly active: number
  ) {
    super(
      `Maximum ${resource} (${String(limit)}) exceeded. Current active sessions: ${String(active)}`
    );
    this.name = 'ResourceExhaustedError';
  }
}

/**
 * Raised by model providers. `terminal` marks errors that must never be retried.
 */
export class ProviderError extends Error {
  public readonly terminal: boolean;
  public readonly statusCode: number | undefined;

  constructor(
    message: string,
    options: { terminal?: boolean | undefined; statusCode?: number | undefined; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProviderError';
    this.terminal = options.terminal ?? false;
    this.statusCode = options.statusCode;
  }
}

/**
 * The provider call failed after every retry (and fallback) was spent.
 */
export class ProviderFailureError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message, { cause: lastError });
    this.name = 'ProviderFailureError';
  }
}

/**
 * The request exceeded the model's context window and could not be recovered.
 */
export class ContextOverflowError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ContextOverflowError';
  }
}

/**
 * A tool ran and failed, or its arguments did not validate.
 */
export class ToolExecutionError extends Error {
  constructor(
    public readonly toolName: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ToolExecutionError';
  }
}

export class ToolTimeoutError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool '${toolName}' timed out after ${String(timeoutMs)}ms`);
    this.name = 'ToolTimeoutError';
  }
}

/**
 * Snapshot persistence failed. Logged by the orchestrator, never fatal.
 */
export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly turnNumber?: number | undefined,
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'SnapshotError';
  }
}

export class SnapshotNotFoundError extends SnapshotError {
  constructor(turnNumber: number) {
    super(`Snapshot for turn ${String(turnNumber)} not found`, turnNumber);
    this.name = 'SnapshotNotFoundError';
  }
}

export class SnapshotCorruptedError extends SnapshotError {
  constructor(turnNumber: number, reason: string) {
    super(`Snapshot for turn ${String(turnNumber)} is corrupted: ${reason}`, turnNumber);
    this.name = 'SnapshotCorruptedError';
  }
}

/**
 * Session configuration failed validation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodError['issues'] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  static fromZod(error: ZodError, source?: string): ConfigurationError {
    const details = error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    const prefix = source ? `Invalid configuration in ${source}` : 'Invalid configuration';
    return new ConfigurationError(`${prefix}: ${details}`, error.issues);
  }
}

/**
 * The orchestrator was asked to make a state transition its table forbids.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid turn state transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionTerminatedError extends Error {
  constructor(public readonly state: string) {
    super(`Session is ${state}; no further turns can run`);
    this.name = 'SessionTerminatedError';
  }
}
