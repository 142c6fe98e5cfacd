/**
 * Tool registrations and the execution path the orchestrator calls into.
 */

import { type ZodType, toJSONSchema } from 'zod';
import { ToolExecutionError, ToolTimeoutError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { SessionConcurrencyGuard } from './session-guard.js';

// ── Definitions ──────────────────────────────────────────────────────

/**
 * Tool definition in the function-calling format providers accept.
 */
export interface LlmToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ToolContext {
  toolCallId: string;
  /** Aborted on interrupt or timeout */
  signal: AbortSignal;
}

export interface DefineToolConfig<TInput, TOutput> {
  name: string;
  description: string;
  /** Zod schema for input validation; `z.object({})` for tools without input */
  inputSchema: ZodType<TInput>;
  /** Holds a long-lived session slot while running (default: false) */
  sessionBased?: boolean | undefined;
  /** Commits external side effects; its result survives an interrupt (default: false) */
  mutating?: boolean | undefined;
  /** Overrides the registry default */
  timeoutMs?: number | undefined;
  execute: (input: TInput, ctx: ToolContext) => Promise<TOutput>;
}

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  /** JSON schema of the input */
  readonly parameters: Record<string, unknown>;
  readonly sessionBased: boolean;
  readonly mutating: boolean;
  readonly timeoutMs: number | undefined;
  /** Validate raw arguments and run the tool */
  run(args: unknown, ctx: ToolContext): Promise<unknown>;
  toLlmToolDefinition(): LlmToolDefinition;
}

/**
 * Define a tool. The input schema is both the validator and the JSON schema shown to the model.
 *
 * @example
 * ```typescript
 * const readFile = defineTool({
 *   name: 'read_file',
 *   description: 'Read a UTF-8 file',
 *   inputSchema: z.object({ path: z.string() }),
 *   execute: async ({ path }) => fs.readFile(path, 'utf8'),
 * });
 * ```
 */
export function defineTool<TInput, TOutput>(config: DefineToolConfig<TInput, TOutput>): RegisteredTool {
  const schema = config.inputSchema;
  const parameters: Record<string, unknown> = Object.fromEntries(
    Object.entries(toJSONSchema(schema)).filter(([key]) => key !== '$schema')
  );

  return {
    name: config.name,
    description: config.description,
    parameters,
    sessionBased: config.sessionBased ?? false,
    mutating: config.mutating ?? false,
    timeoutMs: config.timeoutMs,
    async run(args, ctx) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        const details = parsed.error.issues
          .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new ToolExecutionError(config.name, `Invalid arguments for tool '${config.name}': ${details}`);
      }
      return config.execute(parsed.data, ctx);
    },
    toLlmToolDefinition() {
      return {
        type: 'function',
        function: { name: config.name, description: config.description, parameters },
      };
    },
  };
}

// ── Registry ─────────────────────────────────────────────────────────

export class DuplicateToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export interface ExecuteOptions {
  toolCallId: string;
  signal?: AbortSignal | undefined;
  /** Called once the tool's own promise settles, or at once when the tool never starts */
  onSettled?: (() => void) | undefined;
}

/**
 * Anything that can run a tool by name. The orchestrator depends on this, not on the registry.
 */
export interface ToolExecutor {
  get(name: string): RegisteredTool | undefined;
  definitions(): LlmToolDefinition[];
  /** Must invoke `options.onSettled` exactly once per call. */
  execute(name: string, args: unknown, options: ExecuteOptions): Promise<unknown>;
  readonly sessionGuard: SessionConcurrencyGuard;
}

export interface ToolRegistryOptions {
  /** Slots for session-based tools (default: 3) */
  maxSessions?: number | undefined;
  sessionToolsEnabled?: boolean | undefined;
  /** Applied to tools without their own timeout; 0 disables (default: 0) */
  defaultTimeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Tool execution aborted');
}

export class ToolRegistry implements ToolExecutor {
  readonly sessionGuard: SessionConcurrencyGuard;
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly defaultTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.sessionGuard = new SessionConcurrencyGuard({
      maxSessions: options.maxSessions ?? 3,
      enabled: options.sessionToolsEnabled ?? true,
    });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
    this.log = options.logger ?? createLogger({ name: 'tools' });
  }

  /** @throws DuplicateToolError when the name is taken */
  register(...tools: RegisteredTool[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new DuplicateToolError(tool.name);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  definitions(): LlmToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.toLlmToolDefinition());
  }

  /**
   * Run a tool with validation and timeout. Does not consult policy; callers gate first.
   *
   * @throws UnknownToolError, ToolExecutionError, ToolTimeoutError, or the abort reason
   */
  async execute(name: string, args: unknown, options: ExecuteOptions): Promise<unknown> {
    const settle = () => options.onSettled?.();
    const tool = this.tools.get(name);
    if (!tool) {
      settle();
      throw new UnknownToolError(name);
    }

    const parent = options.signal;
    if (parent?.aborted) {
      settle();
      throw abortReason(parent);
    }

    const controller = new AbortController();
    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const stopped = new Promise<never>((_, reject) => {
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          const error = new ToolTimeoutError(name, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }
      if (parent) {
        onParentAbort = () => {
          controller.abort(parent.reason);
          reject(abortReason(parent));
        };
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
    });

    const running = tool.run(args, { toolCallId: options.toolCallId, signal: controller.signal });
    running.then(settle, (error: unknown) => {
      if (controller.signal.aborted) {
        this.log.debug(`Tool '${name}' settled after being stopped`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      settle();
    });

    try {
      return await Promise.race([running, stopped]);
    } catch (error) {
      if (
        error instanceof ToolExecutionError ||
        error instanceof ToolTimeoutError ||
        controller.signal.aborted
      ) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolExecutionError(name, message, error);
    } finally {
      if (timer) clearTimeout(timer);
      if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
    }
  }
}
