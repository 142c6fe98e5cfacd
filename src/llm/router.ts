/**
 * Picks a model tier for each request.
 */

import { createMessage } from '../memory/history.js';
import { createLogger } from '../utils/logger.js';
import type { ModelProvider } from './types.js';

const logger = createLogger({ name: 'router' });

export type TaskClass = 'simple' | 'standard' | 'complex' | 'codegen_heavy' | 'retrieval_heavy';

export const TASK_CLASSES: readonly TaskClass[] = [
  'simple',
  'standard',
  'complex',
  'codegen_heavy',
  'retrieval_heavy',
];

export interface ResourceBudget {
  maxOutputTokens?: number | undefined;
  /** Tool calls of one response run at most this many at a time */
  maxParallelTools?: number | undefined;
}

export interface RouterConfig {
  enabled: boolean;
  /** Model per class; a missing or blank entry keeps the caller's model */
  models: Partial<Record<TaskClass, string>>;
  budgets: Partial<Record<TaskClass, ResourceBudget>>;
  /** When set, this model labels each request; the heuristic is the fallback */
  llmRouterModel?: string | undefined;
}

export interface RouteDecision {
  taskClass: TaskClass;
  model: string;
  budget: ResourceBudget;
}

const PATCH_KEYWORDS = ['apply_patch', 'unified diff', 'edit_file', 'create_file'];

function hasDiffMarkers(text: string): boolean {
  if (text.includes('diff --git')) return true;
  const lines = text.split('\n');
  if (lines.some((line) => line.startsWith('@@ '))) return true;
  return lines.some(
    (line, i) => line.startsWith('--- ') && (lines[i + 1] ?? '').startsWith('+++ ')
  );
}

/**
 * Code fences, diffs and patch tool names mean code generation; everything else is simple.
 */
export function classifyHeuristic(text: string): TaskClass {
  const lower = text.toLowerCase();
  if (lower.includes('```') || hasDiffMarkers(text)) {
    return 'codegen_heavy';
  }
  if (PATCH_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return 'codegen_heavy';
  }
  return 'simple';
}

/** Model for a class; the caller's model when routing is off or the class has none. */
export function route(config: RouterConfig, taskClass: TaskClass, currentModel: string): string {
  if (!config.enabled) {
    return currentModel;
  }
  const configured = config.models[taskClass];
  return configured && configured.trim() !== '' ? configured : currentModel;
}

export function planRoute(
  config: RouterConfig,
  taskClass: TaskClass,
  currentModel: string
): RouteDecision {
  return {
    taskClass,
    model: route(config, taskClass, currentModel),
    budget: config.enabled ? { ...config.budgets[taskClass] } : {},
  };
}

export const ROUTER_SYSTEM_PROMPT =
  "You are a routing classifier. Output only one label: simple | standard | complex | codegen_heavy | retrieval_heavy. Choose the best class for the user's last message. No prose.";

/** Map free-form classifier output to a class; unknown labels are standard. */
export function parseTaskClass(label: string): TaskClass {
  const text = label.trim().toLowerCase();
  if (text.includes('codegen')) return 'codegen_heavy';
  if (text.includes('retrieval')) return 'retrieval_heavy';
  if (text.includes('complex')) return 'complex';
  if (text.includes('simple')) return 'simple';
  return 'standard';
}

/**
 * Ask the configured router model for a label. Any failure falls back to the heuristic.
 */
export async function classifyWithModel(
  provider: ModelProvider,
  config: RouterConfig,
  text: string,
  signal?: AbortSignal
): Promise<TaskClass> {
  const routerModel = config.llmRouterModel?.trim();
  if (!routerModel) {
    return classifyHeuristic(text);
  }

  try {
    const response = await provider.generate(
      {
        model: routerModel,
        system: ROUTER_SYSTEM_PROMPT,
        messages: [createMessage({ type: 'user_message', content: text, priority: 'normal' })],
        maxOutputTokens: 8,
        temperature: 0,
      },
      { signal }
    );
    if (response.content === null) {
      return classifyHeuristic(text);
    }
    return parseTaskClass(response.content);
  } catch (error) {
    logger.warn('Router model failed, using heuristic classification', {
      model: routerModel,
      error: error instanceof Error ? error.message : String(error),
    });
    return classifyHeuristic(text);
  }
}
