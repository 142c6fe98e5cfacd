/**
 * Events published by the orchestrator through its `onEvent` callback.
 */

import type { TurnState } from '../agents/state-machine.js';
import type { TaskClass } from '../llm/router.js';
import type { CompactionResult } from '../memory/types.js';

export type ToolCallStatus = 'success' | 'failed' | 'denied' | 'rejected' | 'cancelled';

export interface StateChangedEvent {
  type: 'state_changed';
  from: TurnState;
  to: TurnState;
}

export interface RouteSelectedEvent {
  type: 'route_selected';
  turnNumber: number;
  taskClass: TaskClass;
  model: string;
}

export interface ToolStartedEvent {
  type: 'tool_started';
  toolCallId: string;
  toolName: string;
}

export interface ToolFinishedEvent {
  type: 'tool_finished';
  toolCallId: string;
  toolName: string;
  status: ToolCallStatus;
  durationMs: number;
}

export interface CompactedEvent {
  type: 'compacted';
  /** True when triggered by a context overflow */
  forced: boolean;
  result: CompactionResult;
}

export interface SnapshotSavedEvent {
  type: 'snapshot_saved';
  turnNumber: number;
  sizeBytes: number;
}

export type AgentEvent =
  | StateChangedEvent
  | RouteSelectedEvent
  | ToolStartedEvent
  | ToolFinishedEvent
  | CompactedEvent
  | SnapshotSavedEvent;

export type AgentEventListener = (event: AgentEvent) => void;
