/**
 * End-of-turn checkpoints.
 *
 * A snapshot is an envelope around the serialized session state. The
 * checksum covers the serialized payload, so any edit to the stored state
 * is caught on load.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { SnapshotCorruptedError, SnapshotError, SnapshotNotFoundError } from '../errors.js';
import type { CompactionStatistics } from '../memory/types.js';
import type { ConversationMessage } from '../types/conversation.js';
import { deepFreeze } from '../utils/freeze.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { byteLength, checksum, deserialize, serialize } from '../utils/serializer.js';

export const SNAPSHOT_FORMAT_VERSION = 1;

// ── Storage ──────────────────────────────────────────────────────────

/**
 * Key-value storage of snapshot blobs keyed by turn number.
 */
export interface SnapshotStore {
  write(turnNumber: number, data: string): Promise<void>;
  /** null when no snapshot exists for the turn */
  read(turnNumber: number): Promise<string | null>;
  /** Stored turn numbers, ascending */
  list(): Promise<number[]>;
  /** false when there was nothing to delete */
  delete(turnNumber: number): Promise<boolean>;
  filename(turnNumber: number): string;
}

const SNAPSHOT_FILE = /^turn_(\d+)\.json$/;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per turn. Writes go through a `.tmp` file and a rename.
 */
export class FileSnapshotStore implements SnapshotStore {
  constructor(readonly directory: string) {}

  filename(turnNumber: number): string {
    return `turn_${String(turnNumber)}.json`;
  }

  async write(turnNumber: number, data: string): Promise<void> {
    const target = path.join(this.directory, this.filename(turnNumber));
    const temp = `${target}.tmp`;
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(temp, data, 'utf-8');
    await fs.rename(temp, target);
  }

  async read(turnNumber: number): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.directory, this.filename(turnNumber)), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async list(): Promise<number[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const turns: number[] = [];
    for (const name of names) {
      const match = SNAPSHOT_FILE.exec(name);
      if (match?.[1] !== undefined) {
        turns.push(Number.parseInt(match[1], 10));
      }
    }
    return turns.sort((a, b) => a - b);
  }

  async delete(turnNumber: number): Promise<boolean> {
    try {
      await fs.unlink(path.join(this.directory, this.filename(turnNumber)));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  private readonly blobs = new Map<number, string>();

  filename(turnNumber: number): string {
    return `turn_${String(turnNumber)}.json`;
  }

  write(turnNumber: number, data: string): Promise<void> {
    this.blobs.set(turnNumber, data);
    return Promise.resolve();
  }

  read(turnNumber: number): Promise<string | null> {
    return Promise.resolve(this.blobs.get(turnNumber) ?? null);
  }

  list(): Promise<number[]> {
    return Promise.resolve(Array.from(this.blobs.keys()).sort((a, b) => a - b));
  }

  delete(turnNumber: number): Promise<boolean> {
    return Promise.resolve(this.blobs.delete(turnNumber));
  }
}

// ── Schemas ──────────────────────────────────────────────────────────

const MessageTypeSchema = z.enum(['user_message', 'assistant_message', 'tool_result', 'system_note']);
const PrioritySchema = z.enum(['critical', 'high', 'normal', 'low']);

const MessageSchema = z.object({
  id: z.string(),
  role: z.enum(['user', 'assistant', 'tool', 'system']),
  type: MessageTypeSchema,
  content: z.union([z.string(), z.record(z.string(), z.unknown())]),
  timestamp: z.number(),
  sizeBytes: z.number().int().nonnegative(),
  priority: PrioritySchema,
  confidence: z.number().min(0).max(1),
  toolCalls: z
    .array(z.object({ id: z.string(), name: z.string(), arguments: z.string() }))
    .optional(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
  isError: z.boolean().optional(),
  summary: z
    .object({
      evictedCount: z.number().int().nonnegative(),
      byType: z.record(MessageTypeSchema, z.number().int().nonnegative()),
      tools: z.array(z.string()),
      compactions: z.number().int().nonnegative(),
    })
    .optional(),
});

const StatisticsSchema = z.object({
  totalMessages: z.number().int().nonnegative(),
  messagesByPriority: z.record(PrioritySchema, z.number().int().nonnegative()),
  totalMemoryUsage: z.number().nonnegative(),
  averageMessageSize: z.number().nonnegative(),
  lastCompactionTime: z.number().nullable(),
  compactionFrequency: z.number().nonnegative(),
});

export const SessionStateSchema = z.object({
  sessionId: z.string(),
  turnNumber: z.number().int().nonnegative(),
  model: z.string(),
  messages: z.array(MessageSchema),
  statistics: StatisticsSchema,
});

const EnvelopeSchema = z.object({
  version: z.literal(SNAPSHOT_FORMAT_VERSION),
  turnNumber: z.number().int().nonnegative(),
  createdAt: z.number(),
  metadata: z.record(z.string(), z.unknown()),
  checksum: z.string(),
  payload: z.string(),
});

// ── Manager ──────────────────────────────────────────────────────────

/** What a snapshot restores. */
export interface SessionState {
  sessionId: string;
  turnNumber: number;
  model: string;
  messages: readonly ConversationMessage[];
  statistics: CompactionStatistics;
}

export interface Snapshot {
  turnNumber: number;
  /** Epoch ms */
  createdAt: number;
  sizeBytes: number;
  filename: string;
  metadata: Record<string, unknown>;
}

export interface SnapshotManagerOptions {
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
}

export class SnapshotManager {
  private readonly store: SnapshotStore;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(store: SnapshotStore, options: SnapshotManagerOptions = {}) {
    this.store = store;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ name: 'snapshots' });
  }

  /**
   * Persist the state under its turn number, replacing an earlier snapshot of the same turn.
   *
   * @throws SnapshotError when the store fails
   */
  async save(
    turnNumber: number,
    state: SessionState,
    metadata: Record<string, unknown> = {}
  ): Promise<Snapshot> {
    const payload = serialize(state);
    const createdAt = this.now();
    const data = serialize({
      version: SNAPSHOT_FORMAT_VERSION,
      turnNumber,
      createdAt,
      metadata,
      checksum: checksum(payload),
      payload,
    });

    try {
      await this.store.write(turnNumber, data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SnapshotError(
        `Failed to save snapshot for turn ${String(turnNumber)}: ${reason}`,
        turnNumber,
        error
      );
    }

    const snapshot: Snapshot = {
      turnNumber,
      createdAt,
      sizeBytes: byteLength(data),
      filename: this.store.filename(turnNumber),
      metadata,
    };
    this.log.debug('Snapshot saved', { turnNumber, sizeBytes: snapshot.sizeBytes });
    return snapshot;
  }

  /** Readable snapshots in ascending turn order. Unreadable ones are logged and skipped. */
  async list(): Promise<Snapshot[]> {
    const snapshots: Snapshot[] = [];
    for (const turnNumber of await this.store.list()) {
      const data = await this.store.read(turnNumber);
      if (data === null) continue;
      try {
        const envelope = this.parseEnvelope(turnNumber, data);
        snapshots.push({
          turnNumber,
          createdAt: envelope.createdAt,
          sizeBytes: byteLength(data),
          filename: this.store.filename(turnNumber),
          metadata: envelope.metadata,
        });
      } catch (error) {
        this.log.warn('Skipping unreadable snapshot', {
          turnNumber,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return snapshots;
  }

  /**
   * Delete all but the `maxSnapshots` most recent snapshots.
   *
   * @returns turn numbers that were deleted, ascending
   */
  async cleanup(maxSnapshots: number): Promise<number[]> {
    if (!Number.isInteger(maxSnapshots) || maxSnapshots < 0) {
      throw new RangeError(`maxSnapshots must be a non-negative integer, got ${String(maxSnapshots)}`);
    }

    const turns = await this.store.list();
    const excess = turns.slice(0, Math.max(0, turns.length - maxSnapshots));
    const deleted: number[] = [];
    for (const turnNumber of excess) {
      if (await this.store.delete(turnNumber)) {
        deleted.push(turnNumber);
      }
    }
    if (deleted.length > 0) {
      this.log.debug('Old snapshots removed', { deleted: deleted.length, kept: maxSnapshots });
    }
    return deleted;
  }

  /**
   * Load and verify the state saved for a turn. Messages come back frozen.
   *
   * @throws SnapshotNotFoundError, SnapshotCorruptedError
   */
  async load(turnNumber: number): Promise<SessionState> {
    const data = await this.store.read(turnNumber);
    if (data === null) {
      throw new SnapshotNotFoundError(turnNumber);
    }

    const envelope = this.parseEnvelope(turnNumber, data);
    if (checksum(envelope.payload) !== envelope.checksum) {
      throw new SnapshotCorruptedError(turnNumber, 'checksum mismatch');
    }

    let raw: unknown;
    try {
      raw = deserialize(envelope.payload);
    } catch {
      throw new SnapshotCorruptedError(turnNumber, 'payload is not valid JSON');
    }

    const state = SessionStateSchema.safeParse(raw);
    if (!state.success) {
      const first = state.error.issues[0];
      const where = first ? `${first.path.map(String).join('.')}: ${first.message}` : 'invalid state';
      throw new SnapshotCorruptedError(turnNumber, where);
    }
    return deepFreeze(state.data);
  }

  private parseEnvelope(turnNumber: number, data: string): z.output<typeof EnvelopeSchema> {
    let raw: unknown;
    try {
      raw = deserialize(data);
    } catch {
      throw new SnapshotCorruptedError(turnNumber, 'not valid JSON');
    }

    const envelope = EnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new SnapshotCorruptedError(turnNumber, 'unrecognized snapshot format');
    }
    if (envelope.data.turnNumber !== turnNumber) {
      throw new SnapshotCorruptedError(
        turnNumber,
        `stored turn number is ${String(envelope.data.turnNumber)}`
      );
    }
    return envelope.data;
  }
}
