/**
 * Task Tracker - lifecycle state of every in-flight unit of work.
 *
 * Each `transition` is a synchronous read-validate-write, so two competing transitions
 * on one task (a cancel racing a natural completion) resolve to exactly one winner;
 * the loser gets INVALID_TRANSITION.
 */

import crypto from "node:crypto";
import { RelayError, type FailureReason } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import {
  STATE_RANK,
  isTerminal,
  type TaskSnapshot,
  type TaskState,
  type TaskStats,
  type TransitionEvent,
  type TransitionListener
} from "./types.js";

type TaskRecord = {
  taskId: string;
  contextId: string;
  state: TaskState;
  backendId: string | null;
  query: string;
  createdAt: string;
  updatedAt: string;
  terminalAt: string | null;
  lastError: FailureReason | null;
  chunkCount: number;
};

export type TaskTrackerOptions = {
  /** Terminal tasks beyond this count are evicted oldest-first. Live tasks are never evicted. */
  maxTasks?: number;
  logger?: Logger;
};

function isoNow(): string {
  return new Date().toISOString();
}

function snapshotOf(record: TaskRecord): TaskSnapshot {
  return Object.freeze({
    ...record,
    lastError: record.lastError ? Object.freeze({ ...record.lastError }) : null
  });
}

export class TaskTracker {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly abortControllers = new Map<string, AbortController>();
  private readonly listeners = new Set<TransitionListener>();
  private readonly maxTasks: number;
  private readonly logger: Logger;

  constructor(options: TaskTrackerOptions = {}) {
    this.maxTasks = options.maxTasks ?? 1000;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Allocate a task in state `created` and return its id.
   */
  create(contextId: string, query = ""): string {
    if (this.tasks.size >= this.maxTasks) {
      this.evictOldestTerminal();
    }

    const taskId = crypto.randomUUID();
    const now = isoNow();
    this.tasks.set(taskId, {
      taskId,
      contextId,
      state: "created",
      backendId: null,
      query,
      createdAt: now,
      updatedAt: now,
      terminalAt: null,
      lastError: null,
      chunkCount: 0
    });
    this.abortControllers.set(taskId, new AbortController());
    return taskId;
  }

  /**
   * Move a task forward along its lifecycle.
   * Re-entering the current non-terminal state is an idempotent touch.
   *
   * @throws RelayError NOT_FOUND, or INVALID_TRANSITION when moving backwards or out of a terminal state
   */
  transition(taskId: string, newState: TaskState, error?: FailureReason): TaskSnapshot {
    const record = this.require(taskId);
    const from = record.state;

    if (isTerminal(from)) {
      throw new RelayError("INVALID_TRANSITION", `Task ${taskId} is already ${from}; cannot move to ${newState}`, {
        taskId,
        from,
        to: newState
      });
    }
    if (STATE_RANK[newState] < STATE_RANK[from]) {
      throw new RelayError("INVALID_TRANSITION", `Task ${taskId} cannot move back from ${from} to ${newState}`, {
        taskId,
        from,
        to: newState
      });
    }

    const now = isoNow();
    record.updatedAt = now;
    if (from === newState) {
      return snapshotOf(record);
    }

    record.state = newState;
    if (error) {
      record.lastError = { kind: error.kind, message: error.message };
    }
    if (isTerminal(newState)) {
      record.terminalAt = now;
      this.abortControllers.delete(taskId);
    }

    const task = snapshotOf(record);
    this.notify({ taskId, from, to: newState, task });
    return task;
  }

  /**
   * Transition to `canceled` and fire the task's abort signal.
   * Returns false when the task is unknown or already terminal.
   */
  cancel(taskId: string): boolean {
    const record = this.tasks.get(taskId);
    if (!record || isTerminal(record.state)) return false;

    const controller = this.abortControllers.get(taskId);
    this.transition(taskId, "canceled");
    if (controller && !controller.signal.aborted) {
      controller.abort(new RelayError("CALLER_CANCELED", `Task ${taskId} was canceled by the caller`));
    }
    return true;
  }

  /**
   * Record which backend a task was delegated to. Only allowed before the task is terminal.
   */
  assignBackend(taskId: string, backendId: string): TaskSnapshot {
    const record = this.require(taskId);
    if (isTerminal(record.state)) {
      throw new RelayError("INVALID_TRANSITION", `Task ${taskId} is already ${record.state}`, { taskId });
    }
    record.backendId = backendId;
    record.updatedAt = isoNow();
    return snapshotOf(record);
  }

  /**
   * Count a forwarded chunk. Ignored once the task is terminal.
   */
  recordChunk(taskId: string): void {
    const record = this.tasks.get(taskId);
    if (!record || isTerminal(record.state)) return;
    record.chunkCount++;
    record.updatedAt = isoNow();
  }

  get(taskId: string): TaskSnapshot | undefined {
    const record = this.tasks.get(taskId);
    return record ? snapshotOf(record) : undefined;
  }

  getAbortSignal(taskId: string): AbortSignal | undefined {
    return this.abortControllers.get(taskId)?.signal;
  }

  list(state?: TaskState): TaskSnapshot[] {
    const all = Array.from(this.tasks.values(), snapshotOf);
    return state ? all.filter((task) => task.state === state) : all;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): TaskStats {
    const byState: Record<TaskState, number> = {
      created: 0,
      submitted: 0,
      working: 0,
      streaming: 0,
      completed: 0,
      failed: 0,
      canceled: 0
    };
    for (const task of this.tasks.values()) {
      byState[task.state]++;
    }
    return { total: this.tasks.size, byState };
  }

  private require(taskId: string): TaskRecord {
    const record = this.tasks.get(taskId);
    if (!record) {
      throw new RelayError("NOT_FOUND", `Task ${taskId} not found`, { taskId });
    }
    return record;
  }

  private evictOldestTerminal(): void {
    // Map iteration order is creation order
    for (const record of this.tasks.values()) {
      if (isTerminal(record.state)) {
        this.tasks.delete(record.taskId);
        return;
      }
    }
  }

  /**
   * Listeners run in a microtask so they can neither throw into nor re-enter a transition.
   */
  private notify(event: TransitionEvent): void {
    for (const listener of this.listeners) {
      queueMicrotask(() => {
        try {
          const result = listener(event);
          if (result instanceof Promise) {
            result.catch((err: unknown) => this.reportListenerError(event, err));
          }
        } catch (err) {
          this.reportListenerError(event, err);
        }
      });
    }
  }

  private reportListenerError(event: TransitionEvent, err: unknown): void {
    this.logger.error("Task transition listener failed", {
      taskId: event.taskId,
      to: event.to,
      reason: err instanceof Error ? err.message : String(err)
    });
  }
}
