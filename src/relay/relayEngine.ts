/**
 * Relay Engine - the orchestration loop.
 *
 * One pump per submitted query: match it against the registry snapshot, open a backend
 * session or run the local handler, and move chunks to the caller's channel in source
 * order while the Task Tracker follows along. Every task ends in exactly one terminal
 * state and its channel in exactly one close event.
 */

import crypto from "node:crypto";
import { DELEGATION_FAILURES, RelayError, isRelayError, toFailureReason, type FailureReason } from "./errors.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import { TaskChannel } from "./channel.js";
import type { LocalHandler } from "./local/handlers.js";
import type { CapabilityMatcher, MatchResult } from "./matcher/types.js";
import type { BackendRegistry } from "./registry/backendRegistry.js";
import type { BackendDescriptor } from "./registry/types.js";
import { BackendSession } from "./session/backendSession.js";
import { TaskTracker } from "./tasks/taskTracker.js";
import { isTerminal, type TaskSnapshot, type TaskState, type TaskStats } from "./tasks/types.js";
import type { ChannelEvent, Chunk, SourceContext } from "./types.js";
import { ConcurrencyLimiter, type ConcurrencyLimiterOptions } from "./utils/concurrencyLimiter.js";

export type RelayEngineOptions = {
  registry: BackendRegistry;
  matcher: CapabilityMatcher;
  localHandler: LocalHandler;
  session?: BackendSession;
  tracker?: TaskTracker;
  limiter?: ConcurrencyLimiterOptions;
  /** Chunks buffered per caller channel before the pump waits */
  channelCapacity?: number;
  logger?: Logger;
};

export type Submission = {
  taskId: string;
  contextId: string;
  channel: AsyncIterable<ChannelEvent>;
};

type ActiveTask = {
  channel: TaskChannel;
  pump: Promise<void>;
  descriptor: BackendDescriptor | null;
  remoteTaskId: string | null;
};

export class RelayEngine {
  readonly registry: BackendRegistry;
  readonly tracker: TaskTracker;
  readonly limiter: ConcurrencyLimiter;

  private readonly matcher: CapabilityMatcher;
  private readonly localHandler: LocalHandler;
  private readonly session: BackendSession;
  private readonly channelCapacity: number;
  private readonly logger: Logger;
  private readonly active = new Map<string, ActiveTask>();

  constructor(options: RelayEngineOptions) {
    this.registry = options.registry;
    this.matcher = options.matcher;
    this.localHandler = options.localHandler;
    this.logger = options.logger ?? silentLogger;
    this.session = options.session ?? new BackendSession({ logger: this.logger });
    this.tracker = options.tracker ?? new TaskTracker({ logger: this.logger });
    this.limiter = new ConcurrencyLimiter(options.limiter ?? { maxConcurrent: 64 });
    this.channelCapacity = options.channelCapacity ?? 1;

    this.tracker.onTransition((event) => {
      this.logger.debug("Task transition", { taskId: event.taskId, from: event.from, to: event.to });
    });
  }

  /**
   * Accept a query and start relaying it. Returns immediately; output arrives on `channel`.
   * Abandoning the channel (breaking out of iteration) cancels the task.
   */
  submit(contextId: string, query: string): Submission {
    const taskId = this.tracker.create(contextId, query);
    const signal = this.tracker.getAbortSignal(taskId);
    if (!signal) {
      throw new RelayError("INTERNAL", `Task ${taskId} has no abort signal`);
    }

    const channel = new TaskChannel({
      capacity: this.channelCapacity,
      onAbandon: () => {
        if (this.cancel(taskId)) {
          this.logger.info("Caller abandoned task", { taskId });
        }
      }
    });
    this.tracker.transition(taskId, "submitted");
    this.logger.info("Task submitted", { taskId, contextId });

    const record: ActiveTask = { channel, pump: Promise.resolve(), descriptor: null, remoteTaskId: null };
    this.active.set(taskId, record);
    record.pump = this.pump(taskId, contextId, query, record, signal);

    return { taskId, contextId, channel };
  }

  /**
   * Cancel a non-terminal task: stop pulling from its source, mark it canceled and close
   * its channel without delivering anything further. Returns false if it already ended.
   */
  cancel(taskId: string): boolean {
    if (!this.tracker.cancel(taskId)) {
      return false;
    }

    const record = this.active.get(taskId);
    record?.channel.close({ type: "close", state: "canceled" }, { discard: true });
    this.logger.info("Task canceled", { taskId });

    if (record?.descriptor && record.remoteTaskId) {
      const { descriptor, remoteTaskId } = record;
      void this.session.cancelRemote(descriptor, remoteTaskId).then(
        (accepted) => this.logger.debug("Remote cancel sent", { taskId, backendId: descriptor.id, accepted }),
        (err: unknown) => this.logger.warn("Remote cancel failed", { taskId, reason: String(err) })
      );
    }
    return true;
  }

  /**
   * Submit a query and yield its chunks. A failed task rethrows its failure; a canceled
   * one throws CALLER_CANCELED. Aborting `ctx.signal` cancels the task.
   */
  async *produce(query: string, ctx: SourceContext): AsyncGenerator<Chunk> {
    const { taskId, channel } = this.submit(ctx.contextId, query);
    const onAbort = (): void => {
      this.cancel(taskId);
    };
    if (ctx.signal.aborted) onAbort();
    ctx.signal.addEventListener("abort", onAbort, { once: true });

    try {
      for await (const event of channel) {
        if (event.type === "chunk") {
          yield event.chunk;
        } else if (event.state === "failed") {
          throw new RelayError(event.error.kind, event.error.message, { taskId });
        } else if (event.state === "canceled") {
          throw new RelayError("CALLER_CANCELED", `Task ${taskId} was canceled`, { taskId });
        }
      }
    } finally {
      ctx.signal.removeEventListener("abort", onAbort);
    }
  }

  get(taskId: string): TaskSnapshot | undefined {
    return this.tracker.get(taskId);
  }

  list(state?: TaskState): TaskSnapshot[] {
    return this.tracker.list(state);
  }

  stats(): TaskStats {
    return this.tracker.stats();
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Resolves once every pump started so far has finished.
   */
  async waitForIdle(): Promise<void> {
    await Promise.allSettled(Array.from(this.active.values(), (record) => record.pump));
  }

  private async pump(
    taskId: string,
    contextId: string,
    query: string,
    record: ActiveTask,
    signal: AbortSignal
  ): Promise<void> {
    try {
      await this.limiter.run(() => this.relay(taskId, contextId, query, record, signal), signal);
    } catch (err) {
      this.fail(taskId, record.channel, err);
    } finally {
      this.active.delete(taskId);
    }
  }

  private async relay(
    taskId: string,
    contextId: string,
    query: string,
    record: ActiveTask,
    signal: AbortSignal
  ): Promise<void> {
    await this.registry.ensureDiscovered();
    if (signal.aborted) return;

    const snapshot = this.registry.snapshot();
    const decision = await this.decide(query, snapshot);
    if (signal.aborted) return;

    let source: AsyncIterable<Chunk>;
    if (decision.kind === "delegate") {
      const descriptor = snapshot.find((backend) => backend.id === decision.backendId);
      if (!descriptor) {
        throw new RelayError("INTERNAL", `Matcher ${this.matcher.name} chose unknown backend ${decision.backendId}`, {
          backendId: decision.backendId
        });
      }
      this.tracker.assignBackend(taskId, descriptor.id);
      record.descriptor = descriptor;
      source = this.session.open(descriptor, query, {
        contextId,
        taskId,
        signal,
        onRemoteTask: (remoteTaskId) => {
          record.remoteTaskId = remoteTaskId;
        }
      });
      this.logger.info("Delegating task", { taskId, backendId: descriptor.id });
    } else {
      source = this.localHandler.produce(query, { contextId, taskId, signal });
      this.logger.info("Handling task locally", { taskId, handler: this.localHandler.name });
    }

    this.tracker.transition(taskId, "working");

    let streaming = false;
    for await (const item of source) {
      if (signal.aborted) return;
      if (!streaming) {
        this.tracker.transition(taskId, "streaming");
        streaming = true;
      }
      this.tracker.recordChunk(taskId);

      if (item.isFinal) {
        // Terminal before delivery: a cancel during this push is a no-op
        this.tracker.transition(taskId, "completed");
        await record.channel.push(item);
        record.channel.close({ type: "close", state: "completed" });
        this.logger.info("Task completed", { taskId, chunks: this.tracker.get(taskId)?.chunkCount });
        return;
      }

      const delivered = await record.channel.push(item);
      if (!delivered) return;
    }

    if (signal.aborted) return;
    throw new RelayError("PROTOCOL_ERROR", "Source ended without a final chunk", {
      taskId,
      backendId: record.descriptor?.id ?? null
    });
  }

  private async decide(query: string, snapshot: readonly BackendDescriptor[]): Promise<MatchResult> {
    try {
      return await this.matcher.match(query, snapshot);
    } catch (err) {
      throw new RelayError(
        "INTERNAL",
        `Matcher ${this.matcher.name} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  /**
   * Convert an error into the task's terminal failure. A task that already reached a
   * terminal state (typically canceled) keeps it.
   */
  private fail(taskId: string, channel: TaskChannel, err: unknown): void {
    const current = this.tracker.get(taskId);
    if (current && isTerminal(current.state)) {
      this.logger.debug("Ignoring error on finished task", { taskId, reason: describe(err) });
      return;
    }

    let reason: FailureReason = toFailureReason(err);
    try {
      this.tracker.transition(taskId, "failed", reason);
    } catch (transitionErr) {
      this.logger.error("Task failure could not be recorded", { taskId, reason: describe(transitionErr) });
      if (isRelayError(transitionErr, "INVALID_TRANSITION")) {
        reason = toFailureReason(transitionErr);
      }
    }

    channel.close({ type: "close", state: "failed", error: reason });
    const fields = { taskId, kind: reason.kind, reason: reason.message };
    if (DELEGATION_FAILURES.has(reason.kind)) {
      this.logger.warn("Delegation failed", { ...fields, backendId: current?.backendId ?? null });
    } else if (reason.kind === "INTERNAL" || reason.kind === "INVALID_TRANSITION") {
      this.logger.error("Task failed", fields);
    } else {
      this.logger.warn("Task failed", fields);
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fresh context id for callers that do not group tasks.
 */
export function newContextId(): string {
  return crypto.randomUUID();
}
