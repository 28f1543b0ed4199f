/**
 * Backend Session - one delegated query, spoken as A2A JSON-RPC over HTTP.
 *
 * Streaming backends get `message/stream` and answer with an SSE body; the rest get
 * `message/send`. Either way the caller sees a lazy, finite, non-restartable sequence
 * of chunks ending in exactly one final chunk, or a RelayError.
 */

import crypto from "node:crypto";
import { ZodError } from "zod";
import { RelayError, isRelayError } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import {
  A2A_METHODS,
  JsonRpcResponseSchema,
  StreamResultSchema,
  TERMINAL_REMOTE_STATES,
  textMessage,
  textOfParts,
  type A2ATaskState,
  type RemoteTask,
  type StreamResult
} from "../protocol/a2a.js";
import { SseDecoder } from "../protocol/sse.js";
import type { BackendDescriptor, FetchLike } from "../registry/types.js";
import { chunk, type Chunk } from "../types.js";

export type BackendSessionOptions = {
  /** Longest silence tolerated from a backend before the session fails with TIMEOUT */
  inactivityTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
};

export type SessionContext = {
  contextId: string;
  /** Relay task id; sent as message metadata */
  taskId: string;
  signal?: AbortSignal;
  /** Called once with the backend's own task id, the first time an event carries it */
  onRemoteTask?: (remoteTaskId: string) => void;
};

/** What one decoded backend result means for the chunk sequence. */
type Step = { chunks: Chunk[]; finished: boolean };

const CONTINUE: Step = { chunks: [], finished: false };

type IdleTimer = { arm: () => void; pause: () => void };

type AttemptState = {
  timedOut: boolean;
  responded: boolean;
  finalYielded: boolean;
  remoteTaskId: string | null;
};

export class BackendSession {
  private readonly inactivityTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: BackendSessionOptions = {}) {
    this.inactivityTimeoutMs = options.inactivityTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Prepare a delegated invocation. No request is made until the first pull.
   * Iterating the result a second time throws PROTOCOL_ERROR.
   */
  open(descriptor: BackendDescriptor, query: string, ctx: SessionContext): AsyncIterable<Chunk> {
    let started = false;
    return {
      [Symbol.asyncIterator]: () => {
        if (started) {
          throw new RelayError("PROTOCOL_ERROR", `Session for backend ${descriptor.id} was already consumed`, {
            backendId: descriptor.id
          });
        }
        started = true;
        return this.run(descriptor, query, ctx);
      }
    };
  }

  /**
   * Ask a backend to cancel its task. Best effort: resolves false on any failure.
   */
  async cancelRemote(descriptor: BackendDescriptor, remoteTaskId: string): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.inactivityTimeoutMs);
    try {
      const response = await this.fetchImpl(descriptor.invokeAddress, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({
          jsonrpc: "2.0",
          id: crypto.randomUUID(),
          method: A2A_METHODS.cancel,
          params: { id: remoteTaskId }
        }),
        signal: controller.signal
      });
      if (!response.ok) {
        this.logger.warn("Remote cancel rejected", { backendId: descriptor.id, status: response.status });
        return false;
      }
      const envelope = JsonRpcResponseSchema.parse(await response.json());
      if (envelope.error) {
        this.logger.warn("Remote cancel refused", { backendId: descriptor.id, reason: envelope.error.message });
        return false;
      }
      return true;
    } catch (err) {
      this.logger.warn("Remote cancel failed", {
        backendId: descriptor.id,
        reason: err instanceof Error ? err.message : String(err)
      });
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async *run(descriptor: BackendDescriptor, query: string, ctx: SessionContext): AsyncGenerator<Chunk> {
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort();
    if (ctx.signal?.aborted) {
      throw callerCanceled(descriptor);
    }
    ctx.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const state: AttemptState = { timedOut: false, responded: false, finalYielded: false, remoteTaskId: null };
    let timer: ReturnType<typeof setTimeout> | undefined;
    const idle: IdleTimer = {
      arm: () => {
        clearTimeout(timer);
        timer = setTimeout(() => {
          state.timedOut = true;
          controller.abort();
        }, this.inactivityTimeoutMs);
      },
      pause: () => clearTimeout(timer)
    };

    const method = descriptor.supportsStreaming ? A2A_METHODS.stream : A2A_METHODS.send;
    this.logger.debug("Opening backend session", { backendId: descriptor.id, taskId: ctx.taskId, method });

    try {
      idle.arm();
      const response = await raceAbort(
        this.fetchImpl(descriptor.invokeAddress, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: descriptor.supportsStreaming ? "text/event-stream" : "application/json"
          },
          body: JSON.stringify({
            jsonrpc: "2.0",
            id: crypto.randomUUID(),
            method,
            params: {
              message: {
                ...textMessage("user", query, { messageId: crypto.randomUUID(), contextId: ctx.contextId }),
                metadata: { relayTaskId: ctx.taskId }
              }
            }
          }),
          signal: controller.signal
        }),
        controller.signal
      );
      state.responded = true;
      idle.arm();

      if (!response.ok) {
        throw new RelayError("PROTOCOL_ERROR", `HTTP ${response.status} from ${descriptor.invokeAddress}`, {
          backendId: descriptor.id,
          status: response.status
        });
      }

      const contentType = response.headers.get("content-type") ?? "";
      if (contentType.includes("text/event-stream")) {
        yield* this.readEventStream(descriptor, response, controller, idle, state, ctx);
      } else if (contentType.includes("application/json")) {
        const payload = await raceAbort(response.text(), controller.signal);
        idle.pause();
        for (const item of this.interpretPayload(descriptor, payload, state, ctx).chunks) {
          yield item;
        }
      } else {
        throw new RelayError("PROTOCOL_ERROR", `Unexpected content type "${contentType}" from backend`, {
          backendId: descriptor.id
        });
      }

      if (!state.finalYielded) {
        throw new RelayError("PROTOCOL_ERROR", "Backend stream ended without a terminal status", {
          backendId: descriptor.id
        });
      }
    } catch (err) {
      throw this.classify(err, descriptor, state, ctx);
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener("abort", onCallerAbort);
      // Releases the HTTP body when the consumer stopped early
      controller.abort();
    }
  }

  private async *readEventStream(
    descriptor: BackendDescriptor,
    response: Response,
    controller: AbortController,
    idle: IdleTimer,
    state: AttemptState,
    ctx: SessionContext
  ): AsyncGenerator<Chunk> {
    if (!response.body) {
      throw new RelayError("PROTOCOL_ERROR", "Backend returned an empty event stream", { backendId: descriptor.id });
    }

    const reader = response.body.getReader();
    const cancelReader = (): void => {
      reader.cancel().catch((err: unknown) => {
        this.logger.debug("Event stream cancel failed", {
          backendId: descriptor.id,
          reason: err instanceof Error ? err.message : String(err)
        });
      });
    };
    controller.signal.addEventListener("abort", cancelReader, { once: true });

    const textDecoder = new TextDecoder();
    const sse = new SseDecoder();

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (controller.signal.aborted) {
          throw new RelayError("CONNECT_FAILED", "Event stream aborted", { backendId: descriptor.id });
        }
        let payloads: string[];
        if (done) {
          payloads = [...sse.push(textDecoder.decode()), ...sse.flush()];
        } else {
          payloads = sse.push(textDecoder.decode(value, { stream: true }));
        }

        // The caller's pace is not backend silence
        idle.pause();
        for (const payload of payloads) {
          const step = this.interpretPayload(descriptor, payload, state, ctx);
          for (const item of step.chunks) {
            yield item;
          }
          if (step.finished) return;
        }
        if (done) return;
        idle.arm();
      }
    } finally {
      controller.signal.removeEventListener("abort", cancelReader);
      // Release the body so the backend stops writing
      cancelReader();
    }
  }

  /**
   * Decode one JSON-RPC response and map its result to chunks.
   */
  private interpretPayload(descriptor: BackendDescriptor, payload: string, state: AttemptState, ctx: SessionContext): Step {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch {
      throw new RelayError("PROTOCOL_ERROR", "Malformed JSON from backend", { backendId: descriptor.id });
    }

    const envelope = JsonRpcResponseSchema.parse(raw);
    if (envelope.error) {
      throw new RelayError("BACKEND_ABORT", envelope.error.message, {
        backendId: descriptor.id,
        code: envelope.error.code
      });
    }

    const result = StreamResultSchema.parse(envelope.result);
    this.noteRemoteTask(result, state, ctx);
    const step = interpretResult(descriptor, result);
    if (step.finished) {
      state.finalYielded = true;
    }
    return step;
  }

  private noteRemoteTask(result: StreamResult, state: AttemptState, ctx: SessionContext): void {
    if (state.remoteTaskId !== null) return;
    const remoteTaskId = result.kind === "task" ? result.id : result.taskId;
    if (remoteTaskId === undefined) return;
    state.remoteTaskId = remoteTaskId;
    ctx.onRemoteTask?.(remoteTaskId);
  }

  private classify(err: unknown, descriptor: BackendDescriptor, state: AttemptState, ctx: SessionContext): RelayError {
    const details = { backendId: descriptor.id };
    if (ctx.signal?.aborted) {
      return callerCanceled(descriptor);
    }
    if (state.timedOut) {
      return new RelayError("TIMEOUT", `Backend ${descriptor.id} was silent for ${this.inactivityTimeoutMs}ms`, details);
    }
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue?.path.join(".") || "(root)";
      return new RelayError("PROTOCOL_ERROR", `Unrecognized backend event (${where}: ${issue?.message ?? "invalid"})`, details);
    }
    if (isRelayError(err)) {
      return err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    if (!state.responded) {
      return new RelayError("CONNECT_FAILED", `Could not reach ${descriptor.invokeAddress}: ${reason}`, details);
    }
    return new RelayError("CONNECT_FAILED", `Connection to backend ${descriptor.id} lost: ${reason}`, details);
  }
}

function callerCanceled(descriptor: BackendDescriptor): RelayError {
  return new RelayError("CALLER_CANCELED", "Canceled by caller", { backendId: descriptor.id });
}

/**
 * Reject as soon as `signal` aborts, even if `promise` never settles.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new RelayError("CONNECT_FAILED", "Request aborted"));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RelayError("CONNECT_FAILED", "Request aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function abortFromStatus(descriptor: BackendDescriptor, state: A2ATaskState, text: string): RelayError {
  return new RelayError("BACKEND_ABORT", text || `Backend reported task ${state}`, {
    backendId: descriptor.id,
    state
  });
}

function interpretTask(descriptor: BackendDescriptor, task: RemoteTask): Step {
  const { state } = task.status;
  const statusText = task.status.message ? textOfParts(task.status.message.parts) : "";

  if (state === "completed") {
    const texts = (task.artifacts ?? []).map((artifact) => textOfParts(artifact.parts));
    if (texts.length === 0 && statusText) texts.push(statusText);
    const last = texts.pop() ?? "";
    return {
      chunks: [...texts.filter((text) => text !== "").map((text) => chunk(text)), chunk(last, true)],
      finished: true
    };
  }
  if (TERMINAL_REMOTE_STATES.has(state) || state === "input-required" || state === "auth-required") {
    throw abortFromStatus(descriptor, state, statusText);
  }
  return CONTINUE;
}

function interpretResult(descriptor: BackendDescriptor, result: StreamResult): Step {
  switch (result.kind) {
    case "message":
      return { chunks: [chunk(textOfParts(result.parts), true)], finished: true };

    case "task":
      return interpretTask(descriptor, result);

    // `lastChunk` closes one artifact, not the task; only a status ends the sequence
    case "artifact-update": {
      const text = textOfParts(result.artifact.parts);
      return text === "" ? CONTINUE : { chunks: [chunk(text)], finished: false };
    }

    case "status-update": {
      const { state } = result.status;
      const isTerminalState = TERMINAL_REMOTE_STATES.has(state);
      if (!result.final && !isTerminalState) {
        return CONTINUE;
      }
      if (state === "completed") {
        return { chunks: [chunk("", true)], finished: true };
      }
      const text = result.status.message ? textOfParts(result.status.message.parts) : "";
      throw abortFromStatus(descriptor, state, text);
    }
  }
}
