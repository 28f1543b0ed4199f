import type { FailureReason } from "./errors.js";

/**
 * One increment of output. After a final chunk nothing more is produced for the task.
 */
export type Chunk = {
  readonly content: string;
  readonly isFinal: boolean;
};

export function chunk(content: string, isFinal = false): Chunk {
  return { content, isFinal };
}

export type CloseEvent =
  | { type: "close"; state: "completed" }
  | { type: "close"; state: "canceled" }
  | { type: "close"; state: "failed"; error: FailureReason };

/**
 * Element of a caller's output channel: chunks in source order, then exactly one close.
 */
export type ChannelEvent = { type: "chunk"; chunk: Chunk } | CloseEvent;

/**
 * Context handed to every chunk source for one task.
 */
export type SourceContext = {
  contextId: string;
  taskId: string;
  signal: AbortSignal;
};
