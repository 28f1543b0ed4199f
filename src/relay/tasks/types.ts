/**
 * Task lifecycle types.
 */

import type { FailureReason } from "../errors.js";

export type TaskState =
  | "created"
  | "submitted"
  | "working"
  | "streaming"
  | "completed"
  | "failed"
  | "canceled";

export type TerminalTaskState = Extract<TaskState, "completed" | "failed" | "canceled">;

/** Position of each state along created → submitted → working → streaming → terminal. */
export const STATE_RANK: Readonly<Record<TaskState, number>> = {
  created: 0,
  submitted: 1,
  working: 2,
  streaming: 3,
  completed: 4,
  failed: 4,
  canceled: 4
};

export function isTerminal(state: TaskState): state is TerminalTaskState {
  return state === "completed" || state === "failed" || state === "canceled";
}

/**
 * Read-only copy of a task. The tracker never hands out its own record.
 */
export type TaskSnapshot = Readonly<{
  taskId: string;
  contextId: string;
  state: TaskState;
  /** null for locally handled tasks */
  backendId: string | null;
  query: string;
  createdAt: string;
  updatedAt: string;
  terminalAt: string | null;
  lastError: Readonly<FailureReason> | null;
  chunkCount: number;
}>;

export type TransitionEvent = {
  taskId: string;
  from: TaskState;
  to: TaskState;
  task: TaskSnapshot;
};

export type TransitionListener = (event: TransitionEvent) => void | Promise<void>;

export type TaskStats = {
  total: number;
  byState: Record<TaskState, number>;
};
