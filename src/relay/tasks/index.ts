export { TaskTracker } from "./taskTracker.js";
export type { TaskTrackerOptions } from "./taskTracker.js";
export { STATE_RANK, isTerminal } from "./types.js";
export type {
  TaskState,
  TerminalTaskState,
  TaskSnapshot,
  TransitionEvent,
  TransitionListener,
  TaskStats
} from "./types.js";
