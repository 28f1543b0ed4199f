import type { BackendDescriptor } from "../registry/types.js";

export type MatchResult =
  | { kind: "local" }
  | { kind: "delegate"; backendId: string };

/**
 * Routing decision procedure. Implementations must be a function of `(query, snapshot)`
 * only, and must not reject: a matcher that cannot decide returns `local`.
 */
export interface CapabilityMatcher {
  readonly name: string;
  match(query: string, snapshot: readonly BackendDescriptor[]): MatchResult | Promise<MatchResult>;
}

export const LOCAL: MatchResult = Object.freeze({ kind: "local" });

export function delegateTo(backendId: string): MatchResult {
  return { kind: "delegate", backendId };
}
