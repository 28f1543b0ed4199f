/**
 * Backend registry types.
 */

export type BackendSkill = {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly examples: readonly string[];
};

/**
 * Identity and declared capabilities of one delegatable backend.
 * Frozen once built; a re-discovery replaces it wholesale.
 */
export type BackendDescriptor = {
  readonly id: string;
  readonly baseAddress: string;
  /** JSON-RPC endpoint advertised by the backend's card */
  readonly invokeAddress: string;
  readonly displayName: string;
  readonly description: string;
  readonly version: string;
  readonly skills: readonly BackendSkill[];
  readonly supportsStreaming: boolean;
  readonly inputModes: readonly string[];
  readonly outputModes: readonly string[];
};

export type BackendHealth = "healthy" | "stale" | "unreachable" | "unknown";

/**
 * Read-only view of a registry entry.
 */
export type BackendEntry = {
  readonly id: string;
  readonly baseAddress: string;
  readonly descriptor: BackendDescriptor | null;
  readonly registeredAt: string;
  readonly lastDiscoveredAt: string | null;
  readonly lastDiscoveryError: string | null;
  readonly health: BackendHealth;
};

export type DiscoveryOutcome =
  | { id: string; ok: true; descriptor: BackendDescriptor }
  | { id: string; ok: false; error: string };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
