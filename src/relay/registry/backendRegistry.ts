/**
 * Backend Registry - owns the address and discovered capability description of every
 * configured backend.
 *
 * Entries are created by `register`, refreshed by `discover` (explicitly or on first use
 * via `ensureDiscovered`) and never dropped because a backend is unreachable: a failed
 * discovery keeps the last good descriptor and records the error.
 */

import { ZodError } from "zod";
import { RelayError } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { AGENT_CARD_PATH, AgentCardSchema, type AgentCard } from "../protocol/a2a.js";
import type {
  BackendDescriptor,
  BackendEntry,
  BackendHealth,
  DiscoveryOutcome,
  FetchLike
} from "./types.js";

export type BackendRegistryOptions = {
  /** Well-known path of the agent card, relative to the base address */
  cardPath?: string;
  /** Timeout for a single discovery request (ms) */
  discoveryTimeoutMs?: number;
  /**
   * How long `ensureDiscovered` waits before retrying a backend that has never been
   * discovered successfully (ms). 0 retries on every use.
   */
  retryUndiscoveredAfterMs?: number;
  /** Invoke the endpoint advertised in the card (`url`) rather than the base address */
  useCardUrl?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
};

type MutableEntry = {
  id: string;
  baseAddress: string;
  registeredAt: string;
  descriptor: BackendDescriptor | null;
  lastDiscoveredAt: string | null;
  lastDiscoveryError: string | null;
  lastAttemptAt: number | null;
};

function isoNow(): string {
  return new Date().toISOString();
}

function trimTrailingSlash(address: string): string {
  return address.endsWith("/") ? address.slice(0, -1) : address;
}

function healthOf(entry: MutableEntry): BackendHealth {
  if (entry.descriptor && entry.lastDiscoveryError === null) return "healthy";
  if (entry.descriptor) return "stale";
  if (entry.lastDiscoveryError !== null) return "unreachable";
  return "unknown";
}

/**
 * Build an immutable descriptor from a validated agent card.
 */
export function descriptorFromCard(
  id: string,
  baseAddress: string,
  card: AgentCard,
  useCardUrl = true
): BackendDescriptor {
  const skills = card.skills.map((skill) =>
    Object.freeze({
      id: skill.id,
      name: skill.name,
      ...(skill.description !== undefined && { description: skill.description }),
      tags: Object.freeze([...skill.tags]),
      examples: Object.freeze([...skill.examples])
    })
  );
  return Object.freeze({
    id,
    baseAddress,
    invokeAddress: useCardUrl ? card.url : baseAddress,
    displayName: card.name,
    description: card.description,
    version: card.version,
    skills: Object.freeze(skills),
    supportsStreaming: card.capabilities.streaming ?? false,
    inputModes: Object.freeze([...card.defaultInputModes]),
    outputModes: Object.freeze([...card.defaultOutputModes])
  });
}

export class BackendRegistry {
  private readonly entriesById = new Map<string, MutableEntry>();
  private readonly inFlight = new Map<string, Promise<BackendDescriptor>>();
  private readonly cardPath: string;
  private readonly discoveryTimeoutMs: number;
  private readonly retryUndiscoveredAfterMs: number;
  private readonly useCardUrl: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: BackendRegistryOptions = {}) {
    this.cardPath = options.cardPath ?? AGENT_CARD_PATH;
    this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? 10_000;
    this.retryUndiscoveredAfterMs = options.retryUndiscoveredAfterMs ?? 30_000;
    this.useCardUrl = options.useCardUrl ?? true;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Add or replace the address of a backend. No network I/O.
   * Re-registering the same address keeps the cached descriptor.
   */
  register(id: string, baseAddress: string): void {
    if (!id.trim()) {
      throw new RelayError("BAD_REQUEST", "Backend id must not be empty");
    }
    const address = trimTrailingSlash(baseAddress.trim());
    try {
      new URL(address);
    } catch {
      throw new RelayError("BAD_REQUEST", `Invalid backend address for '${id}': ${baseAddress}`);
    }

    const existing = this.entriesById.get(id);
    if (existing && existing.baseAddress === address) return;

    // A moved backend keeps its slot in registration order but loses its descriptor
    this.inFlight.delete(id);
    this.entriesById.set(id, {
      id,
      baseAddress: address,
      registeredAt: existing?.registeredAt ?? isoNow(),
      descriptor: null,
      lastDiscoveredAt: null,
      lastDiscoveryError: null,
      lastAttemptAt: null
    });
  }

  /**
   * Explicitly remove a backend. Unreachable backends are never removed implicitly.
   */
  unregister(id: string): boolean {
    this.inFlight.delete(id);
    return this.entriesById.delete(id);
  }

  has(id: string): boolean {
    return this.entriesById.has(id);
  }

  /**
   * Fetch the backend's agent card and store it.
   * Concurrent calls for the same backend share one request.
   *
   * @throws RelayError DISCOVERY_FAILED (cached descriptor kept) or NOT_FOUND
   */
  discover(id: string): Promise<BackendDescriptor> {
    const entry = this.entriesById.get(id);
    if (!entry) {
      return Promise.reject(new RelayError("NOT_FOUND", `Backend '${id}' is not registered`));
    }
    const pending = this.inFlight.get(id);
    if (pending) return pending;

    const request = this.fetchDescriptor(entry).finally(() => {
      if (this.inFlight.get(id) === request) {
        this.inFlight.delete(id);
      }
    });
    this.inFlight.set(id, request);
    return request;
  }

  /**
   * Discover every registered backend concurrently. Never rejects.
   */
  async discoverAll(): Promise<DiscoveryOutcome[]> {
    return this.discoverMany(Array.from(this.entriesById.keys()));
  }

  /**
   * Discover backends that have no descriptor yet, at most once per retry window.
   * Failures are logged and leave the backend out of `snapshot()`.
   */
  async ensureDiscovered(): Promise<DiscoveryOutcome[]> {
    const now = Date.now();
    const ids: string[] = [];
    for (const entry of this.entriesById.values()) {
      if (entry.descriptor) continue;
      const due =
        entry.lastAttemptAt === null || now - entry.lastAttemptAt >= this.retryUndiscoveredAfterMs;
      if (due || this.inFlight.has(entry.id)) ids.push(entry.id);
    }
    if (ids.length === 0) return [];
    return this.discoverMany(ids);
  }

  /**
   * Point-in-time copy of every backend with a descriptor, in registration order.
   */
  snapshot(): readonly BackendDescriptor[] {
    const descriptors: BackendDescriptor[] = [];
    for (const entry of this.entriesById.values()) {
      if (entry.descriptor) descriptors.push(entry.descriptor);
    }
    return Object.freeze(descriptors);
  }

  get(id: string): BackendEntry | undefined {
    const entry = this.entriesById.get(id);
    return entry ? this.toView(entry) : undefined;
  }

  entries(): BackendEntry[] {
    return Array.from(this.entriesById.values(), (entry) => this.toView(entry));
  }

  health(): Array<{ id: string; health: BackendHealth; error: string | null }> {
    return this.entries().map((entry) => ({
      id: entry.id,
      health: entry.health,
      error: entry.lastDiscoveryError
    }));
  }

  private async discoverMany(ids: string[]): Promise<DiscoveryOutcome[]> {
    const settled = await Promise.allSettled(ids.map((id) => this.discover(id)));
    return settled.map((result, index): DiscoveryOutcome => {
      const id = ids[index] ?? "";
      if (result.status === "fulfilled") {
        return { id, ok: true, descriptor: result.value };
      }
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      return { id, ok: false, error: message };
    });
  }

  private async fetchDescriptor(entry: MutableEntry): Promise<BackendDescriptor> {
    const url = entry.baseAddress + this.cardPath;
    entry.lastAttemptAt = Date.now();
    this.logger.debug("Discovering backend", { id: entry.id, url });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.discoveryTimeoutMs);

    let card: AgentCard;
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} from ${url}`);
      }
      card = AgentCardSchema.parse(await response.json());
    } catch (err) {
      const reason = this.describeFailure(err, controller.signal.aborted);
      if (this.isCurrent(entry)) {
        entry.lastDiscoveryError = reason;
      }
      this.logger.warn("Backend discovery failed", { id: entry.id, reason });
      throw new RelayError("DISCOVERY_FAILED", `Discovery of '${entry.id}' failed: ${reason}`, {
        backendId: entry.id,
        url
      });
    } finally {
      clearTimeout(timeoutId);
    }

    const descriptor = descriptorFromCard(entry.id, entry.baseAddress, card, this.useCardUrl);
    if (this.isCurrent(entry)) {
      entry.descriptor = descriptor;
      entry.lastDiscoveredAt = isoNow();
      entry.lastDiscoveryError = null;
      this.logger.info("Backend discovered", {
        id: entry.id,
        name: descriptor.displayName,
        skills: descriptor.skills.length,
        streaming: descriptor.supportsStreaming
      });
    }
    return descriptor;
  }

  /**
   * A discovery that finishes after its entry was replaced must not write into the new one.
   */
  private isCurrent(entry: MutableEntry): boolean {
    return this.entriesById.get(entry.id) === entry;
  }

  private describeFailure(err: unknown, timedOut: boolean): string {
    if (timedOut) return `timed out after ${this.discoveryTimeoutMs}ms`;
    if (err instanceof ZodError) {
      const first = err.issues[0];
      return `malformed agent card${first ? ` (${first.path.join(".") || "root"}: ${first.message})` : ""}`;
    }
    if (err instanceof SyntaxError) return "malformed agent card (invalid JSON)";
    if (err instanceof Error) return err.message;
    return String(err);
  }

  private toView(entry: MutableEntry): BackendEntry {
    return {
      id: entry.id,
      baseAddress: entry.baseAddress,
      descriptor: entry.descriptor,
      registeredAt: entry.registeredAt,
      lastDiscoveredAt: entry.lastDiscoveredAt,
      lastDiscoveryError: entry.lastDiscoveryError,
      health: healthOf(entry)
    };
  }
}
