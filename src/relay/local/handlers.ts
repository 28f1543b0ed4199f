/**
 * Local handlers answer queries the matcher keeps in-process.
 */

import type { BackendDescriptor } from "../registry/types.js";
import { chunk, type Chunk, type SourceContext } from "../types.js";

export interface LocalHandler {
  readonly name: string;
  /** Lazy chunk sequence; the last chunk has `isFinal: true` */
  produce(query: string, ctx: SourceContext): AsyncIterable<Chunk>;
}

/**
 * Replies with one fixed final chunk.
 */
export class StaticReplyHandler implements LocalHandler {
  readonly name = "static";

  constructor(private readonly text: string) {}

  async *produce(_query: string, _ctx: SourceContext): AsyncGenerator<Chunk> {
    yield chunk(this.text, true);
  }
}

export type SnapshotSource = {
  snapshot(): readonly BackendDescriptor[];
};

export const NO_BACKENDS_REPLY = "No backends are available right now. Please make sure they are running.";

/**
 * Lists what the discovered backends can do, one chunk per backend.
 */
export class CapabilityListingHandler implements LocalHandler {
  readonly name = "capability-listing";

  constructor(private readonly registry: SnapshotSource) {}

  async *produce(_query: string, _ctx: SourceContext): AsyncGenerator<Chunk> {
    const backends = this.registry.snapshot();
    if (backends.length === 0) {
      yield chunk(NO_BACKENDS_REPLY, true);
      return;
    }

    yield chunk("I couldn't match your request to a specialized backend.\n\nAvailable backends:\n");
    for (const backend of backends) {
      yield chunk(`- ${describeBackend(backend)}\n`);
    }
    yield chunk("\nPlease rephrase your request or say which of these you need.", true);
  }
}

export function describeBackend(backend: BackendDescriptor): string {
  const summary = backend.description || backend.skills.map((skill) => skill.name).join(", ");
  return summary ? `${backend.displayName}: ${summary}` : backend.displayName;
}
