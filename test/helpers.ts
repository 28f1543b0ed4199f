import { Hono } from "hono";
import { createAgentHost, type AgentProducer } from "../src/server/agentHost.js";
import { AgentCardSchema, type AgentCardInput } from "../src/relay/protocol/a2a.js";
import { descriptorFromCard } from "../src/relay/registry/backendRegistry.js";
import type { BackendDescriptor, FetchLike } from "../src/relay/registry/types.js";
import { chunk, type Chunk, type SourceContext } from "../src/relay/types.js";

/**
 * Route fetch calls to in-process Hono apps by origin. Unknown origins reject the way
 * a refused connection does.
 */
export function inProcessFetch(apps: Record<string, Hono>): FetchLike & { calls: string[] } {
  const calls: string[] = [];
  const fetchImpl = async (input: string, init?: RequestInit): Promise<Response> => {
    calls.push(input);
    const app = apps[new URL(input).origin];
    if (!app) {
      throw new TypeError("fetch failed");
    }
    return app.fetch(new Request(input, init));
  };
  return Object.assign(fetchImpl, { calls });
}

export function cardFor(
  origin: string,
  name: string,
  skills: Array<{ id: string; tags?: string[]; examples?: string[] }>,
  streaming = true
): AgentCardInput {
  return {
    name,
    description: `${name} backend`,
    url: `${origin}/`,
    version: "1.0.0",
    capabilities: { streaming },
    skills: skills.map((skill) => ({ id: skill.id, name: skill.id, tags: skill.tags ?? [], examples: skill.examples ?? [] }))
  };
}

/**
 * Descriptor for matcher tests; the address is never contacted.
 */
export function backendDescriptor(
  id: string,
  skills: Array<{ id: string; tags?: string[]; examples?: string[] }>,
  description?: string
): BackendDescriptor {
  const origin = `http://${id}.test`;
  const card = AgentCardSchema.parse({ ...cardFor(origin, id, skills), description: description ?? `${id} backend` });
  return descriptorFromCard(id, origin, card);
}

/**
 * Producer that yields the given chunks, optionally pausing between them.
 */
export function scriptedProducer(chunks: Chunk[], delayMs = 0): AgentProducer & { queries: string[] } {
  const queries: string[] = [];
  return {
    queries,
    async *produce(query: string, ctx: SourceContext): AsyncGenerator<Chunk> {
      queries.push(query);
      for (const item of chunks) {
        if (delayMs > 0) await sleep(delayMs);
        if (ctx.signal.aborted) return;
        yield item;
      }
    }
  };
}

export function agentBackend(
  origin: string,
  name: string,
  skills: Array<{ id: string; tags?: string[]; examples?: string[] }>,
  chunks: Chunk[] = [chunk("ok", true)],
  options: { streaming?: boolean; delayMs?: number } = {}
) {
  const producer = scriptedProducer(chunks, options.delayMs ?? 0);
  const host = createAgentHost({ card: cardFor(origin, name, skills, options.streaming ?? true), producer });
  return Object.assign(host, { producer });
}

/**
 * A backend that serves a card and answers every JSON-RPC post with a raw SSE body.
 */
export function rawSseBackend(origin: string, name: string, tags: string[], body: string | (() => Response)) {
  const app = new Hono();
  let posts = 0;
  app.get("/.well-known/agent-card.json", (c) => c.json(cardFor(origin, name, [{ id: name, tags }])));
  app.post("/", () => {
    posts++;
    if (typeof body === "function") return body();
    return new Response(body, { headers: { "Content-Type": "text/event-stream" } });
  });
  return {
    app,
    get posts() {
      return posts;
    }
  };
}

export function sseFrame(result: unknown): string {
  return `data: ${JSON.stringify({ jsonrpc: "2.0", id: "1", result })}\n\n`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
