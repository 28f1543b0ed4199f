/**
 * LLM-backed routing: the model reads the backends' cards and names one.
 *
 * The reply is expected as `{"backend": "<id>" | "none", "reasoning": "..."}`. A reply
 * that is not JSON is searched for a backend id or display name as a whole word. Any
 * LLM failure falls back to the wrapped matcher, so `match` never rejects.
 */

import { z } from "zod";
import type { LlmClient } from "../llm/types.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { BackendDescriptor } from "../registry/types.js";
import { KeywordMatcher, containsWord } from "./keywordMatcher.js";
import { LOCAL, delegateTo, type CapabilityMatcher, type MatchResult } from "./types.js";

const DecisionSchema = z.object({
  backend: z.string(),
  reasoning: z.string().optional()
});

export type LlmMatcherOptions = {
  client: LlmClient;
  /** Used when the client is unconfigured or the call fails. Defaults to keyword routing. */
  fallback?: CapabilityMatcher;
  timeoutMs?: number;
  logger?: Logger;
};

export function buildRoutingPrompt(snapshot: readonly BackendDescriptor[]): string {
  const backends = snapshot
    .map((backend) => {
      const skills = backend.skills
        .map((skill) => `    - ${skill.name}${skill.description ? `: ${skill.description}` : ""}`)
        .join("\n");
      return `- id: ${backend.id}\n  name: ${backend.displayName}\n  description: ${backend.description}\n  skills:\n${skills}`;
    })
    .join("\n");

  return [
    "You route user requests to specialized backends.",
    "",
    "Available backends:",
    backends,
    "",
    'Respond ONLY with a JSON object: {"backend": "<id>", "reasoning": "<one sentence>"}.',
    'Use "none" when no backend fits the request.'
  ].join("\n");
}

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text.trim());
  return fenced?.[1] ?? text.trim();
}

/**
 * Turn a model reply into a routing decision against the given snapshot.
 */
export function parseRoutingReply(reply: string, snapshot: readonly BackendDescriptor[]): MatchResult {
  const ids = new Set(snapshot.map((backend) => backend.id));

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(stripCodeFence(reply));
  } catch {
    parsedJson = undefined;
  }

  const decision = DecisionSchema.safeParse(parsedJson);
  if (decision.success) {
    const chosen = decision.data.backend.trim();
    if (ids.has(chosen)) return delegateTo(chosen);
    const byName = snapshot.find((backend) => backend.displayName.toLowerCase() === chosen.toLowerCase());
    return byName ? delegateTo(byName.id) : LOCAL;
  }

  const lower = reply.toLowerCase();
  const mentioned = snapshot.find(
    (backend) => containsWord(lower, backend.id.toLowerCase()) || containsWord(lower, backend.displayName.toLowerCase())
  );
  return mentioned ? delegateTo(mentioned.id) : LOCAL;
}

export class LlmMatcher implements CapabilityMatcher {
  readonly name = "llm";
  private readonly client: LlmClient;
  private readonly fallback: CapabilityMatcher;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: LlmMatcherOptions) {
    this.client = options.client;
    this.fallback = options.fallback ?? new KeywordMatcher();
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.logger = options.logger ?? silentLogger;
  }

  async match(query: string, snapshot: readonly BackendDescriptor[]): Promise<MatchResult> {
    if (!query.trim() || snapshot.length === 0) return LOCAL;
    if (!this.client.isConfigured()) {
      return this.fallback.match(query, snapshot);
    }

    try {
      const output = await this.client.generate({
        system: buildRoutingPrompt(snapshot),
        prompt: query,
        temperature: 0,
        jsonMode: true,
        timeoutMs: this.timeoutMs
      });
      const result = parseRoutingReply(output.text, snapshot);
      this.logger.debug("LLM routing decision", {
        result: result.kind === "delegate" ? result.backendId : "local"
      });
      return result;
    } catch (err) {
      this.logger.warn("LLM routing failed, using fallback matcher", {
        fallback: this.fallback.name,
        reason: err instanceof Error ? err.message : String(err)
      });
      return this.fallback.match(query, snapshot);
    }
  }
}
