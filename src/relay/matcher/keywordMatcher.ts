import type { BackendDescriptor } from "../registry/types.js";
import { LOCAL, delegateTo, type CapabilityMatcher, type MatchResult } from "./types.js";

export type KeywordMatcherOptions = {
  /**
   * Only count a tag or example when it sits on word boundaries in the query,
   * so "photo" no longer matches "photosynthesis". Off by default.
   */
  wholeWord?: boolean;
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whether `token` occurs in `text` with no letter or digit directly on either side.
 */
export function containsWord(text: string, token: string): boolean {
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(token)}($|[^\\p{L}\\p{N}])`, "u").test(text);
}

/**
 * Routing tokens of a backend: every skill tag and example, lowercased, blanks dropped.
 */
export function routingTokens(descriptor: BackendDescriptor): string[] {
  const tokens: string[] = [];
  for (const skill of descriptor.skills) {
    for (const token of [...skill.tags, ...skill.examples]) {
      const normalized = token.trim().toLowerCase();
      if (normalized) tokens.push(normalized);
    }
  }
  return tokens;
}

/**
 * First-match-wins keyword routing over backends in registration order.
 */
export class KeywordMatcher implements CapabilityMatcher {
  readonly name = "keyword";
  private readonly wholeWord: boolean;

  constructor(options: KeywordMatcherOptions = {}) {
    this.wholeWord = options.wholeWord ?? false;
  }

  match(query: string, snapshot: readonly BackendDescriptor[]): MatchResult {
    const haystack = query.trim().toLowerCase();
    if (!haystack) return LOCAL;

    for (const descriptor of snapshot) {
      if (routingTokens(descriptor).some((token) => this.contains(haystack, token))) {
        return delegateTo(descriptor.id);
      }
    }
    return LOCAL;
  }

  private contains(haystack: string, token: string): boolean {
    return this.wholeWord ? containsWord(haystack, token) : haystack.includes(token);
  }
}
