export { KeywordMatcher, routingTokens } from "./keywordMatcher.js";
export type { KeywordMatcherOptions } from "./keywordMatcher.js";
export { LlmMatcher, buildRoutingPrompt, parseRoutingReply } from "./llmMatcher.js";
export type { LlmMatcherOptions } from "./llmMatcher.js";
export { LOCAL, delegateTo } from "./types.js";
export type { CapabilityMatcher, MatchResult } from "./types.js";
