/**
 * Wire a RelayEngine from resolved configuration.
 */

import type { RelayConfig } from "./config.js";
import { createLlmClientFromEnv } from "./llm/index.js";
import type { LlmClient } from "./llm/types.js";
import { CapabilityListingHandler, StaticReplyHandler, type LocalHandler } from "./local/handlers.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import { KeywordMatcher } from "./matcher/keywordMatcher.js";
import { LlmMatcher } from "./matcher/llmMatcher.js";
import type { CapabilityMatcher } from "./matcher/types.js";
import { BackendRegistry } from "./registry/backendRegistry.js";
import type { FetchLike } from "./registry/types.js";
import { RelayEngine } from "./relayEngine.js";
import { BackendSession } from "./session/backendSession.js";
import { TaskTracker } from "./tasks/taskTracker.js";

export type CreateRelayOptions = {
  fetch?: FetchLike;
  logger?: Logger;
  /** LLM client for `matcher: "llm"`; built from OPENAI_* env vars when omitted */
  llmClient?: LlmClient;
  localHandler?: LocalHandler;
};

export function createRelay(config: RelayConfig, options: CreateRelayOptions = {}): RelayEngine {
  const logger = options.logger ?? silentLogger;
  const io = options.fetch ? { fetch: options.fetch } : {};

  const registry = new BackendRegistry({
    cardPath: config.cardPath,
    discoveryTimeoutMs: config.discoveryTimeoutMs,
    retryUndiscoveredAfterMs: config.retryUndiscoveredAfterMs,
    logger: logger.child("registry"),
    ...io
  });
  for (const backend of config.backends) {
    registry.register(backend.id, backend.url);
  }

  const keyword = new KeywordMatcher({ wholeWord: config.wholeWordMatching });
  let matcher: CapabilityMatcher = keyword;
  if (config.matcher === "llm") {
    matcher = new LlmMatcher({
      client: options.llmClient ?? createLlmClientFromEnv(),
      fallback: keyword,
      logger: logger.child("matcher")
    });
  }

  const localHandler =
    options.localHandler ??
    (config.localReply !== undefined ? new StaticReplyHandler(config.localReply) : new CapabilityListingHandler(registry));

  return new RelayEngine({
    registry,
    matcher,
    localHandler,
    session: new BackendSession({
      inactivityTimeoutMs: config.inactivityTimeoutMs,
      logger: logger.child("session"),
      ...io
    }),
    tracker: new TaskTracker({ maxTasks: config.maxTasks, logger: logger.child("tasks") }),
    limiter: { maxConcurrent: config.maxConcurrentTasks, queueTimeoutMs: config.queueTimeoutMs },
    logger
  });
}
