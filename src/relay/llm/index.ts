export type { LlmErrorType, LlmInput, LlmOutput, LlmClientConfig, LlmClient } from "./types.js";
export { LlmError, StubLlmClient } from "./types.js";
export { OpenAIClient, createOpenAIClientFromEnv } from "./openai.js";

import { StubLlmClient } from "./types.js";
import { createOpenAIClientFromEnv } from "./openai.js";
import type { LlmClient } from "./types.js";

/**
 * Create an LLM client from environment variables.
 * Returns StubLlmClient if no provider keys are configured.
 */
export function createLlmClientFromEnv(env: NodeJS.ProcessEnv = process.env): LlmClient {
  return createOpenAIClientFromEnv(env) ?? new StubLlmClient();
}
