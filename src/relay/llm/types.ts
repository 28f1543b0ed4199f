/**
 * LLM client types.
 *
 * The relay only asks an LLM one thing: which backend should take a query. Provider
 * errors are normalized so the matcher can fall back without caring who failed.
 */

export type LlmErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "auth_error"        // Invalid API key or auth failure
  | "invalid_request"   // Malformed request
  | "provider_error"    // Provider-side issue (5xx)
  | "not_configured"    // No provider key available
  | "unknown";

export class LlmError extends Error {
  readonly type: LlmErrorType;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    type: LlmErrorType,
    message: string,
    options?: {
      provider?: string;
      statusCode?: number;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "LlmError";
    this.type = type;
    if (options?.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }
}

export type LlmInput = {
  system: string;
  prompt: string;
  maxTokens?: number;
  /** Lower is more deterministic; routing uses 0 */
  temperature?: number;
  /** Ask the provider for a JSON object response */
  jsonMode?: boolean;
  abortSignal?: AbortSignal;
  timeoutMs?: number;
};

export type LlmOutput = {
  text: string;
  model?: string;
  finishReason?: "stop" | "length" | "content_filter" | "error";
};

export type LlmClientConfig = {
  apiKey?: string;
  /** Base URL for self-hosted or proxied OpenAI-compatible APIs */
  baseUrl?: string;
  model: string;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
};

export interface LlmClient {
  generate(input: LlmInput): Promise<LlmOutput>;
  isConfigured(): boolean;
  readonly provider: string;
  readonly model: string;
}

/**
 * Client used when no provider key is configured. Always refuses, so the LLM matcher
 * falls back to keyword routing.
 */
export class StubLlmClient implements LlmClient {
  readonly provider = "stub";
  readonly model = "none";

  generate(_input: LlmInput): Promise<LlmOutput> {
    return Promise.reject(
      new LlmError("not_configured", "No LLM provider configured; set OPENAI_API_KEY to enable LLM routing", {
        provider: this.provider
      })
    );
  }

  isConfigured(): boolean {
    return false;
  }
}
