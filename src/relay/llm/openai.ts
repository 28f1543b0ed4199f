/**
 * OpenAI-compatible chat completions client.
 *
 * Works with the OpenAI API and compatible servers (Ollama, LM Studio, vLLM, LiteLLM proxy).
 */

import type { LlmClient, LlmInput, LlmOutput, LlmClientConfig, LlmErrorType } from "./types.js";
import { LlmError } from "./types.js";
import type { FetchLike } from "../registry/types.js";

type OpenAIMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

type OpenAIResponse = {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string;
  }>;
  model?: string;
};

type OpenAIError = {
  error?: {
    message?: string;
  };
};

export class OpenAIClient implements LlmClient {
  readonly provider = "openai";
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: LlmClientConfig, fetchImpl?: FetchLike) {
    if (!config.apiKey) {
      throw new Error("OpenAI client requires apiKey");
    }
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl ?? "https://api.openai.com/v1";
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 15_000;
    this.defaultMaxTokens = config.defaultMaxTokens ?? 256;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    const messages: OpenAIMessage[] = [
      { role: "system", content: input.system },
      { role: "user", content: input.prompt }
    ];

    const timeoutMs = input.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    input.abortSignal?.addEventListener("abort", onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: input.maxTokens ?? this.defaultMaxTokens,
          temperature: input.temperature ?? 0,
          ...(input.jsonMode && { response_format: { type: "json_object" } })
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        throw await this.handleErrorResponse(response);
      }

      const data = (await response.json()) as OpenAIResponse;
      const choice = data.choices?.[0];
      const result: LlmOutput = { text: choice?.message?.content ?? "" };

      const finishReason = this.normalizeFinishReason(choice?.finish_reason);
      if (finishReason !== undefined) {
        result.finishReason = finishReason;
      }
      if (data.model) {
        result.model = data.model;
      }
      return result;
    } catch (err) {
      if (err instanceof LlmError) {
        throw err;
      }
      if (err instanceof Error) {
        if (err.name === "AbortError") {
          throw new LlmError("timeout", `Request timed out after ${timeoutMs}ms`, { provider: this.provider });
        }
        throw new LlmError("unknown", err.message, { provider: this.provider, cause: err });
      }
      throw new LlmError("unknown", "Unknown error during LLM call", { provider: this.provider });
    } finally {
      clearTimeout(timeoutId);
      input.abortSignal?.removeEventListener("abort", onAbort);
    }
  }

  private async handleErrorResponse(response: Response): Promise<LlmError> {
    const status = response.status;
    let message = `HTTP ${status}`;

    try {
      const errorData = (await response.json()) as OpenAIError;
      message = errorData.error?.message ?? message;
    } catch {
      // Body is not JSON; keep the status line
      message = `${message} (non-JSON error body)`;
    }

    let errorType: LlmErrorType;
    switch (status) {
      case 401:
      case 403:
        errorType = "auth_error";
        break;
      case 429:
        errorType = "rate_limited";
        break;
      case 400:
        errorType = "invalid_request";
        break;
      default:
        errorType = status >= 500 ? "provider_error" : "unknown";
    }

    return new LlmError(errorType, message, { provider: this.provider, statusCode: status });
  }

  private normalizeFinishReason(reason?: string): LlmOutput["finishReason"] {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      default:
        return undefined;
    }
  }
}

/**
 * Create an OpenAI client from environment variables, or null when no key is set.
 */
export function createOpenAIClientFromEnv(env: NodeJS.ProcessEnv = process.env): OpenAIClient | null {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    return null;
  }

  const config: LlmClientConfig = {
    apiKey,
    model: env.OPENAI_MODEL ?? "gpt-4o-mini",
    defaultTimeoutMs: parseInt(env.OPENAI_TIMEOUT_MS ?? "15000", 10)
  };

  const baseUrl = env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }

  return new OpenAIClient(config);
}
