import { describe, expect, it } from "vitest";
import { createLlmClientFromEnv } from "../src/relay/llm/index.js";
import { OpenAIClient, createOpenAIClientFromEnv } from "../src/relay/llm/openai.js";
import { LlmError } from "../src/relay/llm/types.js";
import type { FetchLike } from "../src/relay/registry/types.js";

function fakeFetch(response: () => Response): FetchLike & { bodies: unknown[]; urls: string[] } {
  const bodies: unknown[] = [];
  const urls: string[] = [];
  const impl: FetchLike = async (input, init) => {
    urls.push(input);
    bodies.push(typeof init?.body === "string" ? JSON.parse(init.body) : undefined);
    return response();
  };
  return Object.assign(impl, { bodies, urls });
}

const config = { apiKey: "test-secret", model: "test-model", baseUrl: "http://llm.test/v1" };

describe("OpenAIClient", () => {
  it("sends a chat completion and reads the first choice", async () => {
    const fetch = fakeFetch(() =>
      Response.json({ choices: [{ message: { content: '{"backend":"rag"}' }, finish_reason: "stop" }], model: "test-model-1" })
    );
    const client = new OpenAIClient(config, fetch);

    const output = await client.generate({ system: "route", prompt: "hi", jsonMode: true, temperature: 0 });
    expect(output).toEqual({ text: '{"backend":"rag"}', finishReason: "stop", model: "test-model-1" });
    expect(fetch.urls).toEqual(["http://llm.test/v1/chat/completions"]);
    expect(fetch.bodies[0]).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "route" },
        { role: "user", content: "hi" }
      ],
      max_tokens: 256,
      temperature: 0,
      response_format: { type: "json_object" }
    });
  });

  it("maps a rate limit response to an LlmError", async () => {
    const client = new OpenAIClient(
      config,
      fakeFetch(() => Response.json({ error: { message: "slow down" } }, { status: 429 }))
    );

    let caught: unknown;
    try {
      await client.generate({ system: "s", prompt: "p" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LlmError);
    expect(caught).toMatchObject({ type: "rate_limited", statusCode: 429, message: "slow down" });
  });

  it("keeps the status line when the error body is not JSON", async () => {
    const client = new OpenAIClient(config, fakeFetch(() => new Response("<html>", { status: 502 })));
    await expect(client.generate({ system: "s", prompt: "p" })).rejects.toMatchObject({
      type: "provider_error",
      message: "HTTP 502 (non-JSON error body)"
    });
  });

  it("requires an api key", () => {
    expect(() => new OpenAIClient({ model: "m" })).toThrow("OpenAI client requires apiKey");
  });
});

describe("createOpenAIClientFromEnv", () => {
  it("returns null without a key and a configured client with one", () => {
    expect(createOpenAIClientFromEnv({})).toBeNull();
    const client = createOpenAIClientFromEnv({ OPENAI_API_KEY: "test-secret" });
    expect(client?.model).toBe("gpt-4o-mini");
    expect(client?.isConfigured()).toBe(true);
  });

  it("falls back to the stub client", () => {
    const client = createLlmClientFromEnv({});
    expect(client.provider).toBe("stub");
    expect(client.isConfigured()).toBe(false);
  });
});
