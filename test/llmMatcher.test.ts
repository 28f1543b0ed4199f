import { describe, expect, it } from "vitest";
import { LlmError, StubLlmClient, type LlmClient, type LlmInput, type LlmOutput } from "../src/relay/llm/types.js";
import { LlmMatcher, buildRoutingPrompt, parseRoutingReply } from "../src/relay/matcher/llmMatcher.js";
import { backendDescriptor } from "./helpers.js";

const weather = backendDescriptor("weather", [{ id: "forecast", tags: ["weather"] }], "Forecasts and current conditions");
const math = backendDescriptor("math", [{ id: "calc", tags: ["math"] }], "Arithmetic");

class FakeLlmClient implements LlmClient {
  readonly provider = "fake";
  readonly model = "fake-1";
  readonly inputs: LlmInput[] = [];

  constructor(private readonly reply: string | Error) {}

  isConfigured(): boolean {
    return true;
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    this.inputs.push(input);
    if (this.reply instanceof Error) throw this.reply;
    return { text: this.reply };
  }
}

describe("parseRoutingReply", () => {
  it("accepts a JSON decision naming a backend id", () => {
    expect(parseRoutingReply('{"backend": "math", "reasoning": "sums"}', [weather, math])).toEqual({
      kind: "delegate",
      backendId: "math"
    });
  });

  it("accepts a fenced JSON reply and a display name", () => {
    expect(parseRoutingReply('```json\n{"backend": "Weather"}\n```', [weather, math])).toEqual({
      kind: "delegate",
      backendId: "weather"
    });
  });

  it("treats none or an unknown id as local", () => {
    expect(parseRoutingReply('{"backend": "none"}', [weather])).toEqual({ kind: "local" });
    expect(parseRoutingReply('{"backend": "travel"}', [weather])).toEqual({ kind: "local" });
  });

  it("searches a free-text reply for a backend", () => {
    expect(parseRoutingReply("I would send this to math.", [weather, math])).toEqual({
      kind: "delegate",
      backendId: "math"
    });
    expect(parseRoutingReply("No idea.", [weather, math])).toEqual({ kind: "local" });
  });

  it("ignores a backend id buried inside another word", () => {
    const rag = backendDescriptor("rag", [{ id: "search", tags: ["documents"] }]);
    expect(parseRoutingReply("That paragraph needs more storage.", [rag])).toEqual({ kind: "local" });
    expect(parseRoutingReply("Send it to rag, it indexes documents.", [rag])).toEqual({
      kind: "delegate",
      backendId: "rag"
    });
  });
});

describe("buildRoutingPrompt", () => {
  it("lists every backend with its skills", () => {
    const prompt = buildRoutingPrompt([weather]);
    expect(prompt).toContain("- id: weather\n  name: weather\n  description: Forecasts and current conditions\n  skills:\n    - forecast");
  });
});

describe("LlmMatcher", () => {
  it("routes with the model's decision at temperature 0", async () => {
    const client = new FakeLlmClient('{"backend": "weather"}');
    const matcher = new LlmMatcher({ client });

    expect(await matcher.match("is it sunny?", [weather, math])).toEqual({ kind: "delegate", backendId: "weather" });
    expect(client.inputs).toHaveLength(1);
    expect(client.inputs[0]).toMatchObject({ prompt: "is it sunny?", temperature: 0, jsonMode: true });
  });

  it("falls back to keyword routing when the call fails", async () => {
    const matcher = new LlmMatcher({ client: new FakeLlmClient(new LlmError("timeout", "slow")) });
    expect(await matcher.match("math homework", [weather, math])).toEqual({ kind: "delegate", backendId: "math" });
  });

  it("falls back without calling an unconfigured client", async () => {
    const matcher = new LlmMatcher({ client: new StubLlmClient() });
    expect(await matcher.match("weather today", [weather, math])).toEqual({ kind: "delegate", backendId: "weather" });
  });

  it("stays local for a blank query or an empty snapshot", async () => {
    const client = new FakeLlmClient('{"backend": "weather"}');
    const matcher = new LlmMatcher({ client });
    expect(await matcher.match(" ", [weather])).toEqual({ kind: "local" });
    expect(await matcher.match("weather", [])).toEqual({ kind: "local" });
    expect(client.inputs).toEqual([]);
  });
});
