import { Hono } from "hono";
import { describe, expect, it } from "vitest";
import { RelayError, isRelayError } from "../src/relay/errors.js";
import { AgentCardSchema } from "../src/relay/protocol/a2a.js";
import { descriptorFromCard } from "../src/relay/registry/backendRegistry.js";
import type { BackendDescriptor } from "../src/relay/registry/types.js";
import { BackendSession } from "../src/relay/session/backendSession.js";
import { chunk, type Chunk } from "../src/relay/types.js";
import { agentBackend, cardFor, inProcessFetch, rawSseBackend, sleep, sseFrame } from "./helpers.js";

const WEATHER = "http://weather.test";
const RAW = "http://raw.test";

function descriptorFor(origin: string, id: string, streaming = true): BackendDescriptor {
  return descriptorFromCard(id, origin, AgentCardSchema.parse(cardFor(origin, id, [{ id }], streaming)));
}

async function drain(source: AsyncIterable<Chunk>): Promise<{ chunks: Chunk[]; error: unknown }> {
  const chunks: Chunk[] = [];
  try {
    for await (const item of source) chunks.push(item);
    return { chunks, error: undefined };
  } catch (err) {
    return { chunks, error: err };
  }
}

function sseResponse(body: string): Response {
  return new Response(body, { headers: { "Content-Type": "text/event-stream" } });
}

/** SSE body that sends `frames` and then stays open. */
function hangingSse(frames: string): Response {
  const bytes = new TextEncoder().encode(frames);
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes);
      }
    }),
    { headers: { "Content-Type": "text/event-stream" } }
  );
}

const ctx = { contextId: "ctx-1", taskId: "task-1" };

function statusFrame(state: string, final: boolean, text?: string): string {
  return sseFrame({
    kind: "status-update",
    taskId: "remote-7",
    contextId: "ctx-1",
    final,
    status: {
      state,
      ...(text !== undefined && {
        message: { kind: "message", role: "agent", messageId: "m1", parts: [{ kind: "text", text }] }
      })
    }
  });
}

function artifactFrame(text: string, lastChunk: boolean, artifactId = "a1"): string {
  return sseFrame({
    kind: "artifact-update",
    taskId: "remote-7",
    contextId: "ctx-1",
    lastChunk,
    artifact: { artifactId, parts: [{ kind: "text", text }] }
  });
}

describe("BackendSession", () => {
  it("streams chunks from a streaming backend", async () => {
    const backend = agentBackend(WEATHER, "weather", [{ id: "forecast" }], [chunk("Sunny"), chunk(" and warm", true)]);
    const session = new BackendSession({ fetch: inProcessFetch({ [WEATHER]: backend.app }) });

    const { chunks, error } = await drain(session.open(descriptorFor(WEATHER, "weather"), "weather in Paris", ctx));
    expect(error).toBeUndefined();
    expect(chunks).toEqual([chunk("Sunny"), chunk(" and warm"), chunk("", true)]);
    expect(backend.producer.queries).toEqual(["weather in Paris"]);
  });

  it("uses message/send for a non-streaming backend", async () => {
    const backend = agentBackend(WEATHER, "weather", [{ id: "forecast" }], [chunk("Sunny"), chunk(" and warm", true)], {
      streaming: false
    });
    const session = new BackendSession({ fetch: inProcessFetch({ [WEATHER]: backend.app }) });

    const { chunks } = await drain(session.open(descriptorFor(WEATHER, "weather", false), "weather", ctx));
    expect(chunks).toEqual([chunk("Sunny and warm", true)]);
  });

  it("sends the query with the relay task id as metadata", async () => {
    let captured: unknown;
    const app = new Hono();
    app.post("/", async (c) => {
      captured = await c.req.json();
      return sseResponse(
        sseFrame({ kind: "message", role: "agent", messageId: "m9", parts: [{ kind: "text", text: "hi" }] })
      );
    });
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: app }) });

    const { chunks } = await drain(session.open(descriptorFor(RAW, "raw"), "hello there", ctx));
    expect(chunks).toEqual([chunk("hi", true)]);
    expect(captured).toMatchObject({
      jsonrpc: "2.0",
      method: "message/stream",
      params: {
        message: {
          kind: "message",
          role: "user",
          contextId: "ctx-1",
          parts: [{ kind: "text", text: "hello there" }],
          metadata: { relayTaskId: "task-1" }
        }
      }
    });
    expect(captured).not.toHaveProperty("params.message.taskId");
  });

  it("makes no request until the first pull and cannot be iterated twice", async () => {
    const backend = agentBackend(WEATHER, "weather", [{ id: "forecast" }]);
    const fetch = inProcessFetch({ [WEATHER]: backend.app });
    const session = new BackendSession({ fetch });

    const stream = session.open(descriptorFor(WEATHER, "weather"), "q", ctx);
    expect(fetch.calls).toEqual([]);

    await drain(stream);
    expect(fetch.calls).toEqual([`${WEATHER}/`]);

    let caught: unknown;
    try {
      stream[Symbol.asyncIterator]();
    } catch (err) {
      caught = err;
    }
    expect(isRelayError(caught, "PROTOCOL_ERROR")).toBe(true);
  });

  it("reports the backend's task id once", async () => {
    const raw = rawSseBackend(
      RAW,
      "raw",
      [],
      statusFrame("working", false) + artifactFrame("done", true) + statusFrame("completed", true)
    );
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });
    const remoteIds: string[] = [];

    const { chunks } = await drain(
      session.open(descriptorFor(RAW, "raw"), "q", { ...ctx, onRemoteTask: (id) => remoteIds.push(id) })
    );
    expect(chunks).toEqual([chunk("done"), chunk("", true)]);
    expect(remoteIds).toEqual(["remote-7"]);
  });

  it("ends with an empty final chunk on a completed status", async () => {
    const raw = rawSseBackend(RAW, "raw", [], artifactFrame("part", false) + statusFrame("completed", true));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { chunks } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(chunks).toEqual([chunk("part"), chunk("", true)]);
  });

  it("keeps reading after an artifact's last chunk until the task completes", async () => {
    const raw = rawSseBackend(
      RAW,
      "raw",
      [],
      artifactFrame("summary", true, "a1") + artifactFrame(" sources", true, "a2") + statusFrame("completed", true)
    );
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { chunks, error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toBeUndefined();
    expect(chunks).toEqual([chunk("summary"), chunk(" sources"), chunk("", true)]);
  });

  it("fails when a failed status follows an artifact's last chunk", async () => {
    const raw = rawSseBackend(RAW, "raw", [], artifactFrame("partial", true) + statusFrame("failed", true, "tool crashed"));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { chunks, error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(chunks).toEqual([chunk("partial")]);
    expect(error).toMatchObject({ code: "BACKEND_ABORT", message: "tool crashed" });
  });

  it("fails with BACKEND_ABORT carrying the backend's status text", async () => {
    const raw = rawSseBackend(RAW, "raw", [], artifactFrame("partial", false) + statusFrame("failed", true, "quota exceeded"));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { chunks, error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(chunks).toEqual([chunk("partial")]);
    expect(error).toMatchObject({ code: "BACKEND_ABORT", message: "quota exceeded" });
  });

  it("names the remote state when a terminal status has no text", async () => {
    const raw = rawSseBackend(RAW, "raw", [], statusFrame("rejected", true));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "BACKEND_ABORT", message: "Backend reported task rejected" });
  });

  it("maps a JSON-RPC error to BACKEND_ABORT", async () => {
    const body = `data: ${JSON.stringify({ jsonrpc: "2.0", id: "1", error: { code: -32603, message: "model offline" } })}\n\n`;
    const raw = rawSseBackend(RAW, "raw", [], body);
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "BACKEND_ABORT", message: "model offline" });
  });

  it("fails with PROTOCOL_ERROR on an unrecognized event", async () => {
    const raw = rawSseBackend(RAW, "raw", [], sseFrame({ kind: "bogus" }));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(isRelayError(error, "PROTOCOL_ERROR")).toBe(true);
    expect(error instanceof RelayError && error.message).toMatch(/^Unrecognized backend event \(kind: /);
  });

  it("fails with PROTOCOL_ERROR on malformed JSON", async () => {
    const raw = rawSseBackend(RAW, "raw", [], "data: {nope\n\n");
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "PROTOCOL_ERROR", message: "Malformed JSON from backend" });
  });

  it("fails with PROTOCOL_ERROR when the stream ends without a terminal status", async () => {
    const raw = rawSseBackend(RAW, "raw", [], artifactFrame("partial", false));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { chunks, error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(chunks).toEqual([chunk("partial")]);
    expect(error).toMatchObject({ code: "PROTOCOL_ERROR", message: "Backend stream ended without a terminal status" });
  });

  it("fails with PROTOCOL_ERROR on a non-2xx response", async () => {
    const raw = rawSseBackend(RAW, "raw", [], () => new Response("busy", { status: 500 }));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "PROTOCOL_ERROR", message: `HTTP 500 from ${RAW}/` });
  });

  it("fails with PROTOCOL_ERROR on an unexpected content type", async () => {
    const raw = rawSseBackend(RAW, "raw", [], () => new Response("hello", { headers: { "Content-Type": "text/plain" } }));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "PROTOCOL_ERROR", message: 'Unexpected content type "text/plain" from backend' });
  });

  it("fails with CONNECT_FAILED when the backend is unreachable", async () => {
    const session = new BackendSession({ fetch: inProcessFetch({}) });

    const { error } = await drain(session.open(descriptorFor("http://offline.test", "offline"), "q", ctx));
    expect(error).toMatchObject({
      code: "CONNECT_FAILED",
      message: "Could not reach http://offline.test/: fetch failed"
    });
  });

  it("fails with TIMEOUT when the backend goes silent", async () => {
    const raw = rawSseBackend(RAW, "raw", [], () => hangingSse(statusFrame("working", false)));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }), inactivityTimeoutMs: 30 });

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", ctx));
    expect(error).toMatchObject({ code: "TIMEOUT", message: "Backend raw was silent for 30ms" });
  });

  it("does not count a slow caller as backend silence", async () => {
    const backend = agentBackend(WEATHER, "weather", [{ id: "forecast" }], [chunk("a"), chunk("b"), chunk("c", true)]);
    const session = new BackendSession({ fetch: inProcessFetch({ [WEATHER]: backend.app }), inactivityTimeoutMs: 30 });

    const chunks: Chunk[] = [];
    for await (const item of session.open(descriptorFor(WEATHER, "weather"), "q", ctx)) {
      chunks.push(item);
      await sleep(60);
    }
    expect(chunks.map((item) => item.content)).toEqual(["a", "b", "c", ""]);
  });

  it("fails with CALLER_CANCELED when the caller aborts mid-stream", async () => {
    const raw = rawSseBackend(RAW, "raw", [], () => hangingSse(artifactFrame("partial", false)));
    const session = new BackendSession({ fetch: inProcessFetch({ [RAW]: raw.app }) });
    const controller = new AbortController();

    const chunks: Chunk[] = [];
    let error: unknown;
    try {
      for await (const item of session.open(descriptorFor(RAW, "raw"), "q", { ...ctx, signal: controller.signal })) {
        chunks.push(item);
        controller.abort();
      }
    } catch (err) {
      error = err;
    }
    expect(chunks).toEqual([chunk("partial")]);
    expect(error).toMatchObject({ code: "CALLER_CANCELED" });
  });

  it("fails with CALLER_CANCELED without a request when already aborted", async () => {
    const fetch = inProcessFetch({});
    const session = new BackendSession({ fetch });
    const controller = new AbortController();
    controller.abort();

    const { error } = await drain(session.open(descriptorFor(RAW, "raw"), "q", { ...ctx, signal: controller.signal }));
    expect(isRelayError(error, "CALLER_CANCELED")).toBe(true);
    expect(fetch.calls).toEqual([]);
  });

  it("cancels the backend's task with tasks/cancel", async () => {
    const backend = agentBackend(
      WEATHER,
      "weather",
      [{ id: "forecast" }],
      [chunk("a"), chunk("b"), chunk("c", true)],
      { delayMs: 20 }
    );
    const session = new BackendSession({ fetch: inProcessFetch({ [WEATHER]: backend.app }) });
    const descriptor = descriptorFor(WEATHER, "weather");
    let remoteId: string | undefined;

    const chunks: Chunk[] = [];
    let error: unknown;
    try {
      for await (const item of session.open(descriptor, "q", { ...ctx, onRemoteTask: (id) => (remoteId = id) })) {
        chunks.push(item);
        if (remoteId !== undefined && chunks.length === 1) {
          expect(await session.cancelRemote(descriptor, remoteId)).toBe(true);
        }
      }
    } catch (err) {
      error = err;
    }
    expect(chunks).toEqual([chunk("a")]);
    expect(error).toMatchObject({ code: "BACKEND_ABORT", message: "Backend reported task canceled" });
  });

  it("cancelRemote resolves false when the backend refuses or is unreachable", async () => {
    const backend = agentBackend(WEATHER, "weather", [{ id: "forecast" }]);
    const session = new BackendSession({ fetch: inProcessFetch({ [WEATHER]: backend.app }) });

    expect(await session.cancelRemote(descriptorFor(WEATHER, "weather"), "no-such-task")).toBe(false);
    expect(await session.cancelRemote(descriptorFor("http://offline.test", "offline"), "t")).toBe(false);
  });
});
