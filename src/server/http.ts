import { Hono } from "hono";
import type { Context } from "hono";
import { serve, type ServerType } from "@hono/node-server";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import { toRelayError, type RelayError, type RelayErrorCode } from "../relay/errors.js";
import type { Logger } from "../relay/log.js";
import { silentLogger } from "../relay/log.js";
import { newContextId, type RelayEngine } from "../relay/relayEngine.js";
import type { ChannelEvent } from "../relay/types.js";

const TaskSendSchema = z.object({
  query: z.string(),
  contextId: z.string().min(1).optional(),
  /** false: wait for the task to finish and answer with one JSON body */
  stream: z.boolean().default(true)
});

const TaskIdSchema = z.object({
  taskId: z.string()
});

const TaskStateQuerySchema = z
  .enum(["created", "submitted", "working", "streaming", "completed", "failed", "canceled"])
  .optional();

export type HttpAppOptions = {
  engine: RelayEngine;
  logger?: Logger;
};

type ErrorStatus = 400 | 404 | 409 | 500 | 502 | 503;

function statusFor(code: RelayErrorCode): ErrorStatus {
  switch (code) {
    case "BAD_REQUEST":
    case "CONFIG_INVALID":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "INVALID_TRANSITION":
      return 409;
    case "DISCOVERY_FAILED":
      return 502;
    case "CAPACITY_EXCEEDED":
      return 503;
    default:
      return 500;
  }
}

function errorResponse(c: Context, err: RelayError): Response {
  return c.json(err.toJSON(), statusFor(err.code));
}

/**
 * Read and validate a JSON body. Returns a 400 response instead of throwing.
 */
async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<{ ok: true; value: T } | { ok: false; response: Response }> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400) };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, response: errorResponse(c, toRelayError(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}

function closePayload(event: Extract<ChannelEvent, { type: "close" }>): Record<string, unknown> {
  return event.state === "failed" ? { state: event.state, error: event.error } : { state: event.state };
}

/**
 * Caller-facing HTTP surface of the relay.
 */
export function createHttpApp(options: HttpAppOptions): Hono {
  const { engine } = options;
  const logger = options.logger ?? silentLogger;
  const app = new Hono();

  app.onError((err, c) => {
    const relayErr = toRelayError(err);
    if (statusFor(relayErr.code) === 500) {
      logger.error("Unhandled request error", { path: c.req.path, reason: relayErr.message });
    }
    return errorResponse(c, relayErr);
  });

  app.get("/health", (c) => {
    const limiterStats = {
      running: engine.limiter.running,
      queued: engine.limiter.queued,
      atCapacity: engine.limiter.atCapacity
    };
    return c.json({ ok: true, backends: engine.registry.health(), tasks: engine.stats(), limiter: limiterStats });
  });

  app.get("/backends", (c) => c.json({ backends: engine.registry.entries() }));

  app.post("/backends/discover", async (c) => {
    const outcomes = await engine.registry.discoverAll();
    return c.json({ outcomes });
  });

  app.post("/backends/:id/discover", async (c) => {
    // DISCOVERY_FAILED and NOT_FOUND are mapped by onError
    const descriptor = await engine.registry.discover(c.req.param("id"));
    return c.json({ descriptor });
  });

  // Streams `task`, `chunk`... and one `close` event
  app.post("/tasks/send", async (c) => {
    const body = await parseBody(c, TaskSendSchema);
    if (!body.ok) return body.response;

    const { query, stream: wantsStream } = body.value;
    const { taskId, contextId, channel } = engine.submit(body.value.contextId ?? newContextId(), query);

    if (!wantsStream) {
      let content = "";
      let close: Extract<ChannelEvent, { type: "close" }> | null = null;
      for await (const event of channel) {
        if (event.type === "chunk") content += event.chunk.content;
        else close = event;
      }
      return c.json({ taskId, contextId, content, ...(close ? closePayload(close) : { state: "canceled" }) });
    }

    return streamSSE(c, async (stream) => {
      stream.onAbort(() => {
        if (engine.cancel(taskId)) {
          logger.info("Caller disconnected", { taskId });
        }
      });

      await stream.writeSSE({ event: "task", data: JSON.stringify({ taskId, contextId }) });
      for await (const event of channel) {
        if (event.type === "chunk") {
          await stream.writeSSE({ event: "chunk", data: JSON.stringify(event.chunk) });
        } else {
          await stream.writeSSE({ event: "close", data: JSON.stringify(closePayload(event)) });
        }
      }
    });
  });

  app.post("/tasks/get", async (c) => {
    const body = await parseBody(c, TaskIdSchema);
    if (!body.ok) return body.response;

    const task = engine.get(body.value.taskId);
    if (!task) {
      return c.json({ code: "NOT_FOUND", message: `Task ${body.value.taskId} not found` }, 404);
    }
    return c.json(task);
  });

  app.post("/tasks/cancel", async (c) => {
    const body = await parseBody(c, TaskIdSchema);
    if (!body.ok) return body.response;

    const canceled = engine.cancel(body.value.taskId);
    if (!canceled) {
      return c.json({ code: "NOT_FOUND", message: `Task ${body.value.taskId} not found or already finished` }, 404);
    }
    return c.json({ canceled: true, taskId: body.value.taskId });
  });

  app.get("/tasks/list", (c) => {
    const state = TaskStateQuerySchema.safeParse(c.req.query("state"));
    if (!state.success) {
      return errorResponse(c, toRelayError(state.error));
    }
    return c.json({ tasks: engine.list(state.data), stats: engine.stats() });
  });

  return app;
}

export type StartServerOptions = {
  app: Hono;
  port: number;
  host?: string;
  logger?: Logger;
};

export function startHttpServer(options: StartServerOptions): ServerType {
  const logger = options.logger ?? silentLogger;
  const hostname = options.host ?? "127.0.0.1";
  return serve({ fetch: options.app.fetch, port: options.port, hostname }, (info) => {
    logger.info(`HTTP server listening on http://${hostname}:${info.port}`);
  });
}
