/**
 * A2A agent host: serves an agent card and answers JSON-RPC `message/stream`,
 * `message/send` and `tasks/cancel` from any chunk producer.
 *
 * `serve --a2a` uses it to expose the relay itself as an agent; tests use it as an
 * in-process backend.
 */

import crypto from "node:crypto";
import { Hono } from "hono";
import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { isRelayError } from "../relay/errors.js";
import type { Logger } from "../relay/log.js";
import { silentLogger } from "../relay/log.js";
import {
  A2A_METHODS,
  AGENT_CARD_PATH,
  AgentCardSchema,
  JSON_RPC_ERRORS,
  JsonRpcRequestSchema,
  MessageSendParamsSchema,
  TaskIdParamsSchema,
  textMessage,
  textOfParts,
  type A2ATaskState,
  type AgentCard,
  type AgentCardInput,
  type JsonRpcId,
  type RemoteTask
} from "../relay/protocol/a2a.js";
import type { Chunk, SourceContext } from "../relay/types.js";

export interface AgentProducer {
  produce(query: string, ctx: SourceContext): AsyncIterable<Chunk>;
}

export type AgentHostOptions = {
  card: AgentCardInput;
  producer: AgentProducer;
  cardPath?: string;
  /** Path that accepts JSON-RPC posts */
  rpcPath?: string;
  logger?: Logger;
};

type HostedTask = {
  contextId: string;
  controller: AbortController;
};

const ARTIFACT_NAME = "response";

function rpcResult(id: JsonRpcId, result: unknown): Record<string, unknown> {
  return { jsonrpc: "2.0", id, result };
}

function rpcError(id: JsonRpcId, code: number, message: string): Record<string, unknown> {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

function statusUpdate(taskId: string, contextId: string, state: A2ATaskState, final: boolean, text?: string) {
  return {
    kind: "status-update" as const,
    taskId,
    contextId,
    final,
    status: {
      state,
      timestamp: new Date().toISOString(),
      ...(text !== undefined && {
        message: textMessage("agent", text, { messageId: crypto.randomUUID(), contextId, taskId })
      })
    }
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type AgentHost = {
  app: Hono;
  card: AgentCard;
  /** Tasks currently being produced */
  readonly activeTasks: number;
};

export function createAgentHost(options: AgentHostOptions): AgentHost {
  const card = AgentCardSchema.parse(options.card);
  const cardPath = options.cardPath ?? AGENT_CARD_PATH;
  const rpcPath = options.rpcPath ?? "/";
  const logger = options.logger ?? silentLogger;
  const tasks = new Map<string, HostedTask>();
  const app = new Hono();

  app.get(cardPath, (c) => c.json(card));

  app.post(rpcPath, async (c) => {
    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      return c.json(rpcError(null, JSON_RPC_ERRORS.parseError, "Invalid JSON body"));
    }

    const request = JsonRpcRequestSchema.safeParse(json);
    if (!request.success) {
      return c.json(rpcError(null, JSON_RPC_ERRORS.invalidRequest, "Invalid JSON-RPC request"));
    }
    const { id, method, params } = request.data;

    switch (method) {
      case A2A_METHODS.stream:
      case A2A_METHODS.send: {
        const parsed = MessageSendParamsSchema.safeParse(params);
        if (!parsed.success) {
          return c.json(rpcError(id, JSON_RPC_ERRORS.invalidParams, "params.message is required"));
        }
        const { message } = parsed.data;
        const taskId = crypto.randomUUID();
        const contextId = message.contextId ?? crypto.randomUUID();
        const hosted: HostedTask = { contextId, controller: new AbortController() };
        tasks.set(taskId, hosted);
        logger.debug("Hosted task started", { taskId, method });

        const query = textOfParts(message.parts);
        return method === A2A_METHODS.stream
          ? streamTask(c, id, query, taskId, hosted)
          : sendTask(c, id, query, taskId, hosted);
      }

      case A2A_METHODS.cancel: {
        const parsed = TaskIdParamsSchema.safeParse(params);
        if (!parsed.success) {
          return c.json(rpcError(id, JSON_RPC_ERRORS.invalidParams, "params.id is required"));
        }
        const hosted = tasks.get(parsed.data.id);
        if (!hosted) {
          return c.json(rpcError(id, JSON_RPC_ERRORS.taskNotFound, `Task ${parsed.data.id} not found`));
        }
        hosted.controller.abort();
        const task: RemoteTask = {
          kind: "task",
          id: parsed.data.id,
          contextId: hosted.contextId,
          status: { state: "canceled" }
        };
        return c.json(rpcResult(id, task));
      }

      default:
        return c.json(rpcError(id, JSON_RPC_ERRORS.methodNotFound, `Method ${method} not found`));
    }
  });

  function streamTask(c: Context, rpcId: JsonRpcId, query: string, taskId: string, hosted: HostedTask): Response {
    const { contextId, controller } = hosted;
    return streamSSE(c, async (stream) => {
      stream.onAbort(() => controller.abort());
      const send = (result: unknown): Promise<void> => stream.writeSSE({ data: JSON.stringify(rpcResult(rpcId, result)) });

      try {
        await send(statusUpdate(taskId, contextId, "working", false));
        let index = 0;
        for await (const item of options.producer.produce(query, { contextId, taskId, signal: controller.signal })) {
          if (item.content === "") {
            if (item.isFinal) break;
            continue;
          }
          await send({
            kind: "artifact-update",
            taskId,
            contextId,
            append: index > 0,
            lastChunk: item.isFinal,
            artifact: { artifactId: `${taskId}-artifact`, name: ARTIFACT_NAME, parts: [{ kind: "text", text: item.content }] }
          });
          index++;
          if (item.isFinal) break;
        }
        await send(statusUpdate(taskId, contextId, controller.signal.aborted ? "canceled" : "completed", true));
      } catch (err) {
        const canceled = controller.signal.aborted || isRelayError(err, "CALLER_CANCELED");
        logger.warn("Hosted task ended with error", { taskId, reason: describe(err) });
        if (!stream.aborted) {
          await send(statusUpdate(taskId, contextId, canceled ? "canceled" : "failed", true, describe(err)));
        }
      } finally {
        tasks.delete(taskId);
      }
    });
  }

  async function sendTask(c: Context, rpcId: JsonRpcId, query: string, taskId: string, hosted: HostedTask): Promise<Response> {
    const { contextId, controller } = hosted;
    let text = "";
    let state: A2ATaskState = "completed";
    let errorText: string | undefined;

    try {
      for await (const item of options.producer.produce(query, { contextId, taskId, signal: controller.signal })) {
        text += item.content;
        if (item.isFinal) break;
      }
    } catch (err) {
      state = controller.signal.aborted || isRelayError(err, "CALLER_CANCELED") ? "canceled" : "failed";
      errorText = describe(err);
      logger.warn("Hosted task ended with error", { taskId, reason: errorText });
    } finally {
      tasks.delete(taskId);
    }

    const task: RemoteTask = {
      kind: "task",
      id: taskId,
      contextId,
      status: {
        state,
        ...(errorText !== undefined && {
          message: textMessage("agent", errorText, { messageId: crypto.randomUUID(), contextId, taskId })
        })
      },
      ...(state === "completed" && {
        artifacts: [{ artifactId: `${taskId}-artifact`, name: ARTIFACT_NAME, parts: [{ kind: "text", text }] }]
      })
    };
    return c.json(rpcResult(rpcId, task));
  }

  return {
    app,
    card,
    get activeTasks() {
      return tasks.size;
    }
  };
}
