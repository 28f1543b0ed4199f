/**
 * A2A (agent-to-agent) wire contracts.
 *
 * Only the subset the relay speaks is modelled: agent cards for discovery, and the
 * JSON-RPC 2.0 envelopes around `message/stream`, `message/send` and `tasks/cancel`.
 * Unknown fields are stripped; unknown part kinds are kept but carry no text.
 */

import { z } from "zod";

export const AGENT_CARD_PATH = "/.well-known/agent-card.json";

export const A2A_METHODS = {
  stream: "message/stream",
  send: "message/send",
  cancel: "tasks/cancel"
} as const;

/** Standard JSON-RPC error codes plus the A2A task-level ones we emit. */
export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  taskNotFound: -32001
} as const;

// ============================================================================
// Agent card
// ============================================================================

export const AgentSkillSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
  examples: z.array(z.string()).default([]),
  inputModes: z.array(z.string()).optional(),
  outputModes: z.array(z.string()).optional()
});

export const AgentCardSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  url: z.string().url(),
  version: z.string().default("0.0.0"),
  protocolVersion: z.string().optional(),
  defaultInputModes: z.array(z.string()).default(["text"]),
  defaultOutputModes: z.array(z.string()).default(["text"]),
  capabilities: z
    .object({
      streaming: z.boolean().optional(),
      pushNotifications: z.boolean().optional()
    })
    .default({}),
  skills: z.array(AgentSkillSchema).default([])
});

export type AgentSkill = z.infer<typeof AgentSkillSchema>;
export type AgentCard = z.infer<typeof AgentCardSchema>;
/** Card shape accepted by the agent host before defaults are applied. */
export type AgentCardInput = z.input<typeof AgentCardSchema>;

// ============================================================================
// Messages, tasks and stream events
// ============================================================================

export const PartSchema = z.object({
  kind: z.string(),
  text: z.string().optional()
});

export const MessageSchema = z.object({
  kind: z.literal("message"),
  role: z.enum(["user", "agent"]),
  messageId: z.string(),
  parts: z.array(PartSchema),
  contextId: z.string().optional(),
  taskId: z.string().optional(),
  metadata: z.record(z.unknown()).optional()
});

export const A2ATaskStateSchema = z.enum([
  "submitted",
  "working",
  "input-required",
  "auth-required",
  "completed",
  "canceled",
  "failed",
  "rejected",
  "unknown"
]);

export const TaskStatusSchema = z.object({
  state: A2ATaskStateSchema,
  message: MessageSchema.optional(),
  timestamp: z.string().optional()
});

export const ArtifactSchema = z.object({
  artifactId: z.string(),
  name: z.string().optional(),
  parts: z.array(PartSchema)
});

export const RemoteTaskSchema = z.object({
  kind: z.literal("task"),
  id: z.string(),
  contextId: z.string(),
  status: TaskStatusSchema,
  artifacts: z.array(ArtifactSchema).optional()
});

export const ArtifactUpdateEventSchema = z.object({
  kind: z.literal("artifact-update"),
  taskId: z.string(),
  contextId: z.string(),
  artifact: ArtifactSchema,
  append: z.boolean().optional(),
  lastChunk: z.boolean().optional()
});

export const StatusUpdateEventSchema = z.object({
  kind: z.literal("status-update"),
  taskId: z.string(),
  contextId: z.string(),
  status: TaskStatusSchema,
  final: z.boolean().default(false)
});

export const StreamResultSchema = z.discriminatedUnion("kind", [
  MessageSchema,
  RemoteTaskSchema,
  ArtifactUpdateEventSchema,
  StatusUpdateEventSchema
]);

export type Part = z.infer<typeof PartSchema>;
export type A2AMessage = z.infer<typeof MessageSchema>;
export type A2ATaskState = z.infer<typeof A2ATaskStateSchema>;
export type RemoteTask = z.infer<typeof RemoteTaskSchema>;
export type ArtifactUpdateEvent = z.infer<typeof ArtifactUpdateEventSchema>;
export type StatusUpdateEvent = z.infer<typeof StatusUpdateEventSchema>;
export type StreamResult = z.infer<typeof StreamResultSchema>;

// ============================================================================
// JSON-RPC envelopes
// ============================================================================

export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional()
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: JsonRpcIdSchema.optional(),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional()
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: JsonRpcIdSchema,
  method: z.string(),
  params: z.unknown().optional()
});

export const MessageSendParamsSchema = z.object({
  message: MessageSchema
});

export const TaskIdParamsSchema = z.object({
  id: z.string()
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export const TERMINAL_REMOTE_STATES: ReadonlySet<A2ATaskState> = new Set<A2ATaskState>([
  "completed",
  "canceled",
  "failed",
  "rejected"
]);

/**
 * Concatenate the text parts of a message or artifact. Non-text parts are skipped.
 */
export function textOfParts(parts: readonly Part[]): string {
  let text = "";
  for (const part of parts) {
    if (part.kind === "text" && part.text !== undefined) {
      text += part.text;
    }
  }
  return text;
}

export function textMessage(
  role: A2AMessage["role"],
  text: string,
  ids: { messageId: string; contextId?: string; taskId?: string }
): A2AMessage {
  const message: A2AMessage = {
    kind: "message",
    role,
    messageId: ids.messageId,
    parts: [{ kind: "text", text }]
  };
  if (ids.contextId !== undefined) message.contextId = ids.contextId;
  if (ids.taskId !== undefined) message.taskId = ids.taskId;
  return message;
}
