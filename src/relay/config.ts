/**
 * Relay configuration: defaults, then an optional JSON file (`RELAY_CONFIG`), then
 * environment variables, then explicit overrides (CLI flags). Validated with zod.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { RelayError } from "./errors.js";
import { AGENT_CARD_PATH } from "./protocol/a2a.js";

export const BackendConfigSchema = z.object({
  id: z.string().trim().min(1),
  url: z.string().url()
});

export const RelayConfigSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(0).max(65535).default(8080),
    cardPath: z.string().startsWith("/").default(AGENT_CARD_PATH),
    discoveryTimeoutMs: z.number().int().positive().default(10_000),
    retryUndiscoveredAfterMs: z.number().int().min(0).default(30_000),
    inactivityTimeoutMs: z.number().int().positive().default(30_000),
    maxConcurrentTasks: z.number().int().positive().default(64),
    /** 0 waits indefinitely for a free slot */
    queueTimeoutMs: z.number().int().min(0).default(0),
    maxTasks: z.number().int().positive().default(1000),
    matcher: z.enum(["keyword", "llm"]).default("keyword"),
    wholeWordMatching: z.boolean().default(false),
    /** Fixed answer for queries no backend matches; omit to list backend capabilities */
    localReply: z.string().optional(),
    backends: z.array(BackendConfigSchema).default([]),
    agent: z
      .object({
        name: z.string().min(1).default("A2A Relay"),
        description: z.string().default("Routes each request to the specialized agent best suited to answer it."),
        /** Public URL advertised in the relay's own agent card */
        url: z.string().url().optional()
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.backends.forEach((backend, index) => {
      if (seen.has(backend.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["backends", index, "id"],
          message: `Duplicate backend id '${backend.id}'`
        });
      }
      seen.add(backend.id);
    });
  });

export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalInt = z.preprocess(blankToUndefined, z.coerce.number().int().optional());
const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const envSchema = z.object({
  RELAY_CONFIG: optionalString,
  RELAY_BACKENDS: optionalString,
  RELAY_HOST: optionalString,
  RELAY_PORT: optionalInt,
  RELAY_CARD_PATH: optionalString,
  RELAY_DISCOVERY_TIMEOUT_MS: optionalInt,
  RELAY_RETRY_UNDISCOVERED_MS: optionalInt,
  RELAY_INACTIVITY_TIMEOUT_MS: optionalInt,
  RELAY_MAX_CONCURRENT: optionalInt,
  RELAY_QUEUE_TIMEOUT_MS: optionalInt,
  RELAY_MAX_TASKS: optionalInt,
  RELAY_MATCHER: z.preprocess(blankToUndefined, z.enum(["keyword", "llm"]).optional()),
  RELAY_WHOLE_WORD: z.preprocess(blankToUndefined, z.enum(["true", "false", "1", "0"]).optional()),
  RELAY_LOCAL_REPLY: optionalString,
  RELAY_PUBLIC_URL: optionalString
});

/**
 * Parse `id=url` pairs separated by commas, e.g. `search=http://localhost:9001,caption=http://localhost:9002`.
 */
export function parseBackendList(value: string): BackendConfig[] {
  const backends: BackendConfig[] = [];
  for (const raw of value.split(",")) {
    const item = raw.trim();
    if (!item) continue;
    const eq = item.indexOf("=");
    if (eq <= 0 || eq === item.length - 1) {
      throw new RelayError("CONFIG_INVALID", `Backend entry must look like id=url, got '${item}'`);
    }
    backends.push({ id: item.slice(0, eq).trim(), url: item.slice(eq + 1).trim() });
  }
  return backends;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    throw new RelayError("CONFIG_INVALID", `Cannot read config file ${resolved}`, {
      reason: err instanceof Error ? err.message : String(err)
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new RelayError("CONFIG_INVALID", `Config file ${resolved} is not valid JSON`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new RelayError("CONFIG_INVALID", `Config file ${resolved} must contain a JSON object`);
  }
  return { ...parsed };
}

type EnvLayer = {
  file: string | undefined;
  publicUrl: string | undefined;
  values: Record<string, unknown>;
};

function fromEnv(env: NodeJS.ProcessEnv): EnvLayer {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new RelayError("CONFIG_INVALID", "Invalid relay environment variables", { issues: result.error.issues });
  }
  const e = result.data;
  const values: Record<string, unknown> = {};
  const set = (key: string, value: unknown): void => {
    if (value !== undefined) values[key] = value;
  };

  set("host", e.RELAY_HOST);
  set("port", e.RELAY_PORT);
  set("cardPath", e.RELAY_CARD_PATH);
  set("discoveryTimeoutMs", e.RELAY_DISCOVERY_TIMEOUT_MS);
  set("retryUndiscoveredAfterMs", e.RELAY_RETRY_UNDISCOVERED_MS);
  set("inactivityTimeoutMs", e.RELAY_INACTIVITY_TIMEOUT_MS);
  set("maxConcurrentTasks", e.RELAY_MAX_CONCURRENT);
  set("queueTimeoutMs", e.RELAY_QUEUE_TIMEOUT_MS);
  set("maxTasks", e.RELAY_MAX_TASKS);
  set("matcher", e.RELAY_MATCHER);
  set("localReply", e.RELAY_LOCAL_REPLY);
  if (e.RELAY_WHOLE_WORD !== undefined) {
    set("wholeWordMatching", e.RELAY_WHOLE_WORD === "true" || e.RELAY_WHOLE_WORD === "1");
  }
  if (e.RELAY_BACKENDS !== undefined) {
    set("backends", parseBackendList(e.RELAY_BACKENDS));
  }

  return { file: e.RELAY_CONFIG, publicUrl: e.RELAY_PUBLIC_URL, values };
}

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; takes precedence over RELAY_CONFIG */
  configPath?: string;
  /** Highest-precedence values, typically CLI flags */
  overrides?: Partial<RelayConfigInput>;
};

/**
 * Resolve the effective relay configuration.
 *
 * @throws RelayError CONFIG_INVALID
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = fromEnv(options.env ?? process.env);
  const filePath = options.configPath ?? env.file;
  const fileValues = filePath ? readConfigFile(filePath) : {};

  const merged: Record<string, unknown> = { ...fileValues, ...env.values, ...options.overrides };
  if (env.publicUrl !== undefined) {
    const agent = merged.agent;
    merged.agent = { ...(typeof agent === "object" && agent !== null ? agent : {}), url: env.publicUrl };
  }

  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new RelayError("CONFIG_INVALID", `Invalid relay configuration at ${where}: ${issue?.message ?? "invalid"}`, {
      issues: result.error.issues
    });
  }
  return result.data;
}
