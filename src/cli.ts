#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfig, parseBackendList, type RelayConfig, type RelayConfigInput } from "./relay/config.js";
import { createRelay } from "./relay/createRelay.js";
import { toRelayError } from "./relay/errors.js";
import { createLogger, type Logger } from "./relay/log.js";
import { newContextId, type RelayEngine } from "./relay/relayEngine.js";
import { createAgentHost } from "./server/agentHost.js";
import { createHttpApp, startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,           // Task completed
  ERROR: 30,       // Task failed, or the relay could not start
  CANCELLED: 40,   // Cancelled by user (SIGINT/SIGTERM)
} as const;

type CommonOpts = {
  config?: string;
  backend: string[];
  matcher?: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function resolveConfig(opts: CommonOpts, extra: Partial<RelayConfigInput> = {}): RelayConfig {
  const overrides: Partial<RelayConfigInput> = { ...extra };
  if (opts.backend.length > 0) {
    overrides.backends = opts.backend.flatMap(parseBackendList);
  }
  if (opts.matcher === "keyword" || opts.matcher === "llm") {
    overrides.matcher = opts.matcher;
  }
  return opts.config !== undefined
    ? loadConfig({ configPath: opts.config, overrides })
    : loadConfig({ overrides });
}

function fail(err: unknown): never {
  const relayErr = toRelayError(err);
  process.stderr.write(chalk.red(`Error: [${relayErr.code}] ${relayErr.message}\n`));
  process.exit(EXIT_CODES.ERROR);
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "JSON config file (overrides RELAY_CONFIG)")
    .option("--backend <id=url>", "Register a backend (repeatable; replaces configured backends)", collect, [])
    .option("--matcher <kind>", "Routing strategy: keyword or llm");
}

const program = new Command();

program.name("a2a-relay").description("Route queries to A2A backends and relay their streamed answers").version("0.1.0");

withCommonOptions(
  program
    .command("serve")
    .description("Run the relay HTTP server")
    .option("--port <port>", "Port")
    .option("--host <host>", "Interface to bind")
    .option("--a2a", "Also expose the relay as an A2A agent (card + JSON-RPC at /a2a)", false)
).action(async (opts: CommonOpts & { port?: string; host?: string; a2a: boolean }) => {
  const logger = createLogger();
  let config: RelayConfig;
  try {
    const extra: Partial<RelayConfigInput> = {};
    if (opts.port !== undefined) extra.port = Number(opts.port);
    if (opts.host !== undefined) extra.host = opts.host;
    config = resolveConfig(opts, extra);
  } catch (err) {
    fail(err);
  }

  const engine = createRelay(config, { logger });
  const outcomes = await engine.registry.discoverAll();
  const reachable = outcomes.filter((outcome) => outcome.ok).length;
  logger.info(`Discovered ${reachable}/${outcomes.length} backends`);

  const app = createHttpApp({ engine, logger: logger.child("http") });
  if (opts.a2a) {
    const publicUrl = config.agent.url ?? `http://${config.host}:${config.port}/a2a`;
    const host = createAgentHost({
      card: {
        name: config.agent.name,
        description: config.agent.description,
        url: publicUrl,
        version: "0.1.0",
        capabilities: { streaming: true },
        skills: [
          {
            id: "route",
            name: "Route to a specialist",
            description: "Forwards the request to the registered backend whose skills match it",
            tags: ["routing", "orchestration"]
          }
        ]
      },
      producer: engine,
      cardPath: config.cardPath,
      rpcPath: "/a2a",
      logger: logger.child("a2a")
    });
    app.route("/", host.app);
    logger.info(`A2A agent card at ${config.cardPath}, JSON-RPC at /a2a`);
  }

  const server = startHttpServer({ app, port: config.port, host: config.host, logger });
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => process.exit(EXIT_CODES.OK));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
});

withCommonOptions(
  program
    .command("ask")
    .description("Relay one query and stream the answer to stdout")
    .argument("<query>", "The query to relay")
    .option("--context <id>", "Context id grouping related tasks")
    .option("--json", "Print the final task snapshot as JSON", false)
).action(async (query: string, opts: CommonOpts & { context?: string; json: boolean }) => {
  // Quiet by default so stdout carries only the answer
  const logger = createLogger(process.env.LOG_LEVEL ? {} : { level: "warn" });
  let engine: RelayEngine;
  try {
    engine = createRelay(resolveConfig(opts), { logger });
  } catch (err) {
    fail(err);
  }

  const { taskId, channel } = engine.submit(opts.context ?? newContextId(), query);
  let cancelled = false;
  const handleSignal = (signal: string): void => {
    if (cancelled) {
      // Force exit on second signal
      process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
      process.exit(EXIT_CODES.CANCELLED);
    }
    cancelled = true;
    process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
    engine.cancel(taskId);
  };
  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));

  let exitCode: number = EXIT_CODES.ERROR;
  for await (const event of channel) {
    if (event.type === "chunk") {
      if (!opts.json) process.stdout.write(event.chunk.content);
      continue;
    }
    switch (event.state) {
      case "completed":
        if (!opts.json) process.stdout.write("\n");
        exitCode = EXIT_CODES.OK;
        break;
      case "canceled":
        process.stderr.write(chalk.yellow("Task cancelled\n"));
        exitCode = EXIT_CODES.CANCELLED;
        break;
      case "failed":
        process.stderr.write(chalk.red(`\n✗ Task failed: [${event.error.kind}] ${event.error.message}\n`));
        exitCode = EXIT_CODES.ERROR;
        break;
    }
  }

  if (opts.json) {
    process.stdout.write(JSON.stringify(engine.get(taskId), null, 2) + "\n");
  }
  process.exit(exitCode);
});

withCommonOptions(
  program
    .command("backends")
    .description("Discover every configured backend and print its health")
    .option("--json", "Output registry entries as JSON", false)
).action(async (opts: CommonOpts & { json: boolean }) => {
  const logger: Logger = createLogger({ level: "error" });
  let engine: RelayEngine;
  try {
    engine = createRelay(resolveConfig(opts), { logger });
  } catch (err) {
    fail(err);
  }

  await engine.registry.discoverAll();
  const entries = engine.registry.entries();
  if (opts.json) {
    process.stdout.write(JSON.stringify(entries, null, 2) + "\n");
    return;
  }
  if (entries.length === 0) {
    process.stderr.write(chalk.yellow("No backends configured (set RELAY_BACKENDS or pass --backend id=url)\n"));
    return;
  }

  for (const entry of entries) {
    const mark = entry.health === "healthy" ? chalk.green("✓") : chalk.red("✗");
    process.stdout.write(`${mark} ${chalk.bold(entry.id)} ${chalk.dim(entry.baseAddress)}\n`);
    if (entry.descriptor) {
      process.stdout.write(chalk.dim(`  ${entry.descriptor.displayName} v${entry.descriptor.version}\n`));
      for (const skill of entry.descriptor.skills) {
        const tags = skill.tags.length > 0 ? ` [${skill.tags.join(", ")}]` : "";
        process.stdout.write(chalk.dim(`  - ${skill.name}${tags}\n`));
      }
    }
    if (entry.lastDiscoveryError) {
      process.stdout.write(chalk.red(`  ${entry.lastDiscoveryError}\n`));
    }
  }
});

await program.parseAsync(process.argv);
