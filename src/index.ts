export { RelayEngine, newContextId } from "./relay/relayEngine.js";
export type { RelayEngineOptions, Submission } from "./relay/relayEngine.js";
export { createRelay } from "./relay/createRelay.js";
export type { CreateRelayOptions } from "./relay/createRelay.js";
export { TaskChannel, collect } from "./relay/channel.js";
export type { TaskChannelOptions, CloseOptions } from "./relay/channel.js";
export { chunk } from "./relay/types.js";
export type { Chunk, ChannelEvent, CloseEvent, SourceContext } from "./relay/types.js";

export { RelayError, isRelayError, toRelayError, toFailureReason, DELEGATION_FAILURES } from "./relay/errors.js";
export type { RelayErrorCode, FailureReason } from "./relay/errors.js";
export { createLogger, silentLogger, parseLogLevel } from "./relay/log.js";
export type { Logger, LogLevel, LogFields } from "./relay/log.js";
export { loadConfig, parseBackendList, RelayConfigSchema } from "./relay/config.js";
export type { RelayConfig, RelayConfigInput, BackendConfig, LoadConfigOptions } from "./relay/config.js";

export * from "./relay/registry/index.js";
export * from "./relay/matcher/index.js";
export * from "./relay/session/index.js";
export * from "./relay/tasks/index.js";
export * from "./relay/local/index.js";
export * from "./relay/llm/index.js";
export { ConcurrencyLimiter } from "./relay/utils/concurrencyLimiter.js";
export type { ConcurrencyLimiterOptions } from "./relay/utils/concurrencyLimiter.js";

export { createHttpApp, startHttpServer } from "./server/http.js";
export type { HttpAppOptions, StartServerOptions } from "./server/http.js";
export { createAgentHost } from "./server/agentHost.js";
export type { AgentHost, AgentHostOptions, AgentProducer } from "./server/agentHost.js";
