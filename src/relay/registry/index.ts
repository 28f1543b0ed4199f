export { BackendRegistry, descriptorFromCard } from "./backendRegistry.js";
export type { BackendRegistryOptions } from "./backendRegistry.js";
export type {
  BackendDescriptor,
  BackendEntry,
  BackendHealth,
  BackendSkill,
  DiscoveryOutcome,
  FetchLike
} from "./types.js";
