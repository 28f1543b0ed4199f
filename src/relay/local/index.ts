export { StaticReplyHandler, CapabilityListingHandler, NO_BACKENDS_REPLY, describeBackend } from "./handlers.js";
export type { LocalHandler, SnapshotSource } from "./handlers.js";
