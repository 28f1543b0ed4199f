export { BackendSession } from "./backendSession.js";
export type { BackendSessionOptions, SessionContext } from "./backendSession.js";
