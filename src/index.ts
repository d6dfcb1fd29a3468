export type { QueryExecutionLimits } from "./limits.js";
export { resolveLimits } from "./limits.js";
export * from "./query-engine/index.js";
