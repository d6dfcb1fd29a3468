/**
 * Execution Limits Configuration
 *
 * Centralized configuration for the limits that stop runaway filters.
 * These limits can be overridden per root environment.
 */

/**
 * Configuration for execution limits.
 * All limits are optional - undefined values use defaults.
 */
export interface QueryExecutionLimits {
  /**
   * Maximum nesting of function calls, filter arguments and builtins
   * written as filters included (default: 500)
   */
  maxCallDepth?: number;

  /** Maximum numbers a single `range` may generate (default: 100000) */
  maxIterations?: number;
}

/**
 * Default execution limits.
 * A native stack overflow during a run is reported against maxCallDepth.
 */
const DEFAULT_LIMITS: Required<QueryExecutionLimits> = {
  maxCallDepth: 500,
  maxIterations: 100000,
};

/**
 * Resolve execution limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: QueryExecutionLimits,
): Required<QueryExecutionLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxCallDepth: userLimits.maxCallDepth ?? DEFAULT_LIMITS.maxCallDepth,
    maxIterations: userLimits.maxIterations ?? DEFAULT_LIMITS.maxIterations,
  };
}
