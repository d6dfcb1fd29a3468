/**
 * Engine options: execution limits, the logger and the `$ENV` map.
 */

import { z } from "zod";
import { type QueryExecutionLimits, resolveLimits } from "../limits.js";

/**
 * Logger interface for engine tracing.
 * Implement this interface to receive evaluation logs.
 */
export interface QueryLogger {
  /** Log informational messages (escaped errors, `stderr` output) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (program start, recovered errors, `debug` output) */
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface EngineOptions {
  /**
   * Execution limits to prevent runaway filters.
   * See QueryExecutionLimits for available options.
   */
  limits?: QueryExecutionLimits;
  /** Variables exposed to filters as `$ENV` and `env` */
  env?: Record<string, string>;
  /** Optional logger for evaluation tracing */
  logger?: QueryLogger;
}

/**
 * Options after validation, shared by every environment of one run.
 */
export interface EngineContext {
  readonly limits: Required<QueryExecutionLimits>;
  readonly env: Readonly<Record<string, string>>;
  readonly logger?: QueryLogger;
}

const positiveInt = z.number().int().positive();

export const engineOptionsSchema = z.object({
  limits: z
    .object({
      maxCallDepth: positiveInt.optional(),
      maxIterations: positiveInt.optional(),
    })
    .strict()
    .optional(),
  env: z.record(z.string()).optional(),
});

/**
 * Thrown when engine options fail validation.
 */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";

  constructor(public readonly issues: string[]) {
    super(`Invalid engine options: ${issues.join("; ")}`);
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}

/**
 * Validate options and fill in defaults.
 */
export function resolveEngineOptions(options?: EngineOptions): EngineContext {
  const parsed = engineOptionsSchema.safeParse({
    limits: options?.limits,
    env: options?.env,
  });
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return {
    limits: resolveLimits(parsed.data.limits),
    env: parsed.data.env ?? {},
    logger: options?.logger,
  };
}
