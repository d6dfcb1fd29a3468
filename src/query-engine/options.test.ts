import { describe, expect, it } from "vitest";
import { ConfigurationError, resolveEngineOptions } from "./options.js";

describe("resolveEngineOptions", () => {
  it("should fill in default limits", () => {
    const context = resolveEngineOptions();
    expect(context.limits).toEqual({ maxCallDepth: 500, maxIterations: 100000 });
    expect(context.env).toEqual({});
    expect(context.logger).toBeUndefined();
  });

  it("should keep user limits and defaults side by side", () => {
    const context = resolveEngineOptions({ limits: { maxIterations: 10 } });
    expect(context.limits).toEqual({ maxCallDepth: 500, maxIterations: 10 });
  });

  it("should pass the logger through", () => {
    const logger = { info: () => {}, debug: () => {} };
    expect(resolveEngineOptions({ logger }).logger).toBe(logger);
  });

  it("should reject non-positive limits", () => {
    expect(() => resolveEngineOptions({ limits: { maxCallDepth: 0 } })).toThrow(
      ConfigurationError,
    );
    try {
      resolveEngineOptions({ limits: { maxCallDepth: 1.5 } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.issues).toEqual([
          "limits.maxCallDepth: Expected integer, received float",
        ]);
      }
    }
  });
});
