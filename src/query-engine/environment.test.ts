import { describe, expect, it } from "vitest";
import { createRootEnvironment, Environment } from "./environment.js";
import { ExecutionLimitError, UndefinedVariableError } from "./errors.js";
import { identity, literal } from "./program-builders.js";
import { toJson } from "./value-operations.js";

describe("Environment", () => {
  describe("variables", () => {
    it("should bind $ENV at the root", () => {
      const env = createRootEnvironment(null, {
        env: { HOME: "/home/test" },
      });
      expect(toJson(env.lookupVariable("ENV"))).toEqual({
        HOME: "/home/test",
      });
    });

    it("should resolve the nearest binding", () => {
      const outer = createRootEnvironment(null).bindVariable("x", 1);
      const inner = outer.bindVariable("x", 2);
      expect(inner.lookupVariable("x")).toBe(2);
      expect(outer.lookupVariable("x")).toBe(1);
    });

    it("should throw for unbound names", () => {
      const env = createRootEnvironment(null);
      expect(() => env.lookupVariable("missing")).toThrow(
        UndefinedVariableError,
      );
      expect(() => env.lookupVariable("missing")).toThrow(
        "$missing is not defined",
      );
    });
  });

  describe("withSubject", () => {
    it("should change the subject and keep bindings", () => {
      const env = createRootEnvironment(1).bindVariable("x", "a");
      const moved = env.withSubject([2]);
      expect(moved.subject).toEqual([2]);
      expect(env.subject).toBe(1);
      expect(moved.lookupVariable("x")).toBe("a");
    });
  });

  describe("functions", () => {
    it("should distinguish functions by arity", () => {
      const env = createRootEnvironment(null)
        .defineFunction("f", [], literal(0))
        .defineFunction("f", ["g"], literal(1));
      expect(env.lookupFunction("f", 0)?.body).toEqual(literal(0));
      expect(env.lookupFunction("f", 1)?.body).toEqual(literal(1));
      expect(env.lookupFunction("f", 2)).toBeUndefined();
    });

    it("should make a definition visible inside its own scope", () => {
      const env = createRootEnvironment(null).defineFunction(
        "loop",
        [],
        identity(),
      );
      const closure = env.lookupFunction("loop", 0);
      expect(closure?.scope.lookupFunction("loop", 0)).toBeDefined();
    });

    it("should not see definitions made after the closure", () => {
      const env = createRootEnvironment(null).defineFunction(
        "f",
        [],
        identity(),
      );
      const later = env.defineFunction("g", [], identity());
      const closure = later.lookupFunction("f", 0);
      expect(closure?.scope.lookupFunction("g", 0)).toBeUndefined();
    });

    it("should run filter arguments in the given scope", () => {
      const caller = createRootEnvironment(null).bindVariable("y", 5);
      const callee = createRootEnvironment(null).bindFilterArgument(
        "f",
        identity(),
        caller,
      );
      expect(callee.lookupFunction("f", 0)?.scope).toBe(caller);
    });
  });

  describe("labels", () => {
    it("should give each activation its own token", () => {
      const root = createRootEnvironment(null);
      const first = root.bindLabel("out");
      const second = first.env.bindLabel("out");
      expect(second.token).not.toBe(first.token);
      expect(second.env.lookupLabel("out")).toBe(second.token);
      expect(first.env.lookupLabel("out")).toBe(first.token);
      expect(root.lookupLabel("out")).toBeUndefined();
    });
  });

  describe("enterCall", () => {
    it("should track depth and enforce maxCallDepth", () => {
      const env = createRootEnvironment(null, { limits: { maxCallDepth: 2 } });
      const one = env.enterCall("a", env.callDepth);
      const two = one.enterCall("b", one.callDepth);
      expect(two.callDepth).toBe(2);
      expect(two.subject).toBe("b");
      expect(() => two.enterCall("c", two.callDepth)).toThrow(
        ExecutionLimitError,
      );
      expect(() => two.enterCall("c", two.callDepth)).toThrow(
        "maximum call depth (2) exceeded",
      );
    });
  });

  describe("detached", () => {
    it("should drop every binding", () => {
      const env = Environment.root(7).bindVariable("x", 1);
      const detached = env.detached();
      expect(detached.subject).toBe(7);
      expect(() => detached.lookupVariable("x")).toThrow(
        UndefinedVariableError,
      );
      expect(() => detached.lookupVariable("ENV")).toThrow(
        UndefinedVariableError,
      );
    });
  });
});
