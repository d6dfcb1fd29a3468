/**
 * Evaluation Environment
 *
 * A persistent chain of scopes. Each node carries the current subject and
 * at most one binding (a variable, a function closure or a label); lookups
 * walk towards the root and the nearest binding wins. Creating a child is
 * O(1) and never copies or mutates the parent.
 */

import { ExecutionLimitError, UndefinedVariableError } from "./errors.js";
import {
  type EngineContext,
  type EngineOptions,
  resolveEngineOptions,
} from "./options.js";
import type { ProgramNode } from "./program-types.js";
import type { QueryValue } from "./values.js";

/**
 * A function body paired with the scope it was defined in.
 */
export interface Closure {
  readonly params: readonly string[];
  readonly body: ProgramNode;
  readonly scope: Environment;
}

/**
 * Identity of one `label $name` activation. Two activations of the same
 * label name never share a token.
 */
export interface LabelToken {
  readonly name: string;
}

type Binding =
  | {
      readonly kind: "variable";
      readonly name: string;
      readonly value: QueryValue;
    }
  | {
      readonly kind: "function";
      readonly key: string;
      readonly params: readonly string[];
      readonly body: ProgramNode;
      /** Absent for `def`: the closure scope is the defining node itself */
      readonly scope?: Environment;
    }
  | {
      readonly kind: "label";
      readonly name: string;
      readonly token: LabelToken;
    };

export function functionKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}

export class Environment {
  private constructor(
    /** The value the current filter is applied to */
    readonly subject: QueryValue,
    readonly context: EngineContext,
    private readonly binding: Binding | undefined,
    private readonly parent: Environment | undefined,
    /** Number of user-defined function calls on the current path */
    readonly callDepth: number,
  ) {}

  /**
   * Root environment for one input document. `$ENV` is bound to the
   * configured environment map.
   */
  static root(subject: QueryValue, options?: EngineOptions): Environment {
    const context = resolveEngineOptions(options);
    const envObject = new Map<string, QueryValue>(Object.entries(context.env));
    return new Environment(
      subject,
      context,
      undefined,
      undefined,
      0,
    ).bindVariable("ENV", envObject);
  }

  /**
   * Same bindings, new subject. The child shares this node's scope chain
   * rather than pointing at this node, so changing subjects never makes
   * lookups longer.
   */
  withSubject(value: QueryValue): Environment {
    return new Environment(
      value,
      this.context,
      this.binding,
      this.parent,
      this.callDepth,
    );
  }

  bindVariable(name: string, value: QueryValue): Environment {
    return this.child({ kind: "variable", name, value });
  }

  /**
   * Nearest binding of `$name`.
   */
  lookupVariable(name: string): QueryValue {
    for (let env: Environment | undefined = this; env; env = env.parent) {
      const b = env.binding;
      if (b?.kind === "variable" && b.name === name) {
        return b.value;
      }
    }
    throw new UndefinedVariableError(name);
  }

  /**
   * Register `def name(params): body`. The body resolves free names in the
   * returned environment, which also makes the function visible to itself.
   */
  defineFunction(
    name: string,
    params: readonly string[],
    body: ProgramNode,
  ): Environment {
    return this.child({
      kind: "function",
      key: functionKey(name, params.length),
      params,
      body,
    });
  }

  /**
   * Bind `name/0` to a filter argument that runs in `scope` (the caller's
   * environment) whenever it is invoked.
   */
  bindFilterArgument(
    name: string,
    body: ProgramNode,
    scope: Environment,
  ): Environment {
    return this.child({
      kind: "function",
      key: functionKey(name, 0),
      params: [],
      body,
      scope,
    });
  }

  lookupFunction(name: string, arity: number): Closure | undefined {
    const key = functionKey(name, arity);
    for (let env: Environment | undefined = this; env; env = env.parent) {
      const b = env.binding;
      if (b?.kind === "function" && b.key === key) {
        return { params: b.params, body: b.body, scope: b.scope ?? env };
      }
    }
    return undefined;
  }

  bindLabel(name: string): { env: Environment; token: LabelToken } {
    const token: LabelToken = { name };
    return { env: this.child({ kind: "label", name, token }), token };
  }

  lookupLabel(name: string): LabelToken | undefined {
    for (let env: Environment | undefined = this; env; env = env.parent) {
      const b = env.binding;
      if (b?.kind === "label" && b.name === name) {
        return b.token;
      }
    }
    return undefined;
  }

  /**
   * The environment a function body runs in: this (closure) scope with
   * the caller's subject and one more level of call depth.
   */
  enterCall(subject: QueryValue, callerDepth: number): Environment {
    const depth = callerDepth + 1;
    if (depth > this.context.limits.maxCallDepth) {
      throw new ExecutionLimitError(
        "maxCallDepth",
        this.context.limits.maxCallDepth,
      );
    }
    return new Environment(
      subject,
      this.context,
      this.binding,
      this.parent,
      depth,
    );
  }

  /**
   * Same subject, context and call depth, with no bindings at all. Scope
   * of the builtins written as filters, so user definitions cannot leak
   * into them.
   */
  detached(): Environment {
    return new Environment(
      this.subject,
      this.context,
      undefined,
      undefined,
      this.callDepth,
    );
  }

  private child(binding: Binding): Environment {
    return new Environment(
      this.subject,
      this.context,
      binding,
      this,
      this.callDepth,
    );
  }
}

/**
 * Build the root environment for one decoded document.
 */
export function createRootEnvironment(
  value: QueryValue,
  options?: EngineOptions,
): Environment {
  return Environment.root(value, options);
}
