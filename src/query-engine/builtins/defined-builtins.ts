/**
 * Builtins written as filters. They are called exactly like user
 * definitions, so recursion in them counts against maxCallDepth.
 */

import {
  array,
  call,
  comma,
  cond,
  def,
  empty,
  identity,
  iterate,
  optional,
  pipe,
} from "../program-builders.js";
import type { BuiltinSpec } from "./types.js";

export const definedBuiltins: readonly BuiltinSpec[] = [
  {
    // def select(f): if f then . else empty end;
    kind: "defined",
    name: "select",
    params: ["f"],
    body: cond(call("f"), identity(), empty()),
  },
  {
    // def map(f): [.[] | f];
    kind: "defined",
    name: "map",
    params: ["f"],
    body: array(pipe(iterate(), call("f"))),
  },
  {
    // def recurse(f): def r: ., (f | r); r;
    kind: "defined",
    name: "recurse",
    params: ["f"],
    body: def(
      "r",
      [],
      comma(identity(), pipe(call("f"), call("r"))),
      call("r"),
    ),
  },
  {
    // def recurse: recurse(.[]?);
    kind: "defined",
    name: "recurse",
    params: [],
    body: call("recurse", optional(iterate())),
  },
];
