/**
 * Non-error control transfer.
 *
 * `break $label` and builtins that stop a generator early (limit, first,
 * isempty) unwind the evaluator by throwing a BreakSignal. It is not a
 * QueryExecutionError, so try/catch and `?` never intercept it; only the
 * frame that owns the token catches it.
 */

export class BreakSignal extends Error {
  readonly name = "BreakSignal";

  constructor(public readonly token: object) {
    super("break");
  }
}

/**
 * Run `body` with a fresh stop token. Returns true when `body` was cut
 * short by a signal carrying that token.
 */
export function runStoppable(body: (token: object) => void): boolean {
  const token = {};
  try {
    body(token);
    return false;
  } catch (e) {
    if (e instanceof BreakSignal && e.token === token) {
      return true;
    }
    throw e;
  }
}
