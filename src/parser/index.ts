import { build } from "./ast-builder.js";
import { normalize } from "./normalizer.js";
import { reduce } from "./reducer.js";
import { ExpressionError, type Ast, type ParseResult, type RpnToken } from "./types.js";

export { build } from "./ast-builder.js";
export { normalize } from "./normalizer.js";
export { reduce } from "./reducer.js";
export { assembleLiteral } from "./literal.js";
export { OPERATOR_RULES, compareOperators, isOperatorSymbol, type OperatorRule, type Comparison } from "./precedence.js";
export { formatAst, formatLiteral, formatRpn, formatToken } from "./format.js";
export * from "./types.js";

/** Converts an infix expression to reverse-polish notation. */
export function toRpn(expression: string): RpnToken[] {
  return reduce(normalize(expression));
}

/** Converts an infix expression to a binary syntax tree; `""` gives `{ kind: "empty" }`. */
export function toAst(expression: string): Ast {
  return build(toRpn(expression));
}

function attempt<T>(run: () => T): ParseResult<T> {
  try {
    return { ok: true, value: run() };
  } catch (err) {
    if (err instanceof ExpressionError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function tryToRpn(expression: string): ParseResult<RpnToken[]> {
  return attempt(() => toRpn(expression));
}

export function tryToAst(expression: string): ParseResult<Ast> {
  return attempt(() => toAst(expression));
}
