import type { Associativity, OperatorSymbol } from "./types.js";

export interface OperatorRule {
  precedence: number;
  assoc: Associativity;
}

export const OPERATOR_RULES: Readonly<Record<OperatorSymbol, OperatorRule>> = {
  ",": { precedence: 0, assoc: "left" },
  "+": { precedence: 1, assoc: "left" },
  "-": { precedence: 1, assoc: "left" },
  "*": { precedence: 2, assoc: "left" },
  "/": { precedence: 2, assoc: "left" },
  "^": { precedence: 2, assoc: "right" },
  "d": { precedence: 3, assoc: "left" },
  "%": { precedence: 3, assoc: "left" },
};

export type PrecedenceOrder = "higher" | "equal" | "lower";

export interface Comparison {
  order: PrecedenceOrder;
  assoc: Associativity;
}

export function isOperatorSymbol(ch: string): ch is OperatorSymbol {
  return Object.prototype.hasOwnProperty.call(OPERATOR_RULES, ch);
}

/**
 * Compares an incoming operator against the top of the operator stack.
 *
 * The returned associativity is always the incoming operator's; the caller uses
 * it to break ties. A `(` on the stack compares lower than everything, so the
 * incoming operator is always `higher` against it.
 */
export function compareOperators(incoming: OperatorSymbol, top: OperatorSymbol | "("): Comparison {
  const rule = OPERATOR_RULES[incoming];
  if (top === "(") {
    return { order: "higher", assoc: rule.assoc };
  }

  const other = OPERATOR_RULES[top].precedence;
  let order: PrecedenceOrder = "equal";
  if (rule.precedence > other) order = "higher";
  else if (rule.precedence < other) order = "lower";

  return { order, assoc: rule.assoc };
}

/** True when `top` has to be popped before `incoming` is pushed. */
export function shouldFlush(incoming: OperatorSymbol, top: OperatorSymbol | "("): boolean {
  const { order, assoc } = compareOperators(incoming, top);
  return order === "lower" || (order === "equal" && assoc === "left");
}
