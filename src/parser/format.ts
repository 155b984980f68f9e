import type { Ast, NumberLiteral, RpnToken } from "./types.js";

export function formatLiteral(literal: NumberLiteral): string {
  if (literal.type === "INTEGER") return literal.value.toString(10);
  // Keep the point so `1.0` never reads like the integer `1`.
  return literal.value.isInteger() ? literal.value.toFixed(1) : literal.value.toFixed();
}

export function formatToken(token: RpnToken): string {
  return token.type === "OPERATOR" ? token.value : formatLiteral(token);
}

export function formatRpn(tokens: readonly RpnToken[]): string {
  return tokens.map(formatToken).join(" ");
}

export function formatAst(ast: Ast): string {
  switch (ast.kind) {
    case "empty":
      return "";
    case "number":
      return formatLiteral(ast.value);
    case "binary":
      return `(${formatAst(ast.left)} ${ast.op} ${formatAst(ast.right)})`;
  }
}
