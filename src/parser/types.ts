import type { Decimal } from "decimal.js";

export type OperatorSymbol = "," | "+" | "-" | "*" | "/" | "^" | "d" | "%";

export type Associativity = "left" | "right";

export type NumberLiteral =
  | { type: "INTEGER"; value: bigint }
  | { type: "DECIMAL"; value: Decimal };

export type RpnToken = NumberLiteral | { type: "OPERATOR"; value: OperatorSymbol };

export type AstNode =
  | { kind: "number"; value: NumberLiteral }
  | { kind: "binary"; op: OperatorSymbol; left: AstNode; right: AstNode };

export type Ast = AstNode | { kind: "empty" };

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ExpressionError };

export type ExpressionErrorCode =
  | "INVALID_CHARACTER"
  | "INVALID_NUMBER"
  | "UNCLOSED_PAREN"
  | "MALFORMED_RPN";

export class ExpressionError extends Error {
  constructor(
    message: string,
    public pos: number,
    public code: ExpressionErrorCode,
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

export class InvalidCharacterError extends ExpressionError {
  constructor(
    public char: string,
    pos: number,
    public remainder: string,
  ) {
    super(`Unexpected character '${char}' at ${pos} (in "${remainder}")`, pos, "INVALID_CHARACTER");
    this.name = "InvalidCharacterError";
  }
}

export class InvalidNumberError extends ExpressionError {
  constructor(
    public literal: string,
    pos: number,
  ) {
    super(`Invalid number literal '${literal}' at ${pos}`, pos, "INVALID_NUMBER");
    this.name = "InvalidNumberError";
  }
}

export class UnclosedParenError extends ExpressionError {
  constructor(pos: number) {
    super(`Unclosed '(' at ${pos}`, pos, "UNCLOSED_PAREN");
    this.name = "UnclosedParenError";
  }
}

/** `pos` is the index of the offending token in the RPN sequence. */
export class MalformedRpnError extends ExpressionError {
  constructor(message: string, pos: number) {
    super(message, pos, "MALFORMED_RPN");
    this.name = "MalformedRpnError";
  }
}
