import { Decimal } from "decimal.js";
import { InvalidNumberError, type NumberLiteral } from "./types.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.\d*|\.\d+)$/;

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isLiteralChar(ch: string): boolean {
  return isDigit(ch) || ch === ".";
}

/**
 * Turns the characters collected for one literal into a number.
 * Returns `undefined` for an empty buffer; `pos` is where the literal started.
 */
export function assembleLiteral(chars: readonly string[], pos: number): NumberLiteral | undefined {
  if (chars.length === 0) return undefined;

  const text = chars.join("");
  const unsigned = text.startsWith("+") ? text.slice(1) : text;

  if (text.includes(".")) {
    if (!DECIMAL_PATTERN.test(text)) {
      throw new InvalidNumberError(text, pos);
    }
    return { type: "DECIMAL", value: new Decimal(unsigned) };
  }

  if (!INTEGER_PATTERN.test(text)) {
    throw new InvalidNumberError(text, pos);
  }
  return { type: "INTEGER", value: BigInt(unsigned) };
}
