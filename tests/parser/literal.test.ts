import { describe, expect, it } from "vitest";
import { assembleLiteral, isLiteralChar } from "../../src/parser/literal.js";
import { formatLiteral } from "../../src/parser/format.js";
import { InvalidNumberError } from "../../src/parser/types.js";

function chars(text: string): string[] {
  return text.split("");
}

describe("isLiteralChar", () => {
  it("accepts digits and the decimal point", () => {
    expect(isLiteralChar("0")).toBe(true);
    expect(isLiteralChar("9")).toBe(true);
    expect(isLiteralChar(".")).toBe(true);
  });

  it("rejects signs and letters", () => {
    expect(isLiteralChar("-")).toBe(false);
    expect(isLiteralChar("d")).toBe(false);
  });
});

describe("assembleLiteral", () => {
  it("returns undefined for an empty buffer", () => {
    expect(assembleLiteral([], 0)).toBeUndefined();
  });

  it("assembles integers as bigint", () => {
    expect(assembleLiteral(chars("42"), 0)).toEqual({ type: "INTEGER", value: 42n });
  });

  it("keeps integers beyond the safe number range exact", () => {
    expect(assembleLiteral(chars("123456789012345678901234567890"), 0)).toEqual({
      type: "INTEGER",
      value: 123456789012345678901234567890n,
    });
  });

  it("applies a leading sign", () => {
    expect(assembleLiteral(chars("-7"), 0)).toEqual({ type: "INTEGER", value: -7n });
    expect(assembleLiteral(chars("+7"), 0)).toEqual({ type: "INTEGER", value: 7n });
  });

  it("assembles literals with a point as decimals", () => {
    const literal = assembleLiteral(chars("3.4"), 0);
    expect(literal?.type).toBe("DECIMAL");
    expect(literal && formatLiteral(literal)).toBe("3.4");
  });

  it("keeps a whole-valued decimal a decimal", () => {
    const literal = assembleLiteral(chars("2.0"), 0);
    expect(literal?.type).toBe("DECIMAL");
    expect(literal && formatLiteral(literal)).toBe("2.0");
  });

  it("accepts a missing integer or fraction part", () => {
    const leading = assembleLiteral(chars(".5"), 0);
    const trailing = assembleLiteral(chars("-5."), 0);
    expect(leading && formatLiteral(leading)).toBe("0.5");
    expect(trailing && formatLiteral(trailing)).toBe("-5.0");
  });

  it("rejects more than one decimal point", () => {
    expect(() => assembleLiteral(chars("1.2.3"), 4)).toThrow(InvalidNumberError);
    try {
      assembleLiteral(chars("1.2.3"), 4);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidNumberError);
      if (err instanceof InvalidNumberError) {
        expect(err.literal).toBe("1.2.3");
        expect(err.pos).toBe(4);
        expect(err.code).toBe("INVALID_NUMBER");
      }
    }
  });

  it("rejects a bare sign or a lone point", () => {
    expect(() => assembleLiteral(["-"], 0)).toThrow("Invalid number literal '-' at 0");
    expect(() => assembleLiteral(["+", "."], 2)).toThrow("Invalid number literal '+.' at 2");
  });
});
