import { describe, expect, it } from "vitest";
import { normalize } from "../../src/parser/normalizer.js";

describe("normalizer", () => {
  it("removes spaces", () => {
    expect(normalize(" 1 + 2 ")).toBe("1+2");
  });

  it("removes tabs and newlines", () => {
    expect(normalize("\t(1 +\n2)\r\n* 3")).toBe("(1+2)*3");
  });

  it("leaves other characters alone", () => {
    expect(normalize("1d6%x")).toBe("1d6%x");
  });

  it("returns an empty string for whitespace-only input", () => {
    expect(normalize("   \t ")).toBe("");
  });
});
