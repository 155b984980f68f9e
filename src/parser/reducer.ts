import { traceLog } from "../shared/index.js";
import { formatToken } from "./format.js";
import { assembleLiteral, isLiteralChar } from "./literal.js";
import { isOperatorSymbol, shouldFlush } from "./precedence.js";
import {
  ExpressionError,
  InvalidCharacterError,
  UnclosedParenError,
  type OperatorSymbol,
  type RpnToken,
} from "./types.js";

type CharClass =
  | { kind: "literal" }
  | { kind: "open" }
  | { kind: "close" }
  | { kind: "sign" }
  | { kind: "operator"; symbol: OperatorSymbol }
  | { kind: "other" };

interface StackEntry {
  symbol: OperatorSymbol | "(";
  pos: number;
}

interface ReducerState {
  digitBuffer: string[];
  literalStart: number;
  operatorStack: StackEntry[];
  output: RpnToken[];
  expectsOperand: boolean;
}

function classify(ch: string, state: ReducerState): CharClass {
  const midLiteral = state.digitBuffer.length > 0;

  if (isLiteralChar(ch)) return { kind: "literal" };
  // "2(" is not implicit multiplication
  if (ch === "(") return midLiteral ? { kind: "other" } : { kind: "open" };
  if (ch === ")") return { kind: "close" };
  if ((ch === "+" || ch === "-") && !midLiteral && state.expectsOperand) return { kind: "sign" };
  if (isOperatorSymbol(ch)) return { kind: "operator", symbol: ch };
  return { kind: "other" };
}

function emit(state: ReducerState, token: RpnToken): void {
  state.output.push(token);
  traceLog("EMIT", formatToken(token), { size: state.output.length });
}

function flushLiteral(state: ReducerState): void {
  const literal = assembleLiteral(state.digitBuffer, state.literalStart);
  state.digitBuffer = [];
  if (literal) emit(state, literal);
}

function peek(state: ReducerState): StackEntry | undefined {
  return state.operatorStack[state.operatorStack.length - 1];
}

function pop(state: ReducerState): StackEntry | undefined {
  const entry = state.operatorStack.pop();
  if (entry) traceLog("STACK", `pop ${entry.symbol}`, { depth: state.operatorStack.length });
  return entry;
}

function push(state: ReducerState, entry: StackEntry): void {
  state.operatorStack.push(entry);
  traceLog("STACK", `push ${entry.symbol}`, { depth: state.operatorStack.length });
}

function closeGroup(state: ReducerState): void {
  flushLiteral(state);
  for (let entry = pop(state); entry && entry.symbol !== "("; entry = pop(state)) {
    emit(state, { type: "OPERATOR", value: entry.symbol });
  }
}

function pushBinary(state: ReducerState, symbol: OperatorSymbol, pos: number): void {
  flushLiteral(state);

  // a "(" on top stops the flush
  for (let top = peek(state); top && top.symbol !== "(" && shouldFlush(symbol, top.symbol); top = peek(state)) {
    pop(state);
    emit(state, { type: "OPERATOR", value: top.symbol });
  }

  push(state, { symbol, pos });
  state.expectsOperand = true;
}

function step(state: ReducerState, chars: readonly string[], pos: number): void {
  const ch = chars[pos] ?? "";
  const cls = classify(ch, state);
  traceLog("CHAR", ch, { pos, class: cls.kind, expectsOperand: state.expectsOperand });

  switch (cls.kind) {
    case "literal":
    case "sign":
      if (state.digitBuffer.length === 0) state.literalStart = pos;
      state.digitBuffer.push(ch);
      state.expectsOperand = false;
      return;

    case "open":
      push(state, { symbol: "(", pos });
      state.expectsOperand = true;
      return;

    case "close":
      closeGroup(state);
      return;

    case "operator":
      pushBinary(state, cls.symbol, pos);
      return;

    case "other":
      throw new InvalidCharacterError(ch, pos, chars.slice(pos).join(""));
  }
}

function finalize(state: ReducerState): RpnToken[] {
  flushLiteral(state);

  for (let entry = pop(state); entry; entry = pop(state)) {
    if (entry.symbol === "(") throw new UnclosedParenError(entry.pos);
    emit(state, { type: "OPERATOR", value: entry.symbol });
  }

  return state.output;
}

/**
 * Shunting-yard pass over an expression that has already been stripped of
 * whitespace. Positions in errors count characters of the normalized string.
 */
export function reduce(normalized: string): RpnToken[] {
  const state: ReducerState = {
    digitBuffer: [],
    literalStart: 0,
    operatorStack: [],
    output: [],
    expectsOperand: true,
  };
  const chars = Array.from(normalized);

  try {
    for (let pos = 0; pos < chars.length; pos++) {
      step(state, chars, pos);
    }
    return finalize(state);
  } catch (err) {
    if (err instanceof ExpressionError) {
      traceLog("ERROR", err.message, { code: err.code, pos: err.pos });
    }
    throw err;
  }
}
