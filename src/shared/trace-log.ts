/**
 * Step tracer for the expression parser.
 *
 * Every line prints a bright blue [PARSE] prefix so you can filter with:
 *   grep "\[PARSE\]"
 *
 * Categories:
 *   CHAR   — each character the reducer consumes
 *   STACK  — operator pushes and pops
 *   EMIT   — tokens appended to the RPN output
 *   AST    — nodes built from RPN
 *   ERROR  — the failure that aborted a conversion
 *
 * Silent unless SHUNTING_YARD_TRACE is enabled.
 */

import { getParserConfig } from "../config/parser-config.js";

const R = "\x1b[0m";
const BLUE = "\x1b[34m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const GREEN = "\x1b[32m";
const MAGENTA = "\x1b[35m";
const RED = "\x1b[31m";

export type TraceCategory = "CHAR" | "STACK" | "EMIT" | "AST" | "ERROR";

const CATEGORY_COLORS: Record<TraceCategory, string> = {
  CHAR: CYAN,
  STACK: YELLOW,
  EMIT: GREEN,
  AST: MAGENTA,
  ERROR: RED,
};

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${R}`;
  if (typeof v === "string") return `"${v}"`;
  if (typeof v === "number" || typeof v === "boolean" || typeof v === "bigint") return String(v);
  return JSON.stringify(v);
}

export function isTraceEnabled(): boolean {
  return getParserConfig().trace;
}

export function traceLog(category: TraceCategory, message: string, detail?: Record<string, unknown>): void {
  if (!isTraceEnabled()) return;

  const prefix = `${BLUE}${BOLD}[PARSE]${R}`;
  const cat = `${CATEGORY_COLORS[category]}${category.padEnd(5)}${R}`;
  const time = `${DIM}${ts()}${R}`;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${R}${formatValue(v)}`)
      .join(" ");
    console.log(`${prefix} ${time} ${cat} ${message}  ${parts}`);
  } else {
    console.log(`${prefix} ${time} ${cat} ${message}`);
  }
}
