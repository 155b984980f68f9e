// ── Types ──────────────────────────────────────────────────────────

export interface ParserConfig {
  /** Print every reducer and builder step through the trace logger. */
  trace: boolean;
}

// ── Defaults ───────────────────────────────────────────────────────

const DEFAULT_CONFIG: ParserConfig = {
  trace: false,
};

// ── Singleton state ────────────────────────────────────────────────

let currentConfig: ParserConfig = loadParserConfig();

// ── Env-var parsing helpers ────────────────────────────────────────

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  return fallback;
}

// ── Public API ─────────────────────────────────────────────────────

export function loadParserConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  return {
    trace: parseBool(env["SHUNTING_YARD_TRACE"], DEFAULT_CONFIG.trace),
  };
}

export function getParserConfig(): ParserConfig {
  return currentConfig;
}

export function _setConfigForTesting(config: Partial<ParserConfig>): void {
  currentConfig = { ...DEFAULT_CONFIG, ...config };
}

export function _resetConfigToDefault(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}
