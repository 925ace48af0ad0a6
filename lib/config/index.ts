import { readFileSync } from "fs";
import { resolve } from "path";
import { parse } from "yaml";
import stringWidth from "string-width";

export interface Settings {
  /** Initial delay between ticks. */
  tickIntervalMs: number;
  /** How much one speed key changes the delay. */
  intervalStepMs: number;
  /** Columns reserved for the status panel. */
  statusWidth: number;
  aliveGlyph: string;
  deadGlyph: string;
  /** Hex color for live cells. */
  aliveColor: string;
}

/** Keys of the on-disk file (snake_case, every key optional). */
type ConfigKey =
  | "tick_interval_ms"
  | "interval_step_ms"
  | "status_width"
  | "alive_glyph"
  | "dead_glyph"
  | "alive_color";

type RawConfig = Map<string, unknown>;

export const DEFAULT_SETTINGS: Settings = {
  tickIntervalMs: 500,
  intervalStepMs: 50,
  statusWidth: 10,
  aliveGlyph: "X",
  deadGlyph: " ",
  aliveColor: "#7ee787",
};

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function expandHome(p: string, home: string): string {
  if (p.startsWith("~/")) return resolve(home, p.slice(2));
  return p;
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? "";
  return expandHome(
    env.LIFETERM_CONFIG ?? resolve(home, ".lifeterm", "config.yml"),
    home,
  );
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function readNumber(
  raw: RawConfig,
  key: ConfigKey,
  fallback: number,
  source: string,
  opts: { min: number; integer?: boolean },
): number {
  const value = raw.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number in ${source}`, source);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer in ${source}`, source);
  }
  if (value < opts.min) {
    throw new ConfigError(`${key} must be at least ${opts.min} in ${source}`, source);
  }
  return value;
}

function readGlyph(
  raw: RawConfig,
  key: ConfigKey,
  fallback: string,
  source: string,
): string {
  const value = raw.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string" || stringWidth(value) !== 1) {
    throw new ConfigError(`${key} must be a single-column character in ${source}`, source);
  }
  return value;
}

function readColor(
  raw: RawConfig,
  key: ConfigKey,
  fallback: string,
  source: string,
): string {
  const value = raw.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string" || !/^#[0-9a-fA-F]{6}$/.test(value)) {
    throw new ConfigError(`${key} must be a #rrggbb color in ${source}`, source);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a parsed config document. `null`/`undefined` (an empty file)
 * means all defaults; unknown keys are ignored.
 */
export function parseSettings(doc: unknown, source: string): Settings {
  if (doc === null || doc === undefined) return { ...DEFAULT_SETTINGS };
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`Config in ${source} must be a mapping`, source);
  }
  const raw: RawConfig = new Map<string, unknown>(Object.entries(doc));

  return {
    tickIntervalMs: readNumber(raw, "tick_interval_ms", DEFAULT_SETTINGS.tickIntervalMs, source, { min: 0 }),
    intervalStepMs: readNumber(raw, "interval_step_ms", DEFAULT_SETTINGS.intervalStepMs, source, { min: 1 }),
    statusWidth: readNumber(raw, "status_width", DEFAULT_SETTINGS.statusWidth, source, { min: 1, integer: true }),
    aliveGlyph: readGlyph(raw, "alive_glyph", DEFAULT_SETTINGS.aliveGlyph, source),
    deadGlyph: readGlyph(raw, "dead_glyph", DEFAULT_SETTINGS.deadGlyph, source),
    aliveColor: readColor(raw, "alive_color", DEFAULT_SETTINGS.aliveColor, source),
  };
}

/**
 * Load settings from `$LIFETERM_CONFIG` or `~/.lifeterm/config.yml`.
 *
 * A missing file means defaults. Anything else that goes wrong (unreadable
 * file, YAML syntax error, bad value) throws a ConfigError.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const path = configPath(env);

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === "ENOENT") {
      console.debug(`[config] No config file at ${path}, using defaults`);
      return { ...DEFAULT_SETTINGS };
    }
    if (error.code === "EACCES") {
      throw new ConfigError(`Permission denied reading config file at ${path}`, path);
    }
    throw new ConfigError(`Failed to read config file at ${path}: ${error.message}`, path);
  }

  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config at ${path}: ${message}`, path);
  }
  return parseSettings(doc, path);
}
