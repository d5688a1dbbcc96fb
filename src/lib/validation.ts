import type { NextRequest } from "next/server";
import {
  DEFAULT_COURT_THEME,
  isCourtBackgroundPattern,
  parseHexColor,
  parseLineColor,
  patternInfo,
  themeToColumns,
  type CourtThemeColumns,
  type RgbaColor,
} from "@/lib/court/theme";
import { isQuarter, validateOnCourt } from "@/lib/game";
import {
  ALL_SHOT_FILTERS,
  SHOT_FILTER_KEYS,
  isHistoryFilter,
  type HistoryFilter,
  type ShotFilters,
} from "@/lib/stats";

const MAX_PATTERN_SCALE = 10;

// ============================================================
// Request body helpers for the API routes
// ============================================================

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parsed JSON object body, or null when the body is missing or not an object. */
export async function readJsonObject(request: NextRequest): Promise<JsonObject | null> {
  try {
    const body: unknown = await request.json();
    return isJsonObject(body) ? body : null;
  } catch {
    return null;
  }
}

/** A trimmed non-empty string, null for an explicit null/blank, undefined when absent. */
export function optionalText(
  body: JsonObject,
  key: string
): string | null | undefined | Error {
  if (!(key in body) || body[key] === undefined) return undefined;
  const value = body[key];
  if (value === null) return null;
  if (typeof value !== "string") return new Error(`'${key}' must be a string`);
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

export function optionalBoolean(
  body: JsonObject,
  key: string
): boolean | undefined | Error {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") return new Error(`'${key}' must be a boolean`);
  return value;
}

// ---- Games ----

/** ISO timestamp from a `date` field, or an Error. */
export function parseGameDate(body: JsonObject): string | undefined | Error {
  const value = body.date;
  if (value === undefined) return undefined;
  if (typeof value !== "string" || Number.isNaN(Date.parse(value))) {
    return new Error("'date' must be an ISO date string");
  }
  return new Date(value).toISOString();
}

/** Sorted jersey list from an `onCourt` field, or an Error. */
export function parseOnCourtBody(body: JsonObject): number[] | undefined | Error {
  const value = body.onCourt;
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) return new Error("'onCourt' must be an array of jersey numbers");
  const numbers: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number") {
      return new Error("'onCourt' must be an array of jersey numbers");
    }
    numbers.push(entry);
  }
  const result = validateOnCourt(numbers);
  return result.ok ? result.onCourt : new Error(result.error);
}

// ---- Court theme ----

/**
 * Validate a `courtTheme` payload and return the team columns to store.
 * Missing fields take the default theme's values.
 */
export function parseCourtThemeBody(value: unknown): CourtThemeColumns | Error {
  if (!isJsonObject(value)) return new Error("'courtTheme' must be an object");

  const pattern = value.pattern ?? DEFAULT_COURT_THEME.pattern;
  if (!isCourtBackgroundPattern(pattern)) {
    return new Error(`Unknown background pattern '${String(pattern)}'`);
  }

  const rawColors = value.backgroundColors ?? [];
  if (!Array.isArray(rawColors)) {
    return new Error("'backgroundColors' must be an array of hex colors");
  }
  const colors: RgbaColor[] = [];
  for (const raw of rawColors) {
    const color = typeof raw === "string" ? parseHexColor(raw) : null;
    if (!color) return new Error(`Invalid hex color '${String(raw)}'`);
    colors.push(color);
  }
  const { maxColors } = patternInfo(pattern);
  if (colors.length > maxColors) {
    return new Error(`Pattern '${pattern}' takes at most ${maxColors} colors`);
  }

  const alpha = value.backgroundAlpha ?? DEFAULT_COURT_THEME.backgroundAlpha;
  if (typeof alpha !== "number" || !(alpha > 0 && alpha <= 1)) {
    return new Error("'backgroundAlpha' must be in (0, 1]");
  }

  const scale = value.patternScale ?? DEFAULT_COURT_THEME.patternScale;
  if (typeof scale !== "number" || !(scale > 0 && scale <= MAX_PATTERN_SCALE)) {
    return new Error(`'patternScale' must be in (0, ${MAX_PATTERN_SCALE}]`);
  }

  const lineColor = value.lineColor ?? "white";
  if (typeof lineColor !== "string") {
    return new Error("'lineColor' must be a string");
  }
  const lower = lineColor.toLowerCase();
  if (lower !== "white" && lower !== "black" && !parseHexColor(lineColor)) {
    return new Error(`Invalid line color '${lineColor}'`);
  }

  return themeToColumns({
    backgroundColors: colors,
    backgroundAlpha: alpha,
    lineColor: parseLineColor(lineColor),
    pattern,
    patternScale: scale,
  });
}

// ---- Shot filters ----

function isShotFilterKey(value: string): value is keyof ShotFilters {
  return (SHOT_FILTER_KEYS as readonly string[]).includes(value);
}

/** `?hide=missed,freeThrow` → every filter on except those named. */
export function parseHiddenFilters(raw: string | null): ShotFilters | Error {
  const filters: ShotFilters = { ...ALL_SHOT_FILTERS };
  if (!raw) return filters;
  for (const part of raw.split(",")) {
    const key = part.trim();
    if (key === "") continue;
    if (!isShotFilterKey(key)) return new Error(`Unknown shot filter '${key}'`);
    filters[key] = false;
  }
  return filters;
}

export interface HistoryQuery {
  history: HistoryFilter;
  /** Current period; required for the "quarter" view */
  quarter: number;
}

/** `?history=quarter&quarter=3`. Defaults to the whole game. */
export function parseHistoryQuery(params: URLSearchParams): HistoryQuery | Error {
  const history = params.get("history") ?? "all";
  if (!isHistoryFilter(history)) {
    return new Error("history must be 'quarter', 'h1', 'h2' or 'all'");
  }
  const rawQuarter = params.get("quarter");
  const quarter = rawQuarter === null ? 1 : Number(rawQuarter);
  if (!isQuarter(quarter)) return new Error("quarter must be a whole number from 1");
  if (history === "quarter" && rawQuarter === null) {
    return new Error("quarter is required when history is 'quarter'");
  }
  return { history, quarter };
}
