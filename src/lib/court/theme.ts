import { ZONE_PAINT_ORDER, type ScoringZone } from "./zones";

// ============================================================
// Court Background Patterns
// ============================================================

export type CourtBackgroundPattern =
  | "none"
  | "solid"
  | "gradient"
  | "horizontalGradient"
  | "verticalStripes"
  | "horizontalStripes"
  | "diagonalStripes"
  | "checkerboard"
  | "halfVertical"
  | "halfHorizontal"
  | "diagonalSplit"
  | "quadrants"
  | "radialGradient"
  | "radialFromBasket"
  | "zonesBased";

interface PatternInfo {
  name: string;
  description: string;
  minColors: number;
  maxColors: number;
  supportsScale: boolean;
}

// Grouped the way the theme editor lays them out: basics, stripes, splits, advanced.
const PATTERN_INFO: Record<CourtBackgroundPattern, PatternInfo> = {
  none: { name: "None", description: "No background, line colors only", minColors: 0, maxColors: 0, supportsScale: false },
  solid: { name: "Solid", description: "Single color background", minColors: 1, maxColors: 1, supportsScale: false },
  gradient: { name: "Vertical Gradient", description: "Smooth color blend top to bottom", minColors: 2, maxColors: 6, supportsScale: false },
  horizontalGradient: { name: "Horizontal Gradient", description: "Smooth color blend left to right", minColors: 2, maxColors: 6, supportsScale: false },
  verticalStripes: { name: "Vertical Stripes", description: "Vertical color stripes", minColors: 2, maxColors: 6, supportsScale: true },
  horizontalStripes: { name: "Horizontal Stripes", description: "Horizontal color stripes", minColors: 2, maxColors: 6, supportsScale: true },
  diagonalStripes: { name: "Diagonal Stripes", description: "Diagonal color stripes", minColors: 2, maxColors: 6, supportsScale: true },
  checkerboard: { name: "Checkerboard", description: "Alternating color squares", minColors: 2, maxColors: 6, supportsScale: true },
  halfVertical: { name: "Half (Left/Right)", description: "Left and right halves", minColors: 2, maxColors: 2, supportsScale: false },
  halfHorizontal: { name: "Half (Top/Bottom)", description: "Top and bottom halves", minColors: 2, maxColors: 2, supportsScale: false },
  diagonalSplit: { name: "Diagonal Split", description: "Diagonal line divides colors", minColors: 2, maxColors: 2, supportsScale: false },
  quadrants: { name: "Quadrants", description: "Four corner sections", minColors: 4, maxColors: 4, supportsScale: false },
  radialGradient: { name: "Radial Gradient", description: "Colors blend from center outward", minColors: 2, maxColors: 6, supportsScale: false },
  radialFromBasket: { name: "Rings from Basket", description: "Concentric rings from the basket", minColors: 2, maxColors: 6, supportsScale: false },
  zonesBased: { name: "Shot Zones", description: "Restricted, paint, mid-range, corner 3, above break, deep", minColors: 2, maxColors: 6, supportsScale: false },
};

export const COURT_BACKGROUND_PATTERNS: readonly CourtBackgroundPattern[] = [
  "none",
  "solid",
  "gradient",
  "horizontalGradient",
  "verticalStripes",
  "horizontalStripes",
  "diagonalStripes",
  "checkerboard",
  "halfVertical",
  "halfHorizontal",
  "diagonalSplit",
  "quadrants",
  "radialGradient",
  "radialFromBasket",
  "zonesBased",
] as const;

export function isCourtBackgroundPattern(
  value: unknown
): value is CourtBackgroundPattern {
  return (
    typeof value === "string" &&
    (COURT_BACKGROUND_PATTERNS as readonly string[]).includes(value)
  );
}

export function patternInfo(pattern: CourtBackgroundPattern): PatternInfo {
  return PATTERN_INFO[pattern];
}

// ============================================================
// Colors
// ============================================================

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  /** 0–1 */
  alpha: number;
}

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/** Parse "#RRGGBB" / "RRGGBBAA" (leading # optional). Returns null otherwise. */
export function parseHexColor(raw: string): RgbaColor | null {
  const hex = raw.trim().replace(/#/g, "");
  if (!HEX_DIGITS.test(hex)) return null;

  const byte = (i: number) => parseInt(hex.slice(i, i + 2), 16);
  switch (hex.length) {
    case 6:
      return { r: byte(0), g: byte(2), b: byte(4), alpha: 1 };
    case 8:
      return { r: byte(0), g: byte(2), b: byte(4), alpha: byte(6) / 255 };
    default:
      return null;
  }
}

/** "#RRGGBB"; alpha is dropped. */
export function colorToHex(color: RgbaColor): string {
  const part = (n: number) =>
    Math.round(Math.min(255, Math.max(0, n)))
      .toString(16)
      .padStart(2, "0")
      .toUpperCase();
  return `#${part(color.r)}${part(color.g)}${part(color.b)}`;
}

export function colorToCss(color: RgbaColor, opacity = 1): string {
  const a = Math.round(color.alpha * opacity * 1000) / 1000;
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${a})`;
}

/** Comma-separated hex list; invalid entries are dropped. */
export function parseColorList(raw: string | null | undefined): RgbaColor[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((part) => parseHexColor(part.trim()))
    .filter((c): c is RgbaColor => c !== null);
}

export function serializeColorList(colors: readonly RgbaColor[]): string {
  return colors.map(colorToHex).join(",");
}

// ============================================================
// Line Color
// ============================================================

export type CourtLineColor =
  | { kind: "white" }
  | { kind: "black" }
  | { kind: "custom"; color: RgbaColor };

export const WHITE_LINES: CourtLineColor = { kind: "white" };

export function parseLineColor(raw: string | null | undefined): CourtLineColor {
  if (raw == null) return WHITE_LINES;
  switch (raw.toLowerCase()) {
    case "white":
      return WHITE_LINES;
    case "black":
      return { kind: "black" };
    default: {
      const color = parseHexColor(raw);
      return color ? { kind: "custom", color } : WHITE_LINES;
    }
  }
}

export function lineColorToString(lineColor: CourtLineColor): string {
  switch (lineColor.kind) {
    case "white":
    case "black":
      return lineColor.kind;
    case "custom":
      return colorToHex(lineColor.color);
  }
}

export function lineColorCss(lineColor: CourtLineColor): string {
  switch (lineColor.kind) {
    case "white":
      return "#FFFFFF";
    case "black":
      return "#000000";
    case "custom":
      return colorToCss(lineColor.color);
  }
}

// ============================================================
// Court Theme
// ============================================================

export interface CourtTheme {
  backgroundColors: RgbaColor[];
  backgroundAlpha: number;
  lineColor: CourtLineColor;
  pattern: CourtBackgroundPattern;
  patternScale: number;
}

export const DEFAULT_COURT_THEME: Readonly<CourtTheme> = Object.freeze({
  backgroundColors: [],
  backgroundAlpha: 1,
  lineColor: WHITE_LINES,
  pattern: "solid",
  patternScale: 1,
});

/** Theme columns as stored on a team row. */
export interface CourtThemeColumns {
  court_background_color: string | null;
  court_background_alpha: number | null;
  court_line_color: string | null;
  court_background_pattern: string | null;
  court_pattern_scale: number | null;
}

export function themeFromColumns(
  columns: CourtThemeColumns | null | undefined
): CourtTheme {
  if (!columns) return { ...DEFAULT_COURT_THEME, backgroundColors: [] };

  const alpha = columns.court_background_alpha ?? 0;
  const scale = columns.court_pattern_scale ?? 0;

  return {
    backgroundColors: parseColorList(columns.court_background_color),
    backgroundAlpha: alpha > 0 ? alpha : 1,
    lineColor: parseLineColor(columns.court_line_color),
    pattern: isCourtBackgroundPattern(columns.court_background_pattern)
      ? columns.court_background_pattern
      : "solid",
    patternScale: scale > 0 ? scale : 1,
  };
}

export function themeToColumns(theme: CourtTheme): CourtThemeColumns {
  return {
    court_background_color: serializeColorList(theme.backgroundColors),
    court_background_alpha: theme.backgroundAlpha,
    court_line_color: lineColorToString(theme.lineColor),
    court_background_pattern: theme.pattern,
    court_pattern_scale: theme.patternScale,
  };
}

/** Colors the pattern will actually use: clipped to its maximum. */
export function usableColors(theme: CourtTheme): RgbaColor[] {
  return theme.backgroundColors.slice(0, PATTERN_INFO[theme.pattern].maxColors);
}

/**
 * Theme colors assigned to zones in paint order (Deep first), cycling when
 * fewer than six are supplied. Empty when the theme has no colors.
 */
export function zoneColors(
  theme: CourtTheme
): Partial<Record<ScoringZone, RgbaColor>> {
  const colors = theme.backgroundColors;
  const result: Partial<Record<ScoringZone, RgbaColor>> = {};
  if (colors.length === 0) return result;

  ZONE_PAINT_ORDER.forEach((zone, i) => {
    result[zone] = colors[i % colors.length];
  });
  return result;
}
