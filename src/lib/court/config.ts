// ============================================================
// Court Configuration
// All distances in feet over a fixed 50' x 47' half court.
// Origin (0, 0) = top-left corner, baseline along y = 0,
// basket centered horizontally near the baseline.
// ============================================================

export const HALF_COURT_WIDTH_FEET = 50;
export const HALF_COURT_DEPTH_FEET = 47;
export const BASKET_X_FEET = HALF_COURT_WIDTH_FEET / 2;

export type CourtLevel = "highSchool" | "college" | "nba";

export const COURT_LEVELS: readonly CourtLevel[] = [
  "highSchool",
  "college",
  "nba",
] as const;

export interface CourtConfiguration {
  /** Width of the free-throw lane */
  readonly keyWidthFeet: number;
  /** Radius of the three-point arc, measured from the basket */
  readonly threePointArcFeet: number;
  /** Sideline distance that bounds the corner-3 zone */
  readonly threePointCornerFeet: number;
  /** Basket-to-corner-line distance used for corner classification */
  readonly threePointCornerDistanceFeet: number;
  readonly freeThrowLineDistanceFeet: number;
  /** Baseline to basket center */
  readonly basketDistanceFeet: number;
}

/** Position normalized to [0, 1] over the half court. */
export interface NormalizedPosition {
  x: number;
  y: number;
}

export interface CanvasSize {
  width: number;
  height: number;
}

// High school: corner distance equals the arc radius.
const COURT_CONFIGURATIONS: Readonly<Record<CourtLevel, CourtConfiguration>> = {
  highSchool: Object.freeze({
    keyWidthFeet: 12,
    threePointArcFeet: 19.75,
    threePointCornerFeet: 3,
    threePointCornerDistanceFeet: 19.75,
    freeThrowLineDistanceFeet: 19,
    basketDistanceFeet: 5.25,
  }),
  college: Object.freeze({
    keyWidthFeet: 12,
    threePointArcFeet: 22.146,
    threePointCornerFeet: 3,
    threePointCornerDistanceFeet: 21.65,
    freeThrowLineDistanceFeet: 19,
    basketDistanceFeet: 5.25,
  }),
  nba: Object.freeze({
    keyWidthFeet: 16,
    threePointArcFeet: 23.75,
    threePointCornerFeet: 3,
    threePointCornerDistanceFeet: 22.0,
    freeThrowLineDistanceFeet: 19,
    basketDistanceFeet: 5.25,
  }),
};

const COURT_LEVEL_NAMES: Record<CourtLevel, string> = {
  highSchool: "High School",
  college: "College",
  nba: "NBA",
};

export function getCourtConfiguration(level: CourtLevel): CourtConfiguration {
  return COURT_CONFIGURATIONS[level];
}

export function courtLevelName(level: CourtLevel): string {
  return COURT_LEVEL_NAMES[level];
}

export function isCourtLevel(value: unknown): value is CourtLevel {
  return (
    typeof value === "string" &&
    (COURT_LEVELS as readonly string[]).includes(value)
  );
}

/** Parse a stored court level, falling back when missing or unknown. */
export function parseCourtLevel(
  raw: string | null | undefined,
  fallback: CourtLevel
): CourtLevel {
  return isCourtLevel(raw) ? raw : fallback;
}

/**
 * True when every distance is a positive finite number. The presets always
 * pass; the line and zone renderers draw nothing for a configuration that fails.
 */
export function isValidCourtConfiguration(config: CourtConfiguration): boolean {
  return [
    config.keyWidthFeet,
    config.threePointArcFeet,
    config.threePointCornerFeet,
    config.threePointCornerDistanceFeet,
    config.freeThrowLineDistanceFeet,
    config.basketDistanceFeet,
  ].every((v) => Number.isFinite(v) && v > 0);
}

// ============================================================
// Feet <-> pixel helpers
// ============================================================

export function feetToPixelsX(feet: number, size: CanvasSize): number {
  return (feet / HALF_COURT_WIDTH_FEET) * size.width;
}

export function feetToPixelsY(feet: number, size: CanvasSize): number {
  return (feet / HALF_COURT_DEPTH_FEET) * size.height;
}

export function toFeet(position: NormalizedPosition): { x: number; y: number } {
  return {
    x: position.x * HALF_COURT_WIDTH_FEET,
    y: position.y * HALF_COURT_DEPTH_FEET,
  };
}

/** Convert a pixel location on a rendered court to a normalized position. */
export function normalizePoint(
  px: number,
  py: number,
  size: CanvasSize
): NormalizedPosition {
  return { x: px / size.width, y: py / size.height };
}
