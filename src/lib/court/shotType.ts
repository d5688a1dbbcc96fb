import {
  BASKET_X_FEET,
  HALF_COURT_DEPTH_FEET,
  HALF_COURT_WIDTH_FEET,
  type CourtConfiguration,
  type NormalizedPosition,
} from "./config";

// ============================================================
// Shot Types
// Stored as integer codes (0 = 2PT, 1 = 3PT, 2 = FT).
// ============================================================

export type ShotType = "twoPointer" | "threePointer" | "freeThrow";

export const SHOT_TYPES: readonly ShotType[] = [
  "twoPointer",
  "threePointer",
  "freeThrow",
] as const;

const SHOT_TYPE_CODES: Record<ShotType, number> = {
  twoPointer: 0,
  threePointer: 1,
  freeThrow: 2,
};

export function shotTypeCode(type: ShotType): number {
  return SHOT_TYPE_CODES[type];
}

export function shotTypeFromCode(code: number): ShotType | null {
  return SHOT_TYPES.find((t) => SHOT_TYPE_CODES[t] === code) ?? null;
}

export function shotTypeLabel(type: ShotType, useAbbreviation = true): string {
  switch (type) {
    case "twoPointer":
      return useAbbreviation ? "2PT" : "2-Pointer";
    case "threePointer":
      return useAbbreviation ? "3PT" : "3-Pointer";
    case "freeThrow":
      return useAbbreviation ? "FT" : "Free Throw";
  }
}

// ============================================================
// Classification constants
// ============================================================

// Basket sits 5.25' (63") from the baseline at every level.
const LAYUP_BASKET_DISTANCE_FEET = 5.25;

const FREE_THROW_TOLERANCE_FEET = 2;
const FREE_THROW_HALF_WIDTH_FEET = 6;

// Slack added to the corner width, in normalized units (1 ft).
const CORNER_TOLERANCE = 0.02;

// Subtracted from the painted line so a shot on the line counts as a three.
const ARC_LINE_MARGIN_FEET = 0.25;
const CORNER_LINE_MARGIN_FEET = 0.5;

/** Shots at or inside this distance are flagged as layups automatically. */
export const LAYUP_AUTO_FLAG_FEET = 5;
/** The layup toggle is offered at or inside this distance. */
export const LAYUP_TOGGLE_FEET = 8;

/** Distance in feet from the basket, independent of court level. */
export function distanceFromBasket(position: NormalizedPosition): number {
  const basketX = 0.5;
  const basketY = LAYUP_BASKET_DISTANCE_FEET / HALF_COURT_DEPTH_FEET;
  const dxFeet = (position.x - basketX) * HALF_COURT_WIDTH_FEET;
  const dyFeet = (position.y - basketY) * HALF_COURT_DEPTH_FEET;
  return Math.sqrt(dxFeet * dxFeet + dyFeet * dyFeet);
}

export function shouldAutoFlagLayup(position: NormalizedPosition): boolean {
  return distanceFromBasket(position) <= LAYUP_AUTO_FLAG_FEET;
}

export function isLayupToggleAvailable(position: NormalizedPosition): boolean {
  return distanceFromBasket(position) <= LAYUP_TOGGLE_FEET;
}

/**
 * Classify a tap on the half court as a 2PT, 3PT or free-throw attempt.
 *
 * The free-throw box is checked first, so a tap inside it is always a free
 * throw. Otherwise the distance to the basket is compared with the corner
 * threshold (within 3' + 1' of either sideline) or the arc threshold.
 * Positions outside [0, 1] are not rejected.
 */
export function classifyShot(
  position: NormalizedPosition,
  config: CourtConfiguration
): ShotType {
  const { x, y } = position;
  const basketX = BASKET_X_FEET / HALF_COURT_WIDTH_FEET;
  const basketY = config.basketDistanceFeet / HALF_COURT_DEPTH_FEET;

  const freeThrowY = config.freeThrowLineDistanceFeet / HALF_COURT_DEPTH_FEET;
  const freeThrowTolerance = FREE_THROW_TOLERANCE_FEET / HALF_COURT_DEPTH_FEET;
  const freeThrowXRange = FREE_THROW_HALF_WIDTH_FEET / HALF_COURT_WIDTH_FEET;

  if (
    Math.abs(y - freeThrowY) < freeThrowTolerance &&
    Math.abs(x - basketX) < freeThrowXRange
  ) {
    return "freeThrow";
  }

  const dxFeet = (x - basketX) * HALF_COURT_WIDTH_FEET;
  const dyFeet = (y - basketY) * HALF_COURT_DEPTH_FEET;
  const distanceFeet = Math.sqrt(dxFeet * dxFeet + dyFeet * dyFeet);

  const arcThreshold = config.threePointArcFeet - ARC_LINE_MARGIN_FEET;
  const cornerThreshold =
    config.threePointCornerDistanceFeet - CORNER_LINE_MARGIN_FEET;

  const cornerZoneX =
    config.threePointCornerFeet / HALF_COURT_WIDTH_FEET + CORNER_TOLERANCE;
  const isCorner = x < cornerZoneX || x > 1 - cornerZoneX;

  const threshold = isCorner ? cornerThreshold : arcThreshold;
  return distanceFeet > threshold ? "threePointer" : "twoPointer";
}
