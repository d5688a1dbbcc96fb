import {
  BASKET_X_FEET,
  HALF_COURT_WIDTH_FEET,
  feetToPixelsX,
  feetToPixelsY,
  isValidCourtConfiguration,
  toFeet,
  type CanvasSize,
  type CourtConfiguration,
  type NormalizedPosition,
} from "./config";
import {
  arcCornerIntersectionFeet,
  arcLineCommands,
  threePointBranch,
  type PathCommand,
} from "./geometry";

// ============================================================
// Scoring Zones
// Painted back to front; a later fill covers the earlier ones.
// ============================================================

export type ScoringZone =
  | "restricted"
  | "paint"
  | "midRange"
  | "corner3"
  | "aboveBreak3"
  | "deep";

/** Paint order: Deep first, Restricted last (top-most). */
export const ZONE_PAINT_ORDER: readonly ScoringZone[] = [
  "deep",
  "aboveBreak3",
  "corner3",
  "midRange",
  "paint",
  "restricted",
] as const;

const ZONE_NAMES: Record<ScoringZone, string> = {
  restricted: "Restricted Area",
  paint: "Paint",
  midRange: "Mid-Range",
  corner3: "Corner 3",
  aboveBreak3: "Above the Break 3",
  deep: "Deep",
};

export function zoneName(zone: ScoringZone): string {
  return ZONE_NAMES[zone];
}

export interface ZoneFill {
  zone: ScoringZone;
  /** Closed sub-paths in pixel space */
  commands: PathCommand[];
}

export const RESTRICTED_RADIUS_FEET = 4;
/** The above-the-break band extends this far past the three-point arc. */
export const DEEP_BAND_FEET = 4;

function rectCommands(
  x: number,
  y: number,
  width: number,
  height: number
): PathCommand[] {
  return [
    { op: "moveTo", x, y },
    { op: "lineTo", x: x + width, y },
    { op: "lineTo", x: x + width, y: y + height },
    { op: "lineTo", x, y: y + height },
    { op: "close" },
  ];
}

/** Height (feet) of the corner-3 boxes: where the extended arc meets the corner line. */
function cornerBoxDepthFeet(config: CourtConfiguration): number {
  const extended = config.threePointArcFeet + DEEP_BAND_FEET;
  return threePointBranch(config, extended) === "truncated"
    ? arcCornerIntersectionFeet(config, extended)
    : config.basketDistanceFeet;
}

/** Zone fills in paint order. Pure; same input gives the same fills. */
export function zonePolygons(
  config: CourtConfiguration,
  size: CanvasSize
): ZoneFill[] {
  if (!isValidCourtConfiguration(config)) return [];
  const x = (feet: number) => feetToPixelsX(feet, size);
  const y = (feet: number) => feetToPixelsY(feet, size);

  const arc = config.threePointArcFeet;
  const cornerWidth = x(config.threePointCornerFeet);
  const cornerHeight = y(cornerBoxDepthFeet(config));
  const keyLeft = x((HALF_COURT_WIDTH_FEET - config.keyWidthFeet) / 2);
  const basket = { x: x(BASKET_X_FEET), y: y(config.basketDistanceFeet) };
  const restrictedRadius = x(RESTRICTED_RADIUS_FEET);

  return [
    {
      zone: "deep",
      commands: rectCommands(0, 0, size.width, size.height),
    },
    {
      zone: "aboveBreak3",
      commands: [
        ...arcLineCommands(config, size, arc + DEEP_BAND_FEET),
        { op: "close" },
      ],
    },
    {
      zone: "corner3",
      commands: [
        ...rectCommands(0, 0, cornerWidth, cornerHeight),
        ...rectCommands(size.width - cornerWidth, 0, cornerWidth, cornerHeight),
      ],
    },
    {
      zone: "midRange",
      commands: [...arcLineCommands(config, size, arc), { op: "close" }],
    },
    {
      zone: "paint",
      commands: rectCommands(
        keyLeft,
        0,
        x(config.keyWidthFeet),
        y(config.freeThrowLineDistanceFeet)
      ),
    },
    {
      zone: "restricted",
      commands: [
        { op: "moveTo", x: basket.x - restrictedRadius, y: basket.y },
        {
          op: "arc",
          cx: basket.x,
          cy: basket.y,
          r: restrictedRadius,
          startAngle: Math.PI,
          endAngle: 0,
          anticlockwise: true,
        },
        { op: "close" },
      ],
    },
  ];
}

// ============================================================
// Hit testing (feet space)
// ============================================================

interface FeetPoint {
  x: number;
  y: number;
}

function distanceToBasket(p: FeetPoint, config: CourtConfiguration): number {
  return Math.hypot(p.x - BASKET_X_FEET, p.y - config.basketDistanceFeet);
}

function insideArcRegion(
  p: FeetPoint,
  config: CourtConfiguration,
  radiusFeet: number
): boolean {
  const distance = distanceToBasket(p, config);
  if (threePointBranch(config, radiusFeet) === "truncated") {
    const corner = config.threePointCornerFeet;
    const withinCornerLines =
      p.x >= corner && p.x <= HALF_COURT_WIDTH_FEET - corner;
    return (
      withinCornerLines &&
      (p.y <= arcCornerIntersectionFeet(config, radiusFeet) ||
        distance <= radiusFeet)
    );
  }
  return (
    (Math.abs(p.x - BASKET_X_FEET) <= radiusFeet &&
      p.y <= config.basketDistanceFeet) ||
    distance <= radiusFeet
  );
}

const ZONE_TESTS: Record<
  ScoringZone,
  (p: FeetPoint, config: CourtConfiguration) => boolean
> = {
  restricted: (p, config) =>
    distanceToBasket(p, config) <= RESTRICTED_RADIUS_FEET &&
    p.y >= config.basketDistanceFeet,
  paint: (p, config) =>
    Math.abs(p.x - BASKET_X_FEET) <= config.keyWidthFeet / 2 &&
    p.y <= config.freeThrowLineDistanceFeet,
  midRange: (p, config) => insideArcRegion(p, config, config.threePointArcFeet),
  corner3: (p, config) => {
    const corner = config.threePointCornerFeet;
    return (
      (p.x <= corner || p.x >= HALF_COURT_WIDTH_FEET - corner) &&
      p.y <= cornerBoxDepthFeet(config)
    );
  },
  aboveBreak3: (p, config) =>
    insideArcRegion(p, config, config.threePointArcFeet + DEEP_BAND_FEET),
  deep: () => true,
};

/** Zone whose fill is top-most at `position`. */
export function zoneAt(
  position: NormalizedPosition,
  config: CourtConfiguration
): ScoringZone {
  const p = toFeet(position);
  for (let i = ZONE_PAINT_ORDER.length - 1; i >= 0; i--) {
    const zone = ZONE_PAINT_ORDER[i];
    if (ZONE_TESTS[zone](p, config)) return zone;
  }
  return "deep";
}
