import {
  BASKET_X_FEET,
  HALF_COURT_WIDTH_FEET,
  feetToPixelsX,
  feetToPixelsY,
  isValidCourtConfiguration,
  type CanvasSize,
  type CourtConfiguration,
} from "./config";

// ============================================================
// Drawing primitives
//
// Everything is laid out in feet and scaled to pixels at the end.
// Arcs follow the canvas convention: angles in radians measured
// from +x in y-down space, `anticlockwise` = decreasing angle.
// ============================================================

export type PathCommand =
  | { op: "moveTo"; x: number; y: number }
  | { op: "lineTo"; x: number; y: number }
  | {
      op: "arc";
      cx: number;
      cy: number;
      r: number;
      startAngle: number;
      endAngle: number;
      anticlockwise: boolean;
    }
  | { op: "close" };

export type LineStyle = "solid" | "dashed";

export type CourtElement =
  | "boundary"
  | "key"
  | "backboard"
  | "rim"
  | "freeThrowCircle"
  | "laneHash"
  | "lowBlock"
  | "threePointLine"
  | "centerCircle";

export type CourtPrimitive =
  | {
      kind: "rect";
      element: CourtElement;
      style: LineStyle;
      x: number;
      y: number;
      width: number;
      height: number;
    }
  | {
      kind: "line";
      element: CourtElement;
      style: LineStyle;
      x1: number;
      y1: number;
      x2: number;
      y2: number;
    }
  | {
      kind: "circle";
      element: CourtElement;
      style: LineStyle;
      cx: number;
      cy: number;
      r: number;
    }
  | {
      kind: "path";
      element: CourtElement;
      style: LineStyle;
      commands: PathCommand[];
    };

export type ThreePointBranch = "truncated" | "untruncated";

// Fixed court markings (feet)
const BACKBOARD_OFFSET_FEET = 1.25;
const BACKBOARD_HALF_WIDTH_FEET = 3;
const RIM_RADIUS_FEET = 0.75;
const FREE_THROW_CIRCLE_RADIUS_FEET = 6;
const CENTER_CIRCLE_RADIUS_FEET = 6;
const HASH_LENGTH_FEET = 0.7;
const LOW_BLOCK_FEET = 0.7;
const LOW_BLOCK_Y_FEET = 7;

export const LANE_HASH_POSITIONS_FEET: readonly number[] = [7, 11, 14, 17];

/** Basket-center-to-corner-line distance for a configuration (22' for 3' corners). */
export function cornerLineOffsetFeet(config: CourtConfiguration): number {
  return BASKET_X_FEET - config.threePointCornerFeet;
}

/** Truncated when an arc of `radiusFeet` reaches the corner lines. */
export function threePointBranch(
  config: CourtConfiguration,
  radiusFeet: number = config.threePointArcFeet
): ThreePointBranch {
  return radiusFeet >= cornerLineOffsetFeet(config) ? "truncated" : "untruncated";
}

/**
 * Feet y-coordinate where an arc of `radiusFeet` meets the corner line.
 * Only meaningful for the truncated branch.
 */
export function arcCornerIntersectionFeet(
  config: CourtConfiguration,
  radiusFeet: number
): number {
  const dx = config.threePointCornerFeet - BASKET_X_FEET;
  return config.basketDistanceFeet + Math.sqrt(radiusFeet * radiusFeet - dx * dx);
}

/**
 * Open path tracing a three-point-style line of `radiusFeet` around the basket,
 * from the left baseline over the top to the right baseline. The zone renderer
 * reuses it with other radii.
 */
export function arcLineCommands(
  config: CourtConfiguration,
  size: CanvasSize,
  radiusFeet: number,
  branch: ThreePointBranch = threePointBranch(config, radiusFeet)
): PathCommand[] {
  const x = (feet: number) => feetToPixelsX(feet, size);
  const y = (feet: number) => feetToPixelsY(feet, size);

  const basketFeetY = config.basketDistanceFeet;
  const center = { x: x(BASKET_X_FEET), y: y(basketFeetY) };
  const radius = x(radiusFeet);

  if (branch === "truncated") {
    const cornerX = x(config.threePointCornerFeet);
    const rightCornerX = size.width - cornerX;
    const intersectY = y(arcCornerIntersectionFeet(config, radiusFeet));

    return [
      { op: "moveTo", x: cornerX, y: 0 },
      { op: "lineTo", x: cornerX, y: intersectY },
      {
        op: "arc",
        cx: center.x,
        cy: center.y,
        r: radius,
        startAngle: Math.atan2(intersectY - center.y, cornerX - center.x),
        endAngle: Math.atan2(intersectY - center.y, rightCornerX - center.x),
        anticlockwise: true,
      },
      { op: "lineTo", x: rightCornerX, y: 0 },
    ];
  }

  // Arc stops short of the corner lines: drop straight lines at the arc's own
  // horizontal extent down to the basket's level, then a half circle.
  const leftX = x(BASKET_X_FEET - radiusFeet);
  const rightX = x(BASKET_X_FEET + radiusFeet);

  return [
    { op: "moveTo", x: leftX, y: 0 },
    { op: "lineTo", x: leftX, y: center.y },
    {
      op: "arc",
      cx: center.x,
      cy: center.y,
      r: radius,
      startAngle: Math.PI,
      endAngle: 0,
      anticlockwise: true,
    },
    { op: "lineTo", x: rightX, y: 0 },
  ];
}

export function threePointLineCommands(
  config: CourtConfiguration,
  size: CanvasSize,
  branch?: ThreePointBranch
): PathCommand[] {
  return arcLineCommands(config, size, config.threePointArcFeet, branch);
}

/** All court markings for a configuration, in pixel space. */
export function courtLinePaths(
  config: CourtConfiguration,
  size: CanvasSize
): CourtPrimitive[] {
  if (!isValidCourtConfiguration(config)) return [];
  const x = (feet: number) => feetToPixelsX(feet, size);
  const y = (feet: number) => feetToPixelsY(feet, size);
  const style: LineStyle = "solid";

  const keyLeft = x((HALF_COURT_WIDTH_FEET - config.keyWidthFeet) / 2);
  const keyRight = x((HALF_COURT_WIDTH_FEET + config.keyWidthFeet) / 2);
  const keyBottom = y(config.freeThrowLineDistanceFeet);
  const backboardY = y(config.basketDistanceFeet - BACKBOARD_OFFSET_FEET);
  const hashLength = x(HASH_LENGTH_FEET);
  const blockWidth = x(LOW_BLOCK_FEET);
  const blockHeight = y(LOW_BLOCK_FEET);

  const primitives: CourtPrimitive[] = [
    {
      kind: "rect",
      element: "boundary",
      style,
      x: 0,
      y: 0,
      width: size.width,
      height: size.height,
    },
    {
      kind: "rect",
      element: "key",
      style,
      x: keyLeft,
      y: 0,
      width: x(config.keyWidthFeet),
      height: keyBottom,
    },
    {
      kind: "line",
      element: "backboard",
      style,
      x1: x(BASKET_X_FEET - BACKBOARD_HALF_WIDTH_FEET),
      y1: backboardY,
      x2: x(BASKET_X_FEET + BACKBOARD_HALF_WIDTH_FEET),
      y2: backboardY,
    },
    {
      kind: "circle",
      element: "rim",
      style,
      cx: x(BASKET_X_FEET),
      cy: y(config.basketDistanceFeet),
      r: x(RIM_RADIUS_FEET),
    },
    {
      kind: "path",
      element: "freeThrowCircle",
      style,
      commands: [
        { op: "moveTo", x: x(BASKET_X_FEET - FREE_THROW_CIRCLE_RADIUS_FEET), y: keyBottom },
        {
          op: "arc",
          cx: x(BASKET_X_FEET),
          cy: keyBottom,
          r: x(FREE_THROW_CIRCLE_RADIUS_FEET),
          startAngle: Math.PI,
          endAngle: 0,
          anticlockwise: true,
        },
      ],
    },
  ];

  for (const feet of LANE_HASH_POSITIONS_FEET) {
    const yPos = y(feet);
    primitives.push(
      {
        kind: "line",
        element: "laneHash",
        style,
        x1: keyLeft - hashLength,
        y1: yPos,
        x2: keyLeft,
        y2: yPos,
      },
      {
        kind: "line",
        element: "laneHash",
        style,
        x1: keyRight,
        y1: yPos,
        x2: keyRight + hashLength,
        y2: yPos,
      }
    );
  }

  primitives.push(
    {
      kind: "rect",
      element: "lowBlock",
      style,
      x: keyLeft - blockWidth,
      y: y(LOW_BLOCK_Y_FEET),
      width: blockWidth,
      height: blockHeight,
    },
    {
      kind: "rect",
      element: "lowBlock",
      style,
      x: keyRight,
      y: y(LOW_BLOCK_Y_FEET),
      width: blockWidth,
      height: blockHeight,
    },
    {
      kind: "path",
      element: "threePointLine",
      style,
      commands: threePointLineCommands(config, size),
    },
    {
      kind: "path",
      element: "centerCircle",
      style,
      commands: [
        { op: "moveTo", x: x(BASKET_X_FEET - CENTER_CIRCLE_RADIUS_FEET), y: size.height },
        {
          op: "arc",
          cx: x(BASKET_X_FEET),
          cy: size.height,
          r: x(CENTER_CIRCLE_RADIUS_FEET),
          startAngle: Math.PI,
          endAngle: 0,
          anticlockwise: false,
        },
      ],
    }
  );

  return primitives;
}
