import {
  BASKET_X_FEET,
  feetToPixelsX,
  feetToPixelsY,
  type CanvasSize,
  type CourtConfiguration,
} from "./config";
import type { PathCommand } from "./geometry";
import { pathCommandsToSvg, zoneFillPath } from "./svg";
import {
  colorToCss,
  patternInfo,
  usableColors,
  zoneColors,
  type CourtTheme,
  type RgbaColor,
} from "./theme";
import { zonePolygons } from "./zones";

// ============================================================
// Court background layers
// Rendered beneath the court lines, clipped to the canvas.
// ============================================================

export interface GradientStop {
  offset: number;
  color: string;
}

export type BackgroundPaint =
  | { type: "color"; color: string }
  | {
      type: "linear";
      /** Fractions of the canvas box */
      x1: number;
      y1: number;
      x2: number;
      y2: number;
      stops: GradientStop[];
    }
  | { type: "radial"; cx: number; cy: number; r: number; stops: GradientStop[] };

export interface BackgroundLayer {
  d: string;
  paint: BackgroundPaint;
}

export interface CourtBackground {
  opacity: number;
  layers: BackgroundLayer[];
}

/** Stripe/check cell size at scale 1, as a fraction of the canvas width. */
const BASE_CELL_FRACTION = 0.1;
const RING_WIDTH_FEET = 5;

function rect(x: number, y: number, w: number, h: number): string {
  return pathCommandsToSvg([
    { op: "moveTo", x, y },
    { op: "lineTo", x: x + w, y },
    { op: "lineTo", x: x + w, y: y + h },
    { op: "lineTo", x, y: y + h },
    { op: "close" },
  ]);
}

function polygon(points: Array<[number, number]>): string {
  const commands: PathCommand[] = points.map(([x, y], i): PathCommand =>
    i === 0 ? { op: "moveTo", x, y } : { op: "lineTo", x, y }
  );
  commands.push({ op: "close" });
  return pathCommandsToSvg(commands);
}

function circle(cx: number, cy: number, r: number): string {
  return pathCommandsToSvg([
    { op: "moveTo", x: cx - r, y: cy },
    { op: "arc", cx, cy, r, startAngle: Math.PI, endAngle: 0, anticlockwise: false },
    { op: "arc", cx, cy, r, startAngle: 0, endAngle: Math.PI, anticlockwise: false },
    { op: "close" },
  ]);
}

function solid(color: RgbaColor): BackgroundPaint {
  return { type: "color", color: colorToCss(color) };
}

function evenStops(colors: readonly RgbaColor[]): GradientStop[] {
  const last = Math.max(colors.length - 1, 1);
  return colors.map((c, i) => ({ offset: i / last, color: colorToCss(c) }));
}

/**
 * Background layers for a theme. Returns no layers for the `none` pattern or
 * a theme without colors; a pattern given fewer colors than it needs falls
 * back to a solid fill with the first one.
 */
export function backgroundLayers(
  theme: CourtTheme,
  config: CourtConfiguration,
  size: CanvasSize
): CourtBackground {
  const colors = usableColors(theme);
  const info = patternInfo(theme.pattern);
  const { width: w, height: h } = size;
  const full = rect(0, 0, w, h);
  const result: CourtBackground = { opacity: theme.backgroundAlpha, layers: [] };

  const first = colors[0];
  if (theme.pattern === "none" || first === undefined) return result;

  if (colors.length < info.minColors) {
    result.layers.push({ d: full, paint: solid(first) });
    return result;
  }

  const pick = (i: number): RgbaColor => colors[i % colors.length] ?? first;
  const cell = (w * BASE_CELL_FRACTION) / (info.supportsScale ? theme.patternScale : 1);
  const layers = result.layers;

  switch (theme.pattern) {
    case "solid":
      layers.push({ d: full, paint: solid(first) });
      break;

    case "gradient":
      layers.push({
        d: full,
        paint: { type: "linear", x1: 0, y1: 0, x2: 0, y2: 1, stops: evenStops(colors) },
      });
      break;

    case "horizontalGradient":
      layers.push({
        d: full,
        paint: { type: "linear", x1: 0, y1: 0, x2: 1, y2: 0, stops: evenStops(colors) },
      });
      break;

    case "radialGradient":
      layers.push({
        d: full,
        paint: { type: "radial", cx: 0.5, cy: 0.5, r: 0.75, stops: evenStops(colors) },
      });
      break;

    case "verticalStripes":
      for (let i = 0; i * cell < w; i++) {
        layers.push({ d: rect(i * cell, 0, cell, h), paint: solid(pick(i)) });
      }
      break;

    case "horizontalStripes":
      for (let i = 0; i * cell < h; i++) {
        layers.push({ d: rect(0, i * cell, w, cell), paint: solid(pick(i)) });
      }
      break;

    case "diagonalStripes":
      // Bands run top-right to bottom-left; the canvas clips the overhang.
      for (let i = 0; i * cell < w + h; i++) {
        const x0 = i * cell;
        layers.push({
          d: polygon([
            [x0, 0],
            [x0 + cell, 0],
            [x0 + cell - h, h],
            [x0 - h, h],
          ]),
          paint: solid(pick(i)),
        });
      }
      break;

    case "checkerboard":
      for (let row = 0; row * cell < h; row++) {
        for (let col = 0; col * cell < w; col++) {
          layers.push({
            d: rect(col * cell, row * cell, cell, cell),
            paint: solid(pick(row + col)),
          });
        }
      }
      break;

    case "halfVertical":
      layers.push(
        { d: rect(0, 0, w / 2, h), paint: solid(pick(0)) },
        { d: rect(w / 2, 0, w / 2, h), paint: solid(pick(1)) }
      );
      break;

    case "halfHorizontal":
      layers.push(
        { d: rect(0, 0, w, h / 2), paint: solid(pick(0)) },
        { d: rect(0, h / 2, w, h / 2), paint: solid(pick(1)) }
      );
      break;

    case "diagonalSplit":
      layers.push(
        { d: polygon([[0, 0], [w, 0], [0, h]]), paint: solid(pick(0)) },
        { d: polygon([[w, 0], [w, h], [0, h]]), paint: solid(pick(1)) }
      );
      break;

    case "quadrants":
      layers.push(
        { d: rect(0, 0, w / 2, h / 2), paint: solid(pick(0)) },
        { d: rect(w / 2, 0, w / 2, h / 2), paint: solid(pick(1)) },
        { d: rect(0, h / 2, w / 2, h / 2), paint: solid(pick(2)) },
        { d: rect(w / 2, h / 2, w / 2, h / 2), paint: solid(pick(3)) }
      );
      break;

    case "radialFromBasket": {
      const cx = feetToPixelsX(BASKET_X_FEET, size);
      const cy = feetToPixelsY(config.basketDistanceFeet, size);
      const ring = feetToPixelsX(RING_WIDTH_FEET, size);
      const farthest = Math.hypot(Math.max(cx, w - cx), Math.max(cy, h - cy));
      // Outermost ring first so inner rings paint over it.
      for (let k = Math.ceil(farthest / ring); k >= 1; k--) {
        layers.push({ d: circle(cx, cy, k * ring), paint: solid(pick(k - 1)) });
      }
      break;
    }

    case "zonesBased": {
      const byZone = zoneColors({ ...theme, backgroundColors: colors });
      for (const fill of zonePolygons(config, size)) {
        const color = byZone[fill.zone];
        if (color) layers.push({ d: zoneFillPath(fill), paint: solid(color) });
      }
      break;
    }
  }

  return result;
}
