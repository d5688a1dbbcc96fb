import type { CourtPrimitive, PathCommand } from "./geometry";
import type { ZoneFill } from "./zones";

// ============================================================
// SVG path serialization
// ============================================================

const TWO_PI = Math.PI * 2;

function fmt(n: number): string {
  return n.toFixed(2);
}

/** Angular extent travelled by a canvas-style arc, in [0, 2π]. */
export function arcSweepExtent(
  startAngle: number,
  endAngle: number,
  anticlockwise: boolean
): number {
  const raw = anticlockwise ? startAngle - endAngle : endAngle - startAngle;
  if (raw >= TWO_PI) return TWO_PI;
  return ((raw % TWO_PI) + TWO_PI) % TWO_PI;
}

/**
 * Serialize path commands to SVG path data. An arc draws a line to its start
 * point first (or moves there when nothing has been drawn yet), matching
 * canvas `arc()` semantics.
 */
export function pathCommandsToSvg(commands: readonly PathCommand[]): string {
  const parts: string[] = [];
  let hasCurrentPoint = false;

  for (const cmd of commands) {
    switch (cmd.op) {
      case "moveTo":
        parts.push(`M ${fmt(cmd.x)} ${fmt(cmd.y)}`);
        hasCurrentPoint = true;
        break;
      case "lineTo":
        parts.push(`L ${fmt(cmd.x)} ${fmt(cmd.y)}`);
        hasCurrentPoint = true;
        break;
      case "arc": {
        const sx = cmd.cx + cmd.r * Math.cos(cmd.startAngle);
        const sy = cmd.cy + cmd.r * Math.sin(cmd.startAngle);
        const ex = cmd.cx + cmd.r * Math.cos(cmd.endAngle);
        const ey = cmd.cy + cmd.r * Math.sin(cmd.endAngle);
        const extent = arcSweepExtent(cmd.startAngle, cmd.endAngle, cmd.anticlockwise);
        const largeArc = extent > Math.PI ? 1 : 0;
        const sweep = cmd.anticlockwise ? 0 : 1;
        parts.push(`${hasCurrentPoint ? "L" : "M"} ${fmt(sx)} ${fmt(sy)}`);
        parts.push(
          `A ${fmt(cmd.r)} ${fmt(cmd.r)} 0 ${largeArc} ${sweep} ${fmt(ex)} ${fmt(ey)}`
        );
        hasCurrentPoint = true;
        break;
      }
      case "close":
        parts.push("Z");
        break;
    }
  }

  return parts.join(" ");
}

/** SVG path data for any court primitive. */
export function toSvgPath(primitive: CourtPrimitive): string {
  switch (primitive.kind) {
    case "rect": {
      const { x, y, width, height } = primitive;
      return pathCommandsToSvg([
        { op: "moveTo", x, y },
        { op: "lineTo", x: x + width, y },
        { op: "lineTo", x: x + width, y: y + height },
        { op: "lineTo", x, y: y + height },
        { op: "close" },
      ]);
    }
    case "line":
      return pathCommandsToSvg([
        { op: "moveTo", x: primitive.x1, y: primitive.y1 },
        { op: "lineTo", x: primitive.x2, y: primitive.y2 },
      ]);
    case "circle": {
      const { cx, cy, r } = primitive;
      // Two half arcs; a single SVG arc cannot close on itself.
      return [
        `M ${fmt(cx - r)} ${fmt(cy)}`,
        `A ${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx + r)} ${fmt(cy)}`,
        `A ${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx - r)} ${fmt(cy)}`,
        "Z",
      ].join(" ");
    }
    case "path":
      return pathCommandsToSvg(primitive.commands);
  }
}

export function zoneFillPath(fill: ZoneFill): string {
  return pathCommandsToSvg(fill.commands);
}
