"use client";

import React, { useId, useMemo } from "react";
import { getCourtConfiguration, type CanvasSize, type CourtLevel } from "@/lib/court/config";
import { backgroundLayers, type BackgroundPaint } from "@/lib/court/background";
import { courtLinePaths } from "@/lib/court/geometry";
import { toSvgPath } from "@/lib/court/svg";
import { lineColorCss, type CourtTheme } from "@/lib/court/theme";

// ============================================================
// Court Dimensions
// Baseline at the TOP of the SVG, half-court line at the bottom,
// matching the normalized (0,0) top-left shot coordinates.
// ============================================================

/** Court SVG viewBox dimensions: 10 px per foot. */
export const COURT_WIDTH = 500;
export const COURT_HEIGHT = 470;

export const COURT_SIZE: CanvasSize = { width: COURT_WIDTH, height: COURT_HEIGHT };

// ============================================================
// Styling
// ============================================================

const LINE_COLOR = "#334155";
const LINE_WIDTH = 1.5;
const DASH = "10 10";

// ============================================================
// Background paint
// ============================================================

function paintFill(paint: BackgroundPaint, gradientId: string): string {
  return paint.type === "color" ? paint.color : `url(#${gradientId})`;
}

function GradientDef({ id, paint }: { id: string; paint: BackgroundPaint }) {
  if (paint.type === "linear") {
    return (
      <linearGradient id={id} x1={paint.x1} y1={paint.y1} x2={paint.x2} y2={paint.y2}>
        {paint.stops.map((stop) => (
          <stop key={stop.offset} offset={stop.offset} stopColor={stop.color} />
        ))}
      </linearGradient>
    );
  }
  if (paint.type === "radial") {
    return (
      <radialGradient id={id} cx={paint.cx} cy={paint.cy} r={paint.r}>
        {paint.stops.map((stop) => (
          <stop key={stop.offset} offset={stop.offset} stopColor={stop.color} />
        ))}
      </radialGradient>
    );
  }
  return null;
}

// ============================================================
// Component
// ============================================================

interface BasketballCourtProps {
  level: CourtLevel;
  /** Custom team theme; the default slate-on-dark look when absent */
  theme?: CourtTheme | null;
  width?: string | number;
  children?: React.ReactNode;
  className?: string;
  onClick?: React.MouseEventHandler<SVGSVGElement>;
  onDoubleClick?: React.MouseEventHandler<SVGSVGElement>;
  svgRef?: React.Ref<SVGSVGElement>;
}

export default function BasketballCourt({
  level,
  theme = null,
  width = "100%",
  children,
  className,
  onClick,
  onDoubleClick,
  svgRef,
}: BasketballCourtProps) {
  const idPrefix = useId().replace(/:/g, "");
  const config = getCourtConfiguration(level);

  const lines = useMemo(
    () =>
      courtLinePaths(config, COURT_SIZE).map((primitive) => ({
        key: primitive.element,
        d: toSvgPath(primitive),
        dashed: primitive.style === "dashed",
      })),
    [config]
  );

  const background = useMemo(
    () => (theme ? backgroundLayers(theme, config, COURT_SIZE) : null),
    [theme, config]
  );

  const stroke = theme ? lineColorCss(theme.lineColor) : LINE_COLOR;

  return (
    <svg
      ref={svgRef}
      viewBox={`0 0 ${COURT_WIDTH} ${COURT_HEIGHT}`}
      width={width}
      preserveAspectRatio="xMidYMid meet"
      className={className}
      style={{ display: "block" }}
      onClick={onClick}
      onDoubleClick={onDoubleClick}
    >
      {/* ---- Themed background ---- */}
      {background && (
        <g opacity={background.opacity}>
          <defs>
            {background.layers.map((layer, i) => (
              <GradientDef key={i} id={`${idPrefix}-bg-${i}`} paint={layer.paint} />
            ))}
          </defs>
          {background.layers.map((layer, i) => (
            <path key={i} d={layer.d} fill={paintFill(layer.paint, `${idPrefix}-bg-${i}`)} />
          ))}
        </g>
      )}

      {/* ---- Court markings ---- */}
      <g fill="none" stroke={stroke} strokeWidth={LINE_WIDTH}>
        {lines.map((line, i) => (
          <path
            key={`${line.key}-${i}`}
            d={line.d}
            strokeDasharray={line.dashed ? DASH : undefined}
          />
        ))}
      </g>

      {/* ---- Child overlay (zones, heat map, shot markers) ---- */}
      {children}
    </svg>
  );
}
