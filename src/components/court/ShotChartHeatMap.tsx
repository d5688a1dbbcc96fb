"use client";

import React, { useMemo, useState, useCallback, useEffect } from "react";
import { hexbin as d3Hexbin } from "d3-hexbin";
import { scaleLinear } from "d3-scale";
import { interpolateRgb } from "d3-interpolate";
import { COURT_WIDTH, COURT_HEIGHT } from "./BasketballCourt";
import { getCourtConfiguration, type CourtLevel } from "@/lib/court/config";
import { zoneAt, zoneName, type ScoringZone } from "@/lib/court/zones";
import type { ZoneSummary } from "@/lib/stats";
import type { Shot } from "@/types";

// ============================================================
// Types
// ============================================================

interface ShotChartHeatMapProps {
  level: CourtLevel;
  shots: Shot[];
  zoneSummary: ZoneSummary[];
}

interface TooltipState {
  x: number;
  y: number;
  fgm: number;
  fga: number;
  fgPct: number;
  zone: string;
  zoneAvg: number;
}

// ============================================================
// Constants
// ============================================================

const HEX_RADIUS = 10;
const MIN_SHOTS_TO_RENDER = 1;

// Color scale anchors
const COLOR_COLD = "#3B82F6"; // blue: below the zone's FG%
const COLOR_NEUTRAL = "#F8FAFC"; // white: at the zone's FG%
const COLOR_HOT = "#EF4444"; // red: above the zone's FG%

const ZONE_AVG_FALLBACK = 0.4;

// ============================================================
// Helpers
// ============================================================

/** Free throws are left off the heat map, like the zone summary. */
function isFieldGoal(shot: Shot): boolean {
  return shot.type !== "freeThrow" && shot.x >= 0 && shot.x <= 1 && shot.y >= 0 && shot.y <= 1;
}

function getZoneAvg(zone: ScoringZone, zoneSummary: ZoneSummary[]): number {
  const match = zoneSummary.find((z) => z.zone === zone);
  return match && match.fga > 0 ? match.fgPct : ZONE_AVG_FALLBACK;
}

// ============================================================
// Component
// ============================================================

export default function ShotChartHeatMap({
  level,
  shots,
  zoneSummary,
}: ShotChartHeatMapProps) {
  const [tooltip, setTooltip] = useState<TooltipState | null>(null);

  const fieldGoals = useMemo(() => shots.filter(isFieldGoal), [shots]);

  // Build hexbin layout and compute bins
  const { bins, hexPath, opacityScale } = useMemo(() => {
    const hexbinLayout = d3Hexbin<Shot>()
      .x((d) => d.x * COURT_WIDTH)
      .y((d) => d.y * COURT_HEIGHT)
      .radius(HEX_RADIUS)
      .extent([
        [0, 0],
        [COURT_WIDTH, COURT_HEIGHT],
      ]);

    const binsResult = hexbinLayout(fieldGoals);
    const path = hexbinLayout.hexagon();

    // Find max bin count for opacity scaling
    const maxCount = binsResult.reduce(
      (max, bin) => Math.max(max, bin.length),
      0
    );

    const opacity = scaleLinear<number>()
      .domain([1, Math.max(maxCount * 0.4, 3), Math.max(maxCount, 10)])
      .range([0.3, 0.7, 1.0])
      .clamp(true);

    return { bins: binsResult, hexPath: path, opacityScale: opacity };
  }, [fieldGoals]);

  // Color interpolators
  const coldToNeutral = useMemo(
    () => interpolateRgb(COLOR_COLD, COLOR_NEUTRAL),
    []
  );
  const neutralToHot = useMemo(
    () => interpolateRgb(COLOR_NEUTRAL, COLOR_HOT),
    []
  );

  const getHexColor = useCallback(
    (fgPct: number, zoneAvg: number): string => {
      // diff: negative = below avg, 0 = at avg, positive = above avg
      const diff = fgPct - zoneAvg;
      // ±0.15 (15 percentage points) = full color
      const maxDiff = 0.15;
      if (diff <= 0) {
        const t = Math.min(Math.abs(diff) / maxDiff, 1);
        return coldToNeutral(1 - t); // 1 = neutral, 0 = cold
      } else {
        const t = Math.min(diff / maxDiff, 1);
        return neutralToHot(t); // 0 = neutral, 1 = hot
      }
    },
    [coldToNeutral, neutralToHot]
  );

  // Compute stats for each bin
  const binData = useMemo(() => {
    const config = getCourtConfiguration(level);
    return bins
      .filter((bin) => bin.length >= MIN_SHOTS_TO_RENDER)
      .map((bin) => {
        const fga = bin.length;
        const fgm = bin.filter((shot) => shot.made).length;
        const fgPct = fga > 0 ? fgm / fga : 0;

        // Determine the dominant zone in this bin
        const zoneCounts = new Map<ScoringZone, number>();
        for (const shot of bin) {
          const z = zoneAt(shot, config);
          zoneCounts.set(z, (zoneCounts.get(z) ?? 0) + 1);
        }
        const [zone] = [...zoneCounts.entries()].sort((a, b) => b[1] - a[1])[0];

        const zoneAvg = getZoneAvg(zone, zoneSummary);

        return {
          x: bin.x,
          y: bin.y,
          fga,
          fgm,
          fgPct,
          zone: zoneName(zone),
          zoneAvg,
          color: getHexColor(fgPct, zoneAvg),
          opacity: opacityScale(fga),
        };
      });
  }, [bins, level, zoneSummary, getHexColor, opacityScale]);

  const showTooltip = useCallback(
    (bin: (typeof binData)[number], target: EventTarget) => {
      if (!(target instanceof SVGElement)) return;
      const svg = target.closest("svg");
      if (!svg) return;
      const rect = svg.getBoundingClientRect();
      // Convert SVG coordinates to pixel coordinates
      const scaleX = rect.width / COURT_WIDTH;
      const scaleY = rect.height / COURT_HEIGHT;
      setTooltip({
        x: rect.left + bin.x * scaleX,
        y: rect.top + bin.y * scaleY - 10,
        fgm: bin.fgm,
        fga: bin.fga,
        fgPct: bin.fgPct,
        zone: bin.zone,
        zoneAvg: bin.zoneAvg,
      });
    },
    []
  );

  const handleMouseLeave = useCallback(() => {
    setTooltip(null);
  }, []);

  // Dismiss tooltip on outside touch
  useEffect(() => {
    if (!tooltip) return;
    const dismiss = () => setTooltip(null);
    const timer = setTimeout(() => {
      document.addEventListener("touchstart", dismiss, { once: true });
    }, 10);
    return () => {
      clearTimeout(timer);
      document.removeEventListener("touchstart", dismiss);
    };
  }, [tooltip]);

  // Empty state
  if (fieldGoals.length === 0) {
    return (
      <text
        x={COURT_WIDTH / 2}
        y={COURT_HEIGHT / 2}
        textAnchor="middle"
        fill="#94A3B8"
        fontSize={14}
      >
        No field goal attempts yet
      </text>
    );
  }

  return (
    <>
      <g>
        {binData.map((bin, i) => (
          <path
            key={i}
            d={hexPath}
            transform={`translate(${bin.x},${bin.y})`}
            fill={bin.color}
            fillOpacity={bin.opacity}
            stroke={bin.color}
            strokeOpacity={bin.opacity * 0.5}
            strokeWidth={0.5}
            onMouseEnter={(e) => showTooltip(bin, e.target)}
            onMouseLeave={handleMouseLeave}
            onTouchStart={(e) => {
              e.preventDefault();
              showTooltip(bin, e.target);
            }}
            style={{ cursor: "crosshair" }}
          />
        ))}
      </g>

      {/* Tooltip rendered outside SVG via fixed positioning */}
      {tooltip && (
        <foreignObject x={0} y={0} width={COURT_WIDTH} height={COURT_HEIGHT}>
          <div
            style={{
              position: "fixed",
              left: Math.max(8, Math.min(tooltip.x, typeof window !== "undefined" ? window.innerWidth - 8 : tooltip.x)),
              top: Math.max(8, tooltip.y),
              transform: `translate(${
                tooltip.x < 100 ? "0%" : (typeof window !== "undefined" && tooltip.x > window.innerWidth - 100) ? "-100%" : "-50%"
              }, -100%)`,
              pointerEvents: "none",
              zIndex: 50,
              background: "#0F172A",
              border: "1px solid #334155",
              borderRadius: 8,
              padding: "8px 12px",
              color: "#F8FAFC",
              fontSize: 12,
              lineHeight: 1.5,
              maxWidth: "calc(100vw - 16px)",
              boxShadow: "0 4px 12px rgba(0,0,0,0.4)",
            }}
          >
            <div style={{ fontWeight: 600 }}>
              FG%: {(tooltip.fgPct * 100).toFixed(1)}% ({tooltip.fgm}/
              {tooltip.fga} attempts)
            </div>
            <div style={{ color: "#94A3B8" }}>Zone: {tooltip.zone}</div>
            <div
              style={{
                color: tooltip.fgPct >= tooltip.zoneAvg ? "#4ADE80" : "#F87171",
              }}
            >
              vs Zone Avg:{" "}
              {tooltip.fgPct >= tooltip.zoneAvg ? "+" : ""}
              {((tooltip.fgPct - tooltip.zoneAvg) * 100).toFixed(1)}%
            </div>
          </div>
        </foreignObject>
      )}
    </>
  );
}
