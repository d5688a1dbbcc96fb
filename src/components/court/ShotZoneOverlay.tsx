"use client";

import React, { useMemo, useState, useCallback, useEffect } from "react";
import { interpolateRgb } from "d3-interpolate";
import { COURT_WIDTH, COURT_HEIGHT, COURT_SIZE } from "./BasketballCourt";
import {
  BASKET_X_FEET,
  feetToPixelsX,
  feetToPixelsY,
  getCourtConfiguration,
  type CourtConfiguration,
  type CourtLevel,
} from "@/lib/court/config";
import { zoneFillPath } from "@/lib/court/svg";
import {
  DEEP_BAND_FEET,
  RESTRICTED_RADIUS_FEET,
  zoneName,
  zonePolygons,
  type ScoringZone,
} from "@/lib/court/zones";
import type { ZoneSummary } from "@/lib/stats";

// ============================================================
// Types
// ============================================================

interface ShotZoneOverlayProps {
  level: CourtLevel;
  zoneSummary: ZoneSummary[];
}

interface TooltipState {
  x: number;
  y: number;
  zone: string;
  fgm: number;
  fga: number;
  fgPct: number;
  average: number;
}

// ============================================================
// Color scale (same as ShotChartHeatMap)
// ============================================================

const COLOR_COLD = "#3B82F6";
const COLOR_NEUTRAL = "#F8FAFC";
const COLOR_HOT = "#EF4444";
const MAX_DIFF = 0.15; // ±15 pp = full saturation

// ============================================================
// Label anchors, in feet
// ============================================================

function labelFeet(
  zone: ScoringZone,
  config: CourtConfiguration
): { x: number; y: number } {
  const basket = config.basketDistanceFeet;
  const arcTop = basket + config.threePointArcFeet;
  switch (zone) {
    case "restricted":
      return { x: BASKET_X_FEET, y: basket + RESTRICTED_RADIUS_FEET / 2 };
    case "paint":
      return {
        x: BASKET_X_FEET,
        y: (basket + RESTRICTED_RADIUS_FEET + config.freeThrowLineDistanceFeet) / 2,
      };
    case "midRange":
      return { x: BASKET_X_FEET, y: (config.freeThrowLineDistanceFeet + arcTop) / 2 };
    case "corner3":
      return { x: config.threePointCornerFeet / 2, y: basket / 2 };
    case "aboveBreak3":
      return { x: BASKET_X_FEET, y: arcTop + DEEP_BAND_FEET / 2 };
    case "deep":
      return { x: BASKET_X_FEET, y: arcTop + DEEP_BAND_FEET + 5 };
  }
}

// ============================================================
// Component
// ============================================================

export default function ShotZoneOverlay({ level, zoneSummary }: ShotZoneOverlayProps) {
  const [tooltip, setTooltip] = useState<TooltipState | null>(null);
  const [hoveredZone, setHoveredZone] = useState<ScoringZone | null>(null);

  // Color interpolators
  const coldToNeutral = useMemo(
    () => interpolateRgb(COLOR_COLD, COLOR_NEUTRAL),
    []
  );
  const neutralToHot = useMemo(
    () => interpolateRgb(COLOR_NEUTRAL, COLOR_HOT),
    []
  );

  const getZoneColor = useCallback(
    (fgPct: number, average: number): string => {
      const diff = fgPct - average;
      if (diff <= 0) {
        const t = Math.min(Math.abs(diff) / MAX_DIFF, 1);
        return coldToNeutral(1 - t);
      } else {
        const t = Math.min(diff / MAX_DIFF, 1);
        return neutralToHot(t);
      }
    },
    [coldToNeutral, neutralToHot]
  );

  // Zones are colored against the FG% over every zone
  const average = useMemo(() => {
    const fga = zoneSummary.reduce((sum, z) => sum + z.fga, 0);
    const fgm = zoneSummary.reduce((sum, z) => sum + z.fgm, 0);
    return fga > 0 ? fgm / fga : 0;
  }, [zoneSummary]);

  // Build zone data: merge zone paths with stats from zoneSummary
  const zones = useMemo(() => {
    const config = getCourtConfiguration(level);
    return zonePolygons(config, COURT_SIZE).map((fill) => {
      const stats = zoneSummary.find((z) => z.zone === fill.zone);
      const fgm = stats?.fgm ?? 0;
      const fga = stats?.fga ?? 0;
      const fgPct = stats?.fgPct ?? 0;
      const anchor = labelFeet(fill.zone, config);

      return {
        zone: fill.zone,
        name: zoneName(fill.zone),
        pathD: zoneFillPath(fill),
        fgm,
        fga,
        fgPct,
        color: fga > 0 ? getZoneColor(fgPct, average) : "transparent",
        labelPos: {
          x: feetToPixelsX(anchor.x, COURT_SIZE),
          y: feetToPixelsY(anchor.y, COURT_SIZE),
        },
      };
    });
  }, [level, zoneSummary, getZoneColor, average]);

  const showTooltip = useCallback(
    (zone: (typeof zones)[number], target: EventTarget) => {
      setHoveredZone(zone.zone);
      if (zone.fga === 0) return;
      if (!(target instanceof SVGElement)) return;
      const svg = target.closest("svg");
      if (!svg) return;
      const rect = svg.getBoundingClientRect();
      const scaleX = rect.width / COURT_WIDTH;
      const scaleY = rect.height / COURT_HEIGHT;
      setTooltip({
        x: rect.left + zone.labelPos.x * scaleX,
        y: rect.top + zone.labelPos.y * scaleY - 40,
        zone: zone.name,
        fgm: zone.fgm,
        fga: zone.fga,
        fgPct: zone.fgPct,
        average,
      });
    },
    [average]
  );

  const handleMouseLeave = useCallback(() => {
    setHoveredZone(null);
    setTooltip(null);
  }, []);

  // Dismiss tooltip on outside touch
  useEffect(() => {
    if (!tooltip) return;
    const dismiss = () => {
      setTooltip(null);
      setHoveredZone(null);
    };
    const timer = setTimeout(() => {
      document.addEventListener("touchstart", dismiss, { once: true });
    }, 10);
    return () => {
      clearTimeout(timer);
      document.removeEventListener("touchstart", dismiss);
    };
  }, [tooltip]);

  if (zoneSummary.every((z) => z.fga === 0)) {
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
        {zones.map((zone) => (
          <path
            key={zone.zone}
            d={zone.pathD}
            fill={zone.color}
            fillOpacity={
              zone.fga === 0 ? 0 : hoveredZone === zone.zone ? 0.7 : 0.5
            }
            fillRule="evenodd"
            stroke="none"
            onMouseEnter={(e) => showTooltip(zone, e.target)}
            onMouseLeave={handleMouseLeave}
            onTouchStart={(e) => {
              e.preventDefault();
              showTooltip(zone, e.target);
            }}
            style={{ cursor: zone.fga > 0 ? "pointer" : "default" }}
          />
        ))}
      </g>

      {/* Labels above every fill so a later zone never covers them */}
      <g style={{ pointerEvents: "none" }}>
        {zones
          .filter((zone) => zone.fga > 0)
          .map((zone) => {
            const small = zone.zone === "restricted" || zone.zone === "corner3";
            return (
              <g key={zone.zone}>
                <text
                  x={zone.labelPos.x}
                  y={zone.labelPos.y}
                  textAnchor="middle"
                  dominantBaseline="central"
                  fill="#0F172A"
                  fontSize={small ? 11 : 13}
                  fontWeight={700}
                >
                  {(zone.fgPct * 100).toFixed(0)}%
                </text>
                <text
                  x={zone.labelPos.x}
                  y={zone.labelPos.y + (small ? 13 : 16)}
                  textAnchor="middle"
                  dominantBaseline="central"
                  fill="#334155"
                  fontSize={small ? 9 : 10}
                >
                  {zone.fgm}/{zone.fga}
                </text>
              </g>
            );
          })}
      </g>

      {/* Tooltip */}
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
            <div style={{ fontWeight: 600 }}>{tooltip.zone}</div>
            <div>
              FG%: {(tooltip.fgPct * 100).toFixed(1)}% ({tooltip.fgm}/
              {tooltip.fga})
            </div>
            <div
              style={{
                color: tooltip.fgPct >= tooltip.average ? "#4ADE80" : "#F87171",
              }}
            >
              vs Game Avg:{" "}
              {tooltip.fgPct >= tooltip.average ? "+" : ""}
              {((tooltip.fgPct - tooltip.average) * 100).toFixed(1)}%
            </div>
          </div>
        </foreignObject>
      )}
    </>
  );
}
