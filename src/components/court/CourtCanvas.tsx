"use client";

import React, { useState, useRef } from "react";
import BasketballCourt, { COURT_HEIGHT, COURT_SIZE, COURT_WIDTH } from "./BasketballCourt";
import ShotChartHeatMap from "./ShotChartHeatMap";
import ShotZoneOverlay from "./ShotZoneOverlay";
import { normalizePoint, type CourtLevel, type NormalizedPosition } from "@/lib/court/config";
import type { CourtTheme } from "@/lib/court/theme";
import type { ZoneSummary } from "@/lib/stats";
import type { Shot } from "@/types";

// ============================================================
// Types
// ============================================================

export type CourtMode = "shots" | "heatmap" | "zones";

interface CourtCanvasProps {
  level: CourtLevel;
  theme: CourtTheme | null;
  shots: Shot[];
  zoneSummary: ZoneSummary[];
  loading: boolean;
  selectedShotId: string | null;
  onSelectShot: (id: string | null) => void;
  /** A tap on open court in the shots view */
  onCourtTap: (position: NormalizedPosition) => void;
}

// ============================================================
// Options
// ============================================================

const MODE_OPTIONS: { value: CourtMode; label: string }[] = [
  { value: "shots", label: "Shots" },
  { value: "heatmap", label: "Heat Map" },
  { value: "zones", label: "Shot Zones" },
];

const MARKER_RADIUS = 7;

// ============================================================
// Shot markers
// ============================================================

function ShotMarker({
  shot,
  selected,
  onSelect,
}: {
  shot: Shot;
  selected: boolean;
  onSelect: () => void;
}) {
  const cx = shot.x * COURT_WIDTH;
  const cy = shot.y * COURT_HEIGHT;
  const color = shot.made ? "#22C55E" : "#EF4444";
  const r = MARKER_RADIUS;

  return (
    <g
      onClick={(e) => {
        e.stopPropagation();
        onSelect();
      }}
      style={{ cursor: "pointer" }}
    >
      {selected && (
        <circle cx={cx} cy={cy} r={r + 4} fill="none" stroke="#FACC15" strokeWidth={2} />
      )}
      {shot.made ? (
        <circle cx={cx} cy={cy} r={r} fill={color} fillOpacity={0.85} stroke="#0F172A" />
      ) : (
        <path
          d={`M ${cx - r} ${cy - r} L ${cx + r} ${cy + r} M ${cx + r} ${cy - r} L ${cx - r} ${cy + r}`}
          stroke={color}
          strokeWidth={3}
        />
      )}
      {shot.playerNumber > 0 && (
        <text
          x={cx}
          y={cy - r - 3}
          textAnchor="middle"
          fontSize={9}
          fill="#F8FAFC"
          style={{ pointerEvents: "none" }}
        >
          {shot.playerNumber}
        </text>
      )}
    </g>
  );
}

// ============================================================
// Component
// ============================================================

export default function CourtCanvas({
  level,
  theme,
  shots,
  zoneSummary,
  loading,
  selectedShotId,
  onSelectShot,
  onCourtTap,
}: CourtCanvasProps) {
  const [mode, setMode] = useState<CourtMode>("shots");
  const [overlayOpacity, setOverlayOpacity] = useState(1);
  const pendingMode = useRef<CourtMode | null>(null);
  const svgRef = useRef<SVGSVGElement>(null);

  // Fade-out → swap → fade-in when mode changes
  const handleModeSwitch = (newMode: CourtMode) => {
    if (newMode === mode) return;
    pendingMode.current = newMode;
    setOverlayOpacity(0); // fade out
  };

  // After fade-out completes, swap mode and fade back in
  const handleTransitionEnd = () => {
    if (pendingMode.current !== null) {
      setMode(pendingMode.current);
      pendingMode.current = null;
      // Allow a frame for React to render the new overlay, then fade in
      requestAnimationFrame(() => setOverlayOpacity(1));
    }
  };

  const handleCourtClick = (event: React.MouseEvent<SVGSVGElement>) => {
    if (mode !== "shots" || loading) return;
    const svg = svgRef.current;
    if (!svg) return;
    const rect = svg.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return;
    const px = ((event.clientX - rect.left) / rect.width) * COURT_SIZE.width;
    const py = ((event.clientY - rect.top) / rect.height) * COURT_SIZE.height;
    onCourtTap(normalizePoint(px, py, COURT_SIZE));
  };

  return (
    <div className="flex flex-col items-center gap-4">
      {/* ---- Controls ---- */}
      <div className="flex flex-wrap items-center justify-center gap-3">
        <div className="flex rounded-full bg-court-secondary p-1">
          {MODE_OPTIONS.map((opt) => (
            <button
              key={opt.value}
              onClick={() => handleModeSwitch(opt.value)}
              className={`rounded-full px-4 py-3 text-sm font-medium transition-colors sm:py-1.5 ${
                mode === opt.value
                  ? "bg-court-accent text-text-primary"
                  : "text-text-secondary hover:text-text-primary"
              }`}
            >
              {opt.label}
            </button>
          ))}
        </div>
      </div>

      {/* ---- Court ---- */}
      <div
        className="relative w-full"
        role="img"
        aria-label={`Shot chart with ${shots.length} shots`}
      >
        <BasketballCourt
          level={level}
          theme={theme}
          svgRef={svgRef}
          onClick={handleCourtClick}
          className={mode === "shots" ? "cursor-crosshair" : undefined}
        >
          {loading ? (
            <rect
              x={0}
              y={0}
              width={COURT_WIDTH}
              height={COURT_HEIGHT}
              fill="#1A1A2E"
              fillOpacity={0.6}
              className="animate-pulse"
            />
          ) : (
            <g
              style={{ transition: "opacity 200ms ease" }}
              opacity={overlayOpacity}
              onTransitionEnd={handleTransitionEnd}
            >
              {mode === "shots" &&
                shots.map((shot) => (
                  <ShotMarker
                    key={shot.id}
                    shot={shot}
                    selected={shot.id === selectedShotId}
                    onSelect={() => onSelectShot(shot.id === selectedShotId ? null : shot.id)}
                  />
                ))}
              {mode === "heatmap" && (
                <ShotChartHeatMap level={level} shots={shots} zoneSummary={zoneSummary} />
              )}
              {mode === "zones" && <ShotZoneOverlay level={level} zoneSummary={zoneSummary} />}
            </g>
          )}
        </BasketballCourt>
      </div>
    </div>
  );
}
