"use client";

import React, { useMemo, useState } from "react";
import BasketballCourt from "@/components/court/BasketballCourt";
import { useUpdateTeam } from "@/hooks/useTeam";
import { COURT_LEVELS, courtLevelName, type CourtLevel } from "@/lib/court/config";
import {
  COURT_BACKGROUND_PATTERNS,
  isCourtBackgroundPattern,
  patternInfo,
} from "@/lib/court/theme";
import { courtThemeForTeam } from "@/lib/mappers";
import { effectiveCourtLevel } from "@/lib/settings";
import type { CourtThemeDto, Team } from "@/types";

const LINE_COLOR_OPTIONS = [
  { value: "white", label: "White" },
  { value: "black", label: "Black" },
] as const;

const DEFAULT_NEW_COLOR = "#0F3460";

interface CourtThemeEditorProps {
  team: Team;
}

/** Court level and custom background for a team, with a live preview. */
export default function CourtThemeEditor({ team }: CourtThemeEditorProps) {
  const updateTeam = useUpdateTeam(team.id);
  const [level, setLevel] = useState<CourtLevel | null>(team.courtLevel);
  const [enabled, setEnabled] = useState(team.useCustomCourtTheme);
  const [draft, setDraft] = useState<CourtThemeDto>(team.courtTheme);

  const info = patternInfo(draft.pattern);
  const isCustomLine = draft.lineColor !== "white" && draft.lineColor !== "black";

  const previewTheme = useMemo(
    () => courtThemeForTeam({ ...team, useCustomCourtTheme: enabled, courtTheme: draft }),
    [team, enabled, draft]
  );

  const setColor = (index: number, color: string) => {
    setDraft((d) => ({
      ...d,
      backgroundColors: d.backgroundColors.map((c, i) => (i === index ? color : c)),
    }));
  };

  const addColor = () => {
    setDraft((d) => ({ ...d, backgroundColors: [...d.backgroundColors, DEFAULT_NEW_COLOR] }));
  };

  const removeColor = (index: number) => {
    setDraft((d) => ({
      ...d,
      backgroundColors: d.backgroundColors.filter((_, i) => i !== index),
    }));
  };

  const handleSave = () => {
    updateTeam.mutate({
      courtLevel: level,
      useCustomCourtTheme: enabled,
      courtTheme: {
        ...draft,
        backgroundColors: draft.backgroundColors.slice(0, info.maxColors),
      },
    });
  };

  return (
    <div className="grid gap-6 md:grid-cols-2">
      <div className="flex flex-col gap-4 text-sm">
        {/* Level */}
        <label className="flex flex-col gap-1">
          <span className="text-xs uppercase tracking-wide text-text-secondary">Court</span>
          <select
            value={level ?? ""}
            onChange={(e) => {
              const value = e.target.value;
              setLevel(COURT_LEVELS.find((l) => l === value) ?? null);
            }}
            className="rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-text-primary"
          >
            <option value="">App default</option>
            {COURT_LEVELS.map((l) => (
              <option key={l} value={l}>
                {courtLevelName(l)}
              </option>
            ))}
          </select>
        </label>

        <label className="flex items-center gap-2 text-text-primary">
          <input
            type="checkbox"
            checked={enabled}
            onChange={(e) => setEnabled(e.target.checked)}
          />
          Custom court background
        </label>

        {enabled && (
          <>
            <label className="flex flex-col gap-1">
              <span className="text-xs uppercase tracking-wide text-text-secondary">Pattern</span>
              <select
                value={draft.pattern}
                onChange={(e) => {
                  const value = e.target.value;
                  if (isCourtBackgroundPattern(value)) {
                    setDraft((d) => ({ ...d, pattern: value }));
                  }
                }}
                className="rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-text-primary"
              >
                {COURT_BACKGROUND_PATTERNS.map((pattern) => (
                  <option key={pattern} value={pattern}>
                    {patternInfo(pattern).name}
                  </option>
                ))}
              </select>
              <span className="text-xs text-text-secondary">{info.description}</span>
            </label>

            {info.maxColors > 0 && (
              <div className="flex flex-col gap-1">
                <span className="text-xs uppercase tracking-wide text-text-secondary">
                  Colors ({info.minColors}–{info.maxColors})
                </span>
                <div className="flex flex-wrap items-center gap-2">
                  {draft.backgroundColors.map((color, i) => (
                    <div key={i} className="flex items-center gap-1">
                      <input
                        type="color"
                        value={color}
                        onChange={(e) => setColor(i, e.target.value.toUpperCase())}
                        className={`h-8 w-10 rounded ${i >= info.maxColors ? "opacity-40" : ""}`}
                      />
                      <button
                        type="button"
                        onClick={() => removeColor(i)}
                        className="text-xs text-text-secondary hover:text-text-primary"
                        aria-label="Remove color"
                      >
                        ×
                      </button>
                    </div>
                  ))}
                  {draft.backgroundColors.length < info.maxColors && (
                    <button
                      type="button"
                      onClick={addColor}
                      className="rounded-lg border border-dashed border-[#334155] px-2 py-1 text-xs text-text-secondary hover:text-text-primary"
                    >
                      + Color
                    </button>
                  )}
                </div>
              </div>
            )}

            <label className="flex flex-col gap-1">
              <span className="text-xs uppercase tracking-wide text-text-secondary">
                Opacity {Math.round(draft.backgroundAlpha * 100)}%
              </span>
              <input
                type="range"
                min={0.05}
                max={1}
                step={0.05}
                value={draft.backgroundAlpha}
                onChange={(e) => setDraft((d) => ({ ...d, backgroundAlpha: Number(e.target.value) }))}
              />
            </label>

            {info.supportsScale && (
              <label className="flex flex-col gap-1">
                <span className="text-xs uppercase tracking-wide text-text-secondary">
                  Pattern size ×{draft.patternScale.toFixed(1)}
                </span>
                <input
                  type="range"
                  min={0.5}
                  max={3}
                  step={0.1}
                  value={draft.patternScale}
                  onChange={(e) => setDraft((d) => ({ ...d, patternScale: Number(e.target.value) }))}
                />
              </label>
            )}

            <div className="flex flex-col gap-1">
              <span className="text-xs uppercase tracking-wide text-text-secondary">Lines</span>
              <div className="flex items-center gap-2">
                {LINE_COLOR_OPTIONS.map((opt) => (
                  <button
                    key={opt.value}
                    type="button"
                    onClick={() => setDraft((d) => ({ ...d, lineColor: opt.value }))}
                    className={`rounded-lg px-3 py-1.5 text-xs font-medium ${
                      draft.lineColor === opt.value
                        ? "bg-court-accent text-white"
                        : "bg-court-secondary text-text-secondary hover:text-text-primary"
                    }`}
                  >
                    {opt.label}
                  </button>
                ))}
                <input
                  type="color"
                  value={isCustomLine ? draft.lineColor : "#FFFFFF"}
                  onChange={(e) => setDraft((d) => ({ ...d, lineColor: e.target.value.toUpperCase() }))}
                  className={`h-8 w-10 rounded ${isCustomLine ? "ring-2 ring-court-accent" : ""}`}
                  aria-label="Custom line color"
                />
              </div>
            </div>
          </>
        )}

        <div className="flex items-center gap-3">
          <button
            type="button"
            onClick={handleSave}
            disabled={updateTeam.isPending}
            className="rounded-lg bg-court-accent px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-court-accent/80 disabled:opacity-50"
          >
            Save Court
          </button>
          {updateTeam.error && (
            <p className="text-xs text-[#F87171]">{updateTeam.error.message}</p>
          )}
        </div>
      </div>

      {/* Preview */}
      <div className="rounded-xl bg-court-secondary p-3">
        <BasketballCourt level={effectiveCourtLevel(level)} theme={previewTheme} />
      </div>
    </div>
  );
}
