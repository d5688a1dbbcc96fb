"use client";

import React from "react";
import { isLayupToggleAvailable, shotTypeLabel } from "@/lib/court/shotType";
import { periodLabel } from "@/lib/stats";
import type { AppSettings } from "@/lib/settings";
import type { UpdateShotInput } from "@/hooks/useGame";
import type { Player, Shot } from "@/types";

interface ShotEditorProps {
  shot: Shot;
  /** Jersey numbers that can be assigned; roster for a team game */
  numbers: number[];
  players: Player[];
  settings: AppSettings;
  relocating: boolean;
  busy: boolean;
  onUpdate: (changes: Omit<UpdateShotInput, "shotId">) => void;
  onDelete: () => void;
  onToggleRelocate: () => void;
  onClose: () => void;
}

const buttonClass =
  "rounded-lg px-3 py-1.5 text-xs font-medium transition-colors disabled:opacity-50";

export default function ShotEditor({
  shot,
  numbers,
  players,
  settings,
  relocating,
  busy,
  onUpdate,
  onDelete,
  onToggleRelocate,
  onClose,
}: ShotEditorProps) {
  const nameFor = (number: number) => players.find((p) => p.number === number)?.name;
  const showLayupToggle = settings.showLayup && (shot.isLayup || isLayupToggleAvailable(shot));
  const choices = numbers.includes(shot.playerNumber) || shot.playerNumber === 0
    ? numbers
    : [...numbers, shot.playerNumber].sort((a, b) => a - b);

  return (
    <div className="flex flex-col gap-3 rounded-xl border border-[#FACC15]/40 bg-card p-4 text-sm">
      <div className="flex items-center justify-between">
        <p className="font-semibold text-text-primary">
          {shot.made ? "Made" : "Missed"} {shotTypeLabel(shot.type, settings.useAbbreviations)}
          {shot.isLayup && " · Layup"}
          <span className="ml-2 text-xs font-normal text-text-secondary">
            {periodLabel(shot.quarter)}
          </span>
        </p>
        <button
          type="button"
          onClick={onClose}
          className="text-text-secondary hover:text-text-primary"
          aria-label="Close shot editor"
        >
          ×
        </button>
      </div>

      <div className="flex flex-wrap items-center gap-2">
        <button
          type="button"
          disabled={busy}
          onClick={() => onUpdate({ made: !shot.made })}
          className={`${buttonClass} bg-court-secondary text-text-primary hover:bg-court-accent-alt`}
        >
          Mark {shot.made ? "missed" : "made"}
        </button>
        {showLayupToggle && (
          <button
            type="button"
            disabled={busy}
            onClick={() => onUpdate({ isLayup: !shot.isLayup })}
            className={`${buttonClass} ${
              shot.isLayup ? "bg-court-accent text-white" : "bg-court-secondary text-text-primary"
            }`}
          >
            Layup
          </button>
        )}
        <button
          type="button"
          disabled={busy}
          onClick={onToggleRelocate}
          className={`${buttonClass} ${
            relocating ? "bg-[#FACC15] text-[#0F172A]" : "bg-court-secondary text-text-primary"
          }`}
        >
          {relocating ? "Tap the new spot…" : "Move"}
        </button>
        <button
          type="button"
          disabled={busy}
          onClick={onDelete}
          className={`${buttonClass} bg-[#7F1D1D] text-white hover:bg-[#991B1B]`}
        >
          Delete
        </button>
      </div>

      <div className="flex flex-wrap items-center gap-3">
        <label className="flex items-center gap-2 text-xs text-text-secondary">
          Shooter
          <select
            value={shot.playerNumber}
            disabled={busy}
            onChange={(e) => onUpdate({ playerNumber: Number(e.target.value) })}
            className="rounded bg-court-secondary px-2 py-1 text-text-primary"
          >
            <option value={0}>--</option>
            {choices.map((n) => (
              <option key={n} value={n}>
                #{n}
                {nameFor(n) ? ` ${nameFor(n)}` : ""}
              </option>
            ))}
          </select>
        </label>
        <label className="flex items-center gap-2 text-xs text-text-secondary">
          Period
          <input
            type="number"
            min={1}
            value={shot.quarter}
            disabled={busy}
            onChange={(e) => {
              const quarter = Number(e.target.value);
              if (Number.isInteger(quarter) && quarter >= 1) onUpdate({ quarter });
            }}
            className="w-16 rounded bg-court-secondary px-2 py-1 text-text-primary"
          />
        </label>
      </div>
    </div>
  );
}
