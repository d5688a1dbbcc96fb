"use client";

import React, { useState } from "react";
import { describeSubstitution, MAX_JERSEY, MAX_ON_COURT, MIN_JERSEY } from "@/lib/game";
import { periodLabel } from "@/lib/stats";
import type { ApiError } from "@/lib/queries";
import type { SubstitutionInput } from "@/hooks/useGame";
import type { Player, Substitution } from "@/types";

interface LineupPanelProps {
  onCourt: number[];
  /** Empty for a pickup game: any jersey number can be entered */
  roster: Player[];
  substitutions: Substitution[];
  quarter: number;
  busy: boolean;
  error: ApiError | null;
  onSubstitute: (input: SubstitutionInput) => void;
  onSetLineup: (onCourt: number[]) => void;
}

const selectClass = "rounded bg-court-secondary px-2 py-1 text-xs text-text-primary";

export default function LineupPanel({
  onCourt,
  roster,
  substitutions,
  quarter,
  busy,
  error,
  onSubstitute,
  onSetLineup,
}: LineupPanelProps) {
  const [playerOut, setPlayerOut] = useState(0);
  const [playerIn, setPlayerIn] = useState(0);
  const [extra, setExtra] = useState("");
  const pickup = roster.length === 0;
  const bench = roster.map((p) => p.number).filter((n) => !onCourt.includes(n));

  const toggleStarter = (number: number) => {
    onSetLineup(
      onCourt.includes(number) ? onCourt.filter((n) => n !== number) : [...onCourt, number]
    );
  };

  const addNumber = (event: React.FormEvent) => {
    event.preventDefault();
    const number = Number(extra);
    if (!Number.isInteger(number) || number < MIN_JERSEY || number > MAX_JERSEY) return;
    onSetLineup([...onCourt, number]);
    setExtra("");
  };

  const handleSubstitute = (event: React.FormEvent) => {
    event.preventDefault();
    if (playerOut === 0) return;
    onSubstitute({ playerOut, playerIn, quarter });
    setPlayerOut(0);
    setPlayerIn(0);
  };

  return (
    <div className="flex flex-col gap-4 rounded-xl bg-card p-4 text-sm">
      <div>
        <h3 className="mb-2 text-xs uppercase tracking-wide text-text-secondary">
          On court ({onCourt.length}/{MAX_ON_COURT})
        </h3>
        <div className="flex flex-wrap gap-2">
          {(pickup ? onCourt : roster.map((p) => p.number)).map((number) => {
            const active = onCourt.includes(number);
            return (
              <button
                key={number}
                type="button"
                disabled={busy}
                onClick={() => toggleStarter(number)}
                className={`stat-value rounded-full px-3 py-1 text-xs font-semibold transition-colors ${
                  active
                    ? "bg-court-accent text-white"
                    : "bg-court-secondary text-text-secondary hover:text-text-primary"
                }`}
              >
                #{number}
              </button>
            );
          })}
        </div>
        {pickup && onCourt.length < MAX_ON_COURT && (
          <form onSubmit={addNumber} className="mt-2 flex items-center gap-2">
            <input
              type="number"
              min={MIN_JERSEY}
              max={MAX_JERSEY}
              value={extra}
              onChange={(e) => setExtra(e.target.value)}
              placeholder="#"
              className="w-20 rounded bg-court-secondary px-2 py-1 text-xs text-text-primary"
            />
            <button type="submit" className="text-xs font-medium text-court-accent">
              Add
            </button>
          </form>
        )}
      </div>

      {onCourt.length > 0 && (
        <form onSubmit={handleSubstitute} className="flex flex-wrap items-center gap-2">
          <span className="text-xs uppercase tracking-wide text-text-secondary">Sub</span>
          <select
            value={playerOut}
            onChange={(e) => setPlayerOut(Number(e.target.value))}
            className={selectClass}
            aria-label="Player out"
          >
            <option value={0}>Out…</option>
            {onCourt.map((n) => (
              <option key={n} value={n}>
                #{n}
              </option>
            ))}
          </select>
          {pickup ? (
            <input
              type="number"
              min={0}
              max={MAX_JERSEY}
              value={playerIn === 0 ? "" : playerIn}
              onChange={(e) => setPlayerIn(Number(e.target.value) || 0)}
              placeholder="In #"
              className="w-20 rounded bg-court-secondary px-2 py-1 text-xs text-text-primary"
            />
          ) : (
            <select
              value={playerIn}
              onChange={(e) => setPlayerIn(Number(e.target.value))}
              className={selectClass}
              aria-label="Player in"
            >
              <option value={0}>Nobody</option>
              {bench.map((n) => (
                <option key={n} value={n}>
                  #{n}
                </option>
              ))}
            </select>
          )}
          <button
            type="submit"
            disabled={busy || playerOut === 0}
            className="rounded-lg bg-court-accent px-3 py-1 text-xs font-medium text-white disabled:opacity-50"
          >
            Substitute
          </button>
        </form>
      )}

      {error && <p className="text-xs text-[#F87171]">{error.message}</p>}

      {substitutions.length > 0 && (
        <ul className="flex flex-col gap-1 text-xs text-text-secondary">
          {substitutions.map((sub) => (
            <li key={sub.id}>
              <span className="mr-2 text-text-secondary/70">{periodLabel(sub.quarter)}</span>
              {describeSubstitution(sub)}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
