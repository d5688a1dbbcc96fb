"use client";

import React from "react";
import { shotTypeLabel } from "@/lib/court/shotType";
import { describeSubstitution, gameTimeline } from "@/lib/game";
import { periodLabel } from "@/lib/stats";
import type { Shot, Substitution } from "@/types";

const MAX_EVENTS = 12;

interface PlayByPlayProps {
  shots: Shot[];
  substitutions: Substitution[];
  useAbbreviations: boolean;
  onSelectShot: (id: string) => void;
}

/** Most recent shots and substitutions, newest first. */
export default function PlayByPlay({
  shots,
  substitutions,
  useAbbreviations,
  onSelectShot,
}: PlayByPlayProps) {
  const events = gameTimeline(shots, substitutions).reverse().slice(0, MAX_EVENTS);

  if (events.length === 0) {
    return <p className="text-xs text-text-secondary">Tap the court to log the first shot.</p>;
  }

  return (
    <ul className="flex flex-col gap-1 text-xs">
      {events.map((event) =>
        event.kind === "shot" ? (
          <li key={event.shot.id}>
            <button
              type="button"
              onClick={() => onSelectShot(event.shot.id)}
              className="flex w-full items-center gap-2 rounded px-1 py-0.5 text-left hover:bg-court-secondary"
            >
              <span className="w-8 text-text-secondary/70">{periodLabel(event.shot.quarter)}</span>
              <span className={event.shot.made ? "text-[#4ADE80]" : "text-[#F87171]"}>
                {event.shot.made ? "✓" : "✗"}
              </span>
              <span className="text-text-primary">
                {event.shot.playerNumber > 0 ? `#${event.shot.playerNumber} ` : ""}
                {shotTypeLabel(event.shot.type, useAbbreviations)}
                {event.shot.isLayup ? " layup" : ""}
              </span>
            </button>
          </li>
        ) : (
          <li key={event.substitution.id} className="flex items-center gap-2 px-1 py-0.5">
            <span className="w-8 text-text-secondary/70">
              {periodLabel(event.substitution.quarter)}
            </span>
            <span className="text-text-secondary">Sub {describeSubstitution(event.substitution)}</span>
          </li>
        )
      )}
    </ul>
  );
}
