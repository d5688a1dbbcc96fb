"use client";

import React, { useState } from "react";
import { useAddPlayer } from "@/hooks/useTeam";
import { usePlayerMutations } from "@/hooks/usePlayer";
import { MAX_JERSEY, MIN_JERSEY } from "@/lib/game";
import type { Player, Team } from "@/types";

const inputClass =
  "rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-sm text-text-primary placeholder:text-text-secondary";

// ============================================================
// One roster row
// ============================================================

function PlayerRowItem({
  player,
  teamId,
  otherTeams,
}: {
  player: Player;
  teamId: string;
  otherTeams: Team[];
}) {
  const { update, archive } = usePlayerMutations(player.id, teamId);
  const [editing, setEditing] = useState(false);
  const [number, setNumber] = useState(String(player.number));
  const [name, setName] = useState(player.name ?? "");
  const error = update.error ?? archive.error;

  const handleSave = (event: React.FormEvent) => {
    event.preventDefault();
    update.mutate(
      { number: Number(number), name },
      { onSuccess: () => setEditing(false) }
    );
  };

  return (
    <li className="flex flex-col gap-1 px-4 py-3">
      {editing ? (
        <form onSubmit={handleSave} className="flex flex-wrap items-center gap-2">
          <input
            type="number"
            min={MIN_JERSEY}
            max={MAX_JERSEY}
            value={number}
            onChange={(e) => setNumber(e.target.value)}
            className={`${inputClass} w-20`}
          />
          <input
            value={name}
            onChange={(e) => setName(e.target.value)}
            placeholder="Name"
            className={`${inputClass} min-w-0 flex-1`}
          />
          <button type="submit" className="text-xs font-medium text-court-accent">
            Save
          </button>
          <button
            type="button"
            onClick={() => setEditing(false)}
            className="text-xs text-text-secondary"
          >
            Cancel
          </button>
        </form>
      ) : (
        <div className="flex items-center justify-between gap-3">
          <div className="flex items-center gap-3">
            <span className="stat-value w-10 text-right font-bold text-court-accent">
              #{player.number}
            </span>
            <span className="text-text-primary">{player.name ?? "(no name)"}</span>
          </div>
          <div className="flex items-center gap-3 text-xs">
            <button
              type="button"
              onClick={() => setEditing(true)}
              className="text-text-secondary hover:text-text-primary"
            >
              Edit
            </button>
            <select
              value=""
              onChange={(e) => {
                const value = e.target.value;
                if (value === "") return;
                update.mutate({ teamId: value === "release" ? null : value });
              }}
              className="rounded bg-court-secondary px-2 py-1 text-text-secondary"
              aria-label="Move player"
            >
              <option value="">Move…</option>
              {otherTeams.map((t) => (
                <option key={t.id} value={t.id}>
                  {t.name}
                </option>
              ))}
              <option value="release">Release</option>
            </select>
            <button
              type="button"
              onClick={() => archive.mutate()}
              className="text-[#F87171] hover:text-[#EF4444]"
            >
              Archive
            </button>
          </div>
        </div>
      )}
      {error && <p className="text-xs text-[#F87171]">{error.message}</p>}
    </li>
  );
}

// ============================================================
// Component
// ============================================================

interface RosterPanelProps {
  team: Team;
  players: Player[];
  /** Teams a player can move to */
  otherTeams: Team[];
}

export default function RosterPanel({ team, players, otherTeams }: RosterPanelProps) {
  const addPlayer = useAddPlayer(team.id);
  const [number, setNumber] = useState("");
  const [name, setName] = useState("");

  const handleAdd = (event: React.FormEvent) => {
    event.preventDefault();
    addPlayer.mutate(
      { number: Number(number), name: name.trim() || undefined },
      {
        onSuccess: () => {
          setNumber("");
          setName("");
        },
      }
    );
  };

  return (
    <section className="flex flex-col gap-3">
      <form onSubmit={handleAdd} className="flex flex-wrap items-center gap-2">
        <input
          type="number"
          min={MIN_JERSEY}
          max={MAX_JERSEY}
          value={number}
          onChange={(e) => setNumber(e.target.value)}
          placeholder="#"
          required
          className={`${inputClass} w-20`}
        />
        <input
          value={name}
          onChange={(e) => setName(e.target.value)}
          placeholder="Player name (optional)"
          className={`${inputClass} min-w-0 flex-1`}
        />
        <button
          type="submit"
          disabled={addPlayer.isPending}
          className="rounded-lg bg-court-accent px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-court-accent/80 disabled:opacity-50"
        >
          Add Player
        </button>
        {addPlayer.error && (
          <p className="w-full text-xs text-[#F87171]">{addPlayer.error.message}</p>
        )}
      </form>

      {players.length === 0 ? (
        <div className="rounded-xl border border-[#334155] bg-card px-6 py-8 text-center">
          <p className="text-sm text-text-secondary">No players on the roster.</p>
        </div>
      ) : (
        <ul className="divide-y divide-[#334155]/50 rounded-xl border border-[#334155] bg-card">
          {players.map((player) => (
            <PlayerRowItem
              key={player.id}
              player={player}
              teamId={team.id}
              otherTeams={otherTeams}
            />
          ))}
        </ul>
      )}
    </section>
  );
}
