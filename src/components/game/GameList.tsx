"use client";

import React, { useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import ErrorState from "@/components/ui/ErrorState";
import { useCreateGame, useGames } from "@/hooks/useGames";
import type { Team } from "@/types";

function formatDate(iso: string): string {
  return new Date(iso).toLocaleDateString("en-US", {
    month: "short",
    day: "numeric",
    year: "numeric",
  });
}

// ============================================================
// Component
// ============================================================

interface GameListProps {
  /** Only this team's games, and new games are created for it */
  team?: Team;
  /** Names for the team column when listing every game */
  teams?: Team[];
}

export default function GameList({ team, teams = [] }: GameListProps) {
  const router = useRouter();
  const { data, isLoading, error, refetch } = useGames(team?.id);
  const createGame = useCreateGame();
  const [name, setName] = useState("");
  const games = data?.games ?? [];

  const teamName = (teamId: string | null): string => {
    if (!teamId) return "Pickup";
    return teams.find((t) => t.id === teamId)?.name ?? team?.name ?? "";
  };

  const handleCreate = (event: React.FormEvent) => {
    event.preventDefault();
    createGame.mutate(
      { teamId: team?.id ?? null, name: name.trim() || undefined },
      {
        onSuccess: (res) => {
          setName("");
          router.push(`/games/${res.game.id}`);
        },
      }
    );
  };

  return (
    <section className="flex flex-col gap-4">
      <form onSubmit={handleCreate} className="flex flex-wrap items-center gap-2">
        <input
          value={name}
          onChange={(e) => setName(e.target.value)}
          placeholder={team ? `Game name (optional)` : "Pickup game name (optional)"}
          className="min-w-0 flex-1 rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-sm text-text-primary placeholder:text-text-secondary"
        />
        <button
          type="submit"
          disabled={createGame.isPending}
          className="rounded-lg bg-court-accent px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-court-accent/80 disabled:opacity-50"
        >
          {team ? "New Game" : "New Pickup Game"}
        </button>
        {createGame.error && (
          <p className="w-full text-xs text-[#F87171]">{createGame.error.message}</p>
        )}
      </form>

      {error ? (
        <ErrorState section="games" error={error} onRetry={() => refetch()} compact />
      ) : isLoading ? (
        <div className="h-24 animate-pulse rounded-xl bg-card" />
      ) : games.length === 0 ? (
        <div className="rounded-xl border border-[#334155] bg-card px-6 py-8 text-center">
          <p className="text-sm text-text-secondary">No games yet.</p>
        </div>
      ) : (
        <ul className="divide-y divide-[#334155]/50 overflow-hidden rounded-xl border border-[#334155] bg-card">
          {games.map((game) => (
            <li key={game.id}>
              <Link
                href={`/games/${game.id}`}
                className="flex items-center justify-between px-4 py-3 transition-colors hover:bg-court-secondary"
              >
                <div>
                  <p className="font-medium text-text-primary">{game.name ?? "Untitled game"}</p>
                  {!team && <p className="text-xs text-text-secondary">{teamName(game.teamId)}</p>}
                </div>
                <span className="stat-value text-xs text-text-secondary">
                  {formatDate(game.date)}
                </span>
              </Link>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
