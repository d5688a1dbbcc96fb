"use client";

import React, { useState } from "react";
import Link from "next/link";
import ErrorState from "@/components/ui/ErrorState";
import { useCreateTeam, useTeams } from "@/hooks/useTeams";
import { COURT_LEVELS, courtLevelName, type CourtLevel } from "@/lib/court/config";

// ============================================================
// Skeleton for team cards while loading
// ============================================================

function TeamCardSkeleton() {
  return (
    <div className="flex animate-pulse items-center gap-4 rounded-xl bg-card p-4">
      <div className="h-12 w-12 shrink-0 rounded-full bg-court-secondary" />
      <div className="flex-1 space-y-2">
        <div className="h-4 w-28 rounded bg-court-secondary" />
        <div className="h-3 w-16 rounded bg-court-secondary" />
      </div>
    </div>
  );
}

// ============================================================
// New team form
// ============================================================

function CreateTeamForm() {
  const [name, setName] = useState("");
  const [level, setLevel] = useState<CourtLevel | "">("");
  const createTeam = useCreateTeam();

  const handleSubmit = (event: React.FormEvent) => {
    event.preventDefault();
    if (!name.trim()) return;
    createTeam.mutate(
      { name, courtLevel: level === "" ? null : level },
      { onSuccess: () => setName("") }
    );
  };

  return (
    <form onSubmit={handleSubmit} className="flex flex-wrap items-center gap-2">
      <input
        value={name}
        onChange={(e) => setName(e.target.value)}
        placeholder="Team name"
        className="min-w-0 flex-1 rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-sm text-text-primary placeholder:text-text-secondary"
      />
      <select
        value={level}
        onChange={(e) => {
          const value = e.target.value;
          setLevel(COURT_LEVELS.find((l) => l === value) ?? "");
        }}
        className="rounded-lg border border-[#334155] bg-court-secondary px-3 py-2 text-sm text-text-primary"
      >
        <option value="">Default court</option>
        {COURT_LEVELS.map((l) => (
          <option key={l} value={l}>
            {courtLevelName(l)}
          </option>
        ))}
      </select>
      <button
        type="submit"
        disabled={createTeam.isPending}
        className="rounded-lg bg-court-accent px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-court-accent/80 disabled:opacity-50"
      >
        Add Team
      </button>
      {createTeam.error && (
        <p className="w-full text-xs text-[#F87171]">{createTeam.error.message}</p>
      )}
    </form>
  );
}

// ============================================================
// Home Page
// ============================================================

export default function Home() {
  const { data, isLoading, error, refetch } = useTeams();
  const teams = data?.teams ?? [];

  return (
    <main className="animate-page-enter mx-auto max-w-7xl px-4 py-10 lg:px-6">
      <div className="mb-8 flex flex-col gap-2">
        <h1 className="text-3xl font-extrabold tracking-tight text-text-primary">Teams</h1>
        <p className="text-sm text-text-secondary">
          Pick a team to manage its roster and games, or start a pickup game from{" "}
          <Link href="/games" className="text-court-accent hover:text-court-accent/80">
            Games
          </Link>
          .
        </p>
      </div>

      <div className="mb-6">
        <CreateTeamForm />
      </div>

      {error ? (
        <ErrorState section="teams" error={error} onRetry={() => refetch()} />
      ) : (
        <div className="grid grid-cols-1 gap-3 sm:grid-cols-2 lg:grid-cols-3">
          {isLoading
            ? Array.from({ length: 6 }).map((_, i) => <TeamCardSkeleton key={i} />)
            : teams.map((team, i) => (
                <Link
                  key={team.id}
                  href={`/teams/${team.id}`}
                  className="animate-card-enter flex items-center gap-4 rounded-xl bg-card p-4 transition-colors hover:bg-court-secondary"
                  style={{ animationDelay: `${i * 50}ms` }}
                >
                  <div className="flex h-12 w-12 shrink-0 items-center justify-center rounded-full bg-court-accent-alt text-lg font-bold text-text-primary">
                    {team.name.charAt(0).toUpperCase()}
                  </div>
                  <div>
                    <p className="font-semibold text-text-primary">{team.name}</p>
                    <p className="text-xs text-text-secondary">
                      {courtLevelName(team.effectiveCourtLevel)}
                      {team.courtLevel === null && " (default)"}
                    </p>
                  </div>
                </Link>
              ))}
        </div>
      )}

      {!isLoading && !error && teams.length === 0 && (
        <div className="rounded-xl border border-[#334155] bg-card px-6 py-10 text-center">
          <p className="text-sm text-text-secondary">No teams yet. Add one above.</p>
        </div>
      )}
    </main>
  );
}
