"use client";

import React from "react";
import GameList from "@/components/game/GameList";
import { useTeams } from "@/hooks/useTeams";

export default function GamesPage() {
  const { data } = useTeams();

  return (
    <main className="animate-page-enter mx-auto max-w-3xl px-4 py-10 lg:px-6">
      <h1 className="mb-6 text-3xl font-extrabold tracking-tight text-text-primary">Games</h1>
      <GameList teams={data?.teams ?? []} />
    </main>
  );
}
