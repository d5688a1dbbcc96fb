import { supabaseServer as supabase } from "@/lib/supabase";
import { DatabaseError } from "@/lib/http";
import type { GameRow, PlayerRow, ShotRow, TeamRow } from "@/types";

// ============================================================
// Lookups shared by several API routes.
// Each returns null for a missing row and throws DatabaseError
// when the query itself fails.
// ============================================================

export async function findTeam(id: string): Promise<TeamRow | null> {
  const { data, error } = await supabase
    .from("teams")
    .select("*")
    .eq("id", id)
    .maybeSingle();
  if (error) throw new DatabaseError("team lookup", error);
  return data;
}

export async function findPlayer(id: string): Promise<PlayerRow | null> {
  const { data, error } = await supabase
    .from("players")
    .select("*")
    .eq("id", id)
    .maybeSingle();
  if (error) throw new DatabaseError("player lookup", error);
  return data;
}

export async function activePlayers(teamId: string): Promise<PlayerRow[]> {
  const { data, error } = await supabase
    .from("players")
    .select("*")
    .eq("team_id", teamId)
    .is("archived_at", null)
    .order("number", { ascending: true });
  if (error) throw new DatabaseError("roster", error);
  return data ?? [];
}

/** Active player wearing `number` on a team, if any. */
export async function findPlayerByNumber(
  teamId: string,
  number: number
): Promise<PlayerRow | null> {
  const { data, error } = await supabase
    .from("players")
    .select("*")
    .eq("team_id", teamId)
    .eq("number", number)
    .is("archived_at", null)
    .maybeSingle();
  if (error) throw new DatabaseError("jersey lookup", error);
  return data;
}

export interface GameContext {
  game: GameRow;
  team: TeamRow | null;
}

/** A game and the team it belongs to (null for a pickup game). */
export async function findGameWithTeam(id: string): Promise<GameContext | null> {
  const { data: game, error } = await supabase
    .from("games")
    .select("*")
    .eq("id", id)
    .maybeSingle();
  if (error) throw new DatabaseError("game lookup", error);
  if (!game) return null;

  const team = game.team_id ? await findTeam(game.team_id) : null;
  return { game, team };
}

export async function gameShots(gameId: string): Promise<ShotRow[]> {
  const { data, error } = await supabase
    .from("shots")
    .select("*")
    .eq("game_id", gameId)
    .order("timestamp", { ascending: true });
  if (error) throw new DatabaseError("shots", error);
  return data ?? [];
}

/** Jersey number → name for a team's active roster. */
export async function rosterNames(
  teamId: string | null
): Promise<Map<number, string | null>> {
  if (!teamId) return new Map();
  const players = await activePlayers(teamId);
  return new Map(players.map((p) => [p.number, p.name]));
}
