import type { SupabaseClient } from "@supabase/supabase-js";
import type { ActivityLogInsert, Database } from "@/types";

// ============================================================
// Activity Log
// Every roster change is recorded from the player's side and,
// when a team is involved, from the team's side as well.
// ============================================================

export type ActivitySubjectType = "player" | "team";

export type ActivityType =
  | "player_created"
  | "player_archived"
  | "player_joined_team"
  | "player_left_team"
  | "player_jersey_changed"
  | "player_name_changed"
  | "team_created"
  | "team_archived"
  | "team_name_changed"
  | "team_player_joined"
  | "team_player_left";

/** The player fields the descriptions are built from. */
export interface ActivityPlayer {
  id: string;
  teamId: string | null;
  number: number;
  name: string | null;
}

export interface ActivityTeam {
  id: string;
}

function entry(
  subjectId: string,
  subjectType: ActivitySubjectType,
  activityType: ActivityType,
  description: string,
  relatedId: string | null = null
): ActivityLogInsert {
  return {
    subject_id: subjectId,
    subject_type: subjectType,
    activity_type: activityType,
    description_text: description,
    related_id: relatedId,
  };
}

function present(value: string | null | undefined): value is string {
  return value != null && value.length > 0;
}

/** "Jordan (#23)", or "#23" when the player has no name. */
export function playerDescription(player: Pick<ActivityPlayer, "number" | "name">): string {
  return present(player.name)
    ? `${player.name} (#${player.number})`
    : `#${player.number}`;
}

// ---- Player ----

export function playerCreated(
  player: ActivityPlayer,
  teamName: string | null
): ActivityLogInsert[] {
  const entries = [
    entry(
      player.id,
      "player",
      "player_created",
      teamName !== null ? `Created and joined ${teamName}` : "Created (no team)",
      player.teamId
    ),
  ];
  if (player.teamId) {
    entries.push(
      entry(
        player.teamId,
        "team",
        "team_player_joined",
        `${playerDescription(player)} joined`,
        player.id
      )
    );
  }
  return entries;
}

export function playerArchived(
  player: ActivityPlayer,
  teamName: string | null
): ActivityLogInsert[] {
  const entries = [
    entry(
      player.id,
      "player",
      "player_archived",
      teamName !== null ? `Archived from ${teamName}` : "Archived",
      player.teamId
    ),
  ];
  if (player.teamId) {
    entries.push(
      entry(
        player.teamId,
        "team",
        "team_player_left",
        `${playerDescription(player)} archived`,
        player.id
      )
    );
  }
  return entries;
}

export function playerJoinedTeam(
  player: ActivityPlayer,
  teamId: string,
  teamName: string
): ActivityLogInsert[] {
  return [
    entry(player.id, "player", "player_joined_team", `Joined ${teamName}`, teamId),
    entry(
      teamId,
      "team",
      "team_player_joined",
      `${playerDescription(player)} joined`,
      player.id
    ),
  ];
}

export function playerLeftTeam(
  player: ActivityPlayer,
  teamId: string,
  teamName: string
): ActivityLogInsert[] {
  return [
    entry(player.id, "player", "player_left_team", `Left ${teamName}`, teamId),
    entry(
      teamId,
      "team",
      "team_player_left",
      `${playerDescription(player)} left`,
      player.id
    ),
  ];
}

export function playerJerseyChanged(
  player: ActivityPlayer,
  oldNumber: number,
  newNumber: number
): ActivityLogInsert[] {
  return [
    entry(
      player.id,
      "player",
      "player_jersey_changed",
      `Changed jersey #${oldNumber} → #${newNumber}`,
      player.teamId
    ),
  ];
}

export function playerNameChanged(
  player: ActivityPlayer,
  oldName: string | null,
  newName: string | null
): ActivityLogInsert[] {
  const oldDisplay = present(oldName) ? oldName : "(no name)";
  const newDisplay = present(newName) ? newName : "(no name)";
  return [
    entry(
      player.id,
      "player",
      "player_name_changed",
      `Changed name "${oldDisplay}" → "${newDisplay}"`,
      player.teamId
    ),
  ];
}

// ---- Team ----

export function teamCreated(team: ActivityTeam): ActivityLogInsert[] {
  return [entry(team.id, "team", "team_created", "Created")];
}

export function teamArchived(team: ActivityTeam): ActivityLogInsert[] {
  return [entry(team.id, "team", "team_archived", "Archived")];
}

export function teamNameChanged(
  team: ActivityTeam,
  oldName: string | null,
  newName: string | null
): ActivityLogInsert[] {
  const oldDisplay = present(oldName) ? oldName : "(unnamed)";
  const newDisplay = present(newName) ? newName : "(unnamed)";
  return [
    entry(
      team.id,
      "team",
      "team_name_changed",
      `Renamed "${oldDisplay}" → "${newDisplay}"`
    ),
  ];
}

// ============================================================
// Persistence
// ============================================================

/**
 * Insert log entries. A failed write is logged and reported back but never
 * undoes the change that produced it.
 */
export async function writeActivity(
  client: SupabaseClient<Database>,
  entries: ActivityLogInsert[]
): Promise<boolean> {
  if (entries.length === 0) return true;
  const { error } = await client.from("activity_log").insert(entries);
  if (error) {
    console.error("Activity log insert error:", error);
    return false;
  }
  return true;
}
