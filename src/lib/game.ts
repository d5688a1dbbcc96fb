import {
  getCourtConfiguration,
  type CourtLevel,
  type NormalizedPosition,
} from "./court/config";
import { classifyShot, shotTypeCode, shouldAutoFlagLayup } from "./court/shotType";
import type { AppSettings } from "./settings";
import type { ShotInsert, ShotRow, Shot, Substitution } from "@/types";

// ============================================================
// Game tracking rules
// ============================================================

export const MAX_ON_COURT = 5;
export const MIN_JERSEY = 1;
export const MAX_JERSEY = 99;
export const REGULATION_QUARTERS = 4;

export function isJerseyNumber(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_JERSEY &&
    value <= MAX_JERSEY
  );
}

export function isQuarter(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

export function isNormalizedCoordinate(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 1;
}

// ---- On-court set ----

/** "3, 5,11" → [3, 5, 11]. Junk entries are skipped. */
export function parseOnCourt(raw: string | null | undefined): number[] {
  if (!raw) return [];
  const numbers = raw
    .split(",")
    .map((part) => Number(part.trim()))
    .filter(isJerseyNumber);
  return [...new Set(numbers)].sort((a, b) => a - b);
}

export function serializeOnCourt(numbers: readonly number[]): string {
  return [...new Set(numbers)].sort((a, b) => a - b).join(",");
}

export type OnCourtResult =
  | { ok: true; onCourt: number[] }
  | { ok: false; error: string };

export function validateOnCourt(numbers: readonly number[]): OnCourtResult {
  const unique = [...new Set(numbers)];
  if (!unique.every(isJerseyNumber)) {
    return { ok: false, error: "Jersey numbers must be between 1 and 99" };
  }
  if (unique.length > MAX_ON_COURT) {
    return { ok: false, error: `At most ${MAX_ON_COURT} players can be on the court` };
  }
  return { ok: true, onCourt: unique.sort((a, b) => a - b) };
}

/**
 * Swap `playerOut` for `playerIn`. `playerIn` 0 takes the player off
 * without a replacement.
 */
export function applySubstitution(
  onCourt: readonly number[],
  playerOut: number,
  playerIn: number
): OnCourtResult {
  if (!onCourt.includes(playerOut)) {
    return { ok: false, error: `#${playerOut} is not on the court` };
  }
  if (playerIn !== 0 && onCourt.includes(playerIn)) {
    return { ok: false, error: `#${playerIn} is already on the court` };
  }
  const next = onCourt.filter((n) => n !== playerOut);
  if (playerIn !== 0) next.push(playerIn);
  return validateOnCourt(next);
}

// ---- Shots ----

export interface RecordShotInput {
  gameId: string;
  position: NormalizedPosition;
  made: boolean;
  quarter: number;
  courtLevel: CourtLevel;
  /** Pre-selected shooter, if any */
  player?: { number: number; id: string | null } | null;
}

/**
 * Build the row for a new shot: classified for the game's court, layup
 * auto-flagged within 5 ft when layup tracking is on, assigned to the
 * pre-selected player when there is one.
 */
export function buildShotInsert(
  input: RecordShotInput,
  settings: Pick<AppSettings, "showLayup">
): ShotInsert {
  const config = getCourtConfiguration(input.courtLevel);
  return {
    game_id: input.gameId,
    x: input.position.x,
    y: input.position.y,
    made: input.made,
    type: shotTypeCode(classifyShot(input.position, config)),
    is_layup: settings.showLayup && shouldAutoFlagLayup(input.position),
    quarter: input.quarter,
    player_number: input.player?.number ?? 0,
    player_id: input.player?.id ?? null,
  };
}

/** Moving a shot re-classifies it; the layup flag is left alone. */
export function relocateShot(
  position: NormalizedPosition,
  courtLevel: CourtLevel
): Pick<ShotRow, "x" | "y" | "type"> {
  const config = getCourtConfiguration(courtLevel);
  return {
    x: position.x,
    y: position.y,
    type: shotTypeCode(classifyShot(position, config)),
  };
}

// ---- Timeline ----

export type GameEvent =
  | { kind: "shot"; timestamp: string; shot: Shot }
  | { kind: "substitution"; timestamp: string; substitution: Substitution };

/** Shots and substitutions merged in time order. */
export function gameTimeline(
  shots: readonly Shot[],
  substitutions: readonly Substitution[]
): GameEvent[] {
  const events: GameEvent[] = [
    ...shots.map((shot): GameEvent => ({ kind: "shot", timestamp: shot.timestamp, shot })),
    ...substitutions.map(
      (substitution): GameEvent => ({
        kind: "substitution",
        timestamp: substitution.timestamp,
        substitution,
      })
    ),
  ];
  return events.sort(
    (a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime()
  );
}

export function describeSubstitution(sub: Pick<Substitution, "playerOut" | "playerIn">): string {
  return sub.playerIn > 0
    ? `#${sub.playerOut} → #${sub.playerIn}`
    : `#${sub.playerOut} out`;
}
