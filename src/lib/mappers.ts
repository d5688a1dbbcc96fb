// ============================================================
// Row → API mappers (snake_case rows to camelCase responses)
// ============================================================

import { parseCourtLevel, isCourtLevel } from "./court/config";
import { shotTypeFromCode } from "./court/shotType";
import {
  colorToHex,
  lineColorToString,
  parseHexColor,
  parseLineColor,
  themeFromColumns,
  type CourtTheme,
  type RgbaColor,
} from "./court/theme";
import { parseOnCourt } from "./game";
import { loadSettings, type AppSettings } from "./settings";
import type {
  ActivityEntry,
  ActivityLogRow,
  Game,
  GameRow,
  Player,
  PlayerRow,
  Shot,
  ShotRow,
  Substitution,
  SubstitutionRow,
  Team,
  TeamRow,
} from "@/types";

export function toTeam(row: TeamRow, settings: AppSettings = loadSettings()): Team {
  const theme = themeFromColumns(row);
  return {
    id: row.id,
    name: row.name,
    courtLevel: isCourtLevel(row.court_level) ? row.court_level : null,
    effectiveCourtLevel: parseCourtLevel(row.court_level, settings.defaultCourtLevel),
    useCustomCourtTheme: row.use_custom_court_theme,
    courtTheme: {
      backgroundColors: theme.backgroundColors.map(colorToHex),
      backgroundAlpha: theme.backgroundAlpha,
      lineColor: lineColorToString(theme.lineColor),
      pattern: theme.pattern,
      patternScale: theme.patternScale,
    },
    createdAt: row.created_at,
    archivedAt: row.archived_at,
  };
}

export function toPlayer(row: PlayerRow): Player {
  return {
    id: row.id,
    teamId: row.team_id,
    number: row.number,
    name: row.name,
    createdAt: row.created_at,
    archivedAt: row.archived_at,
  };
}

export function toGame(row: GameRow): Game {
  return {
    id: row.id,
    teamId: row.team_id,
    name: row.name,
    date: row.date,
    onCourt: parseOnCourt(row.team_on_court),
    createdAt: row.created_at,
  };
}

// Unknown type codes are read as 2PT.
export function toShot(row: ShotRow): Shot {
  return {
    id: row.id,
    gameId: row.game_id,
    x: row.x,
    y: row.y,
    made: row.made,
    type: shotTypeFromCode(row.type) ?? "twoPointer",
    isLayup: row.is_layup,
    quarter: row.quarter,
    playerNumber: row.player_number,
    playerId: row.player_id,
    timestamp: row.timestamp,
  };
}

export function toSubstitution(row: SubstitutionRow): Substitution {
  return {
    id: row.id,
    gameId: row.game_id,
    quarter: row.quarter,
    playerOut: row.player_out,
    playerIn: row.player_in,
    timestamp: row.timestamp,
  };
}

export function toActivityEntry(row: ActivityLogRow): ActivityEntry {
  return {
    id: row.id,
    subjectId: row.subject_id,
    subjectType: row.subject_type,
    activityType: row.activity_type,
    description: row.description_text,
    relatedId: row.related_id,
    timestamp: row.timestamp,
  };
}

/** The theme to draw a team's court with; null when the team uses the plain court. */
export function courtThemeForTeam(team: Team | null): CourtTheme | null {
  if (!team || !team.useCustomCourtTheme) return null;
  const { courtTheme } = team;
  return {
    backgroundColors: courtTheme.backgroundColors
      .map(parseHexColor)
      .filter((color): color is RgbaColor => color !== null),
    backgroundAlpha: courtTheme.backgroundAlpha,
    lineColor: parseLineColor(courtTheme.lineColor),
    pattern: courtTheme.pattern,
    patternScale: courtTheme.patternScale,
  };
}
