// ============================================================
// Shot Chart: TypeScript Type Definitions
// Mirrors supabase/migrations/00001_create_tables.sql
// ============================================================

import type { CourtLevel, CourtConfiguration, CanvasSize } from "@/lib/court/config";
import type { CourtElement, LineStyle } from "@/lib/court/geometry";
import type { ShotType } from "@/lib/court/shotType";
import type { CourtBackgroundPattern } from "@/lib/court/theme";
import type { ScoringZone } from "@/lib/court/zones";
import type { ActivitySubjectType, ActivityType } from "@/lib/activityLog";
import type { PeriodStatsRow, PlayerStatsRow, ZoneSummary } from "@/lib/stats";

// ============================================================
// Database Row Types
// These map 1:1 to Supabase table rows. Declared as type aliases:
// the client's schema check needs rows assignable to
// Record<string, unknown>, which interfaces are not.
// ============================================================

export type TeamRow = {
  id: string;
  name: string;
  court_level: string | null;
  use_custom_court_theme: boolean;
  court_background_color: string | null;
  court_background_alpha: number;
  court_line_color: string | null;
  court_background_pattern: string | null;
  court_pattern_scale: number;
  created_at: string;
  archived_at: string | null;
};

export type PlayerRow = {
  id: string;
  team_id: string | null;
  number: number;
  name: string | null;
  created_at: string;
  archived_at: string | null;
};

export type GameRow = {
  id: string;
  team_id: string | null;
  name: string | null;
  date: string;
  /** Comma-separated jersey numbers, e.g. "3,5,11" */
  team_on_court: string | null;
  created_at: string;
};

export type ShotRow = {
  id: string;
  game_id: string;
  x: number;
  y: number;
  made: boolean;
  /** 0 = 2PT, 1 = 3PT, 2 = FT */
  type: number;
  is_layup: boolean;
  quarter: number;
  /** 0 = unassigned */
  player_number: number;
  player_id: string | null;
  timestamp: string;
};

export type SubstitutionRow = {
  id: string;
  game_id: string;
  quarter: number;
  player_out: number;
  /** 0 = removed without a replacement */
  player_in: number;
  timestamp: string;
};

export type ActivityLogRow = {
  id: string;
  subject_id: string;
  subject_type: ActivitySubjectType;
  activity_type: ActivityType;
  description_text: string;
  related_id: string | null;
  timestamp: string;
};

// ============================================================
// Insert Types (omit auto-generated columns)
// ============================================================

export type TeamInsert = Pick<TeamRow, "name"> &
  Partial<Omit<TeamRow, "id" | "name" | "created_at" | "archived_at">>;
export type PlayerInsert = Pick<PlayerRow, "team_id" | "number" | "name">;
export type GameInsert = Pick<GameRow, "team_id" | "name"> &
  Partial<Pick<GameRow, "date" | "team_on_court">>;
export type ShotInsert = Omit<ShotRow, "id" | "timestamp">;
export type SubstitutionInsert = Omit<SubstitutionRow, "id" | "timestamp">;
export type ActivityLogInsert = Omit<ActivityLogRow, "id" | "timestamp">;

// ============================================================
// Supabase Database Type Map
// Enables typed supabase.from('table').select()
//
// Insert/Update stay Record<string, unknown>: the select parser in
// @supabase/supabase-js resolves to `never` for Omit<> shapes. Use
// the Insert types above at call sites.
// ============================================================

export interface Database {
  public: {
    Tables: {
      teams: {
        Row: TeamRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
      players: {
        Row: PlayerRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
      games: {
        Row: GameRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
      shots: {
        Row: ShotRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
      substitutions: {
        Row: SubstitutionRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
      activity_log: {
        Row: ActivityLogRow;
        Insert: Record<string, unknown>;
        Update: Record<string, unknown>;
        Relationships: [];
      };
    };
    Views: {};
    Functions: {};
  };
}

// ============================================================
// API Types
// Shape of data returned by the Next.js API routes
// ============================================================

export interface CourtThemeDto {
  backgroundColors: string[];
  backgroundAlpha: number;
  lineColor: string;
  pattern: CourtBackgroundPattern;
  patternScale: number;
}

export interface Team {
  id: string;
  name: string;
  /** Stored level; null = use the app default */
  courtLevel: CourtLevel | null;
  effectiveCourtLevel: CourtLevel;
  useCustomCourtTheme: boolean;
  courtTheme: CourtThemeDto;
  createdAt: string;
  archivedAt: string | null;
}

export interface Player {
  id: string;
  teamId: string | null;
  number: number;
  name: string | null;
  createdAt: string;
  archivedAt: string | null;
}

export interface Game {
  id: string;
  teamId: string | null;
  name: string | null;
  date: string;
  onCourt: number[];
  createdAt: string;
}

export interface Shot {
  id: string;
  gameId: string;
  x: number;
  y: number;
  made: boolean;
  type: ShotType;
  isLayup: boolean;
  quarter: number;
  playerNumber: number;
  playerId: string | null;
  timestamp: string;
}

export interface Substitution {
  id: string;
  gameId: string;
  quarter: number;
  playerOut: number;
  playerIn: number;
  timestamp: string;
}

export interface ActivityEntry {
  id: string;
  subjectId: string;
  subjectType: ActivitySubjectType;
  activityType: ActivityType;
  description: string;
  relatedId: string | null;
  timestamp: string;
}

export interface TeamsResponse {
  teams: Team[];
}

export interface TeamResponse {
  team: Team;
}

export interface TeamDetailResponse {
  team: Team;
  players: Player[];
  activity: ActivityEntry[];
}

export interface PlayersResponse {
  players: Player[];
}

export interface PlayerResponse {
  player: Player;
}

export interface GamesResponse {
  games: Game[];
}

export interface GameResponse {
  game: Game;
}

export interface GameDetailResponse {
  game: Game;
  team: Team | null;
  courtLevel: CourtLevel;
  players: Player[];
  shots: Shot[];
  substitutions: Substitution[];
}

export interface ShotsResponse {
  shots: Shot[];
}

export interface ShotResponse {
  shot: Shot;
}

export interface SubstitutionsResponse {
  substitutions: Substitution[];
}

export interface SubstitutionResponse {
  substitution: Substitution;
  onCourt: number[];
}

export interface GameStatsResponse {
  summary: PeriodStatsRow[];
  players: PlayerStatsRow[];
  zones: ZoneSummary[];
  totalShots: number;
}

export interface CourtResponse {
  level: CourtLevel;
  name: string;
  configuration: CourtConfiguration;
  size: CanvasSize;
  lines: { element: CourtElement; style: LineStyle; d: string }[];
  zones: { zone: ScoringZone; name: string; d: string }[];
}
