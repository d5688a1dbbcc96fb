import { describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS } from "@/lib/settings";
import { courtThemeForTeam, toGame, toShot, toTeam } from "@/lib/mappers";
import type { ShotRow, TeamRow } from "@/types";

const settings = { ...DEFAULT_SETTINGS, defaultCourtLevel: "nba" as const };

function teamRow(overrides: Partial<TeamRow> = {}): TeamRow {
  return {
    id: "teams-1",
    name: "Hawks",
    court_level: "college",
    use_custom_court_theme: true,
    court_background_color: "#ff0000,#0000ff80",
    court_background_alpha: 0,
    court_line_color: "black",
    court_background_pattern: "plaid",
    court_pattern_scale: 0,
    created_at: "2026-03-01T00:00:00.000Z",
    archived_at: null,
    ...overrides,
  };
}

describe("toTeam", () => {
  it("normalizes the stored theme", () => {
    expect(toTeam(teamRow(), settings)).toEqual({
      id: "teams-1",
      name: "Hawks",
      courtLevel: "college",
      effectiveCourtLevel: "college",
      useCustomCourtTheme: true,
      courtTheme: {
        backgroundColors: ["#FF0000", "#0000FF"],
        backgroundAlpha: 1,
        lineColor: "black",
        pattern: "solid",
        patternScale: 1,
      },
      createdAt: "2026-03-01T00:00:00.000Z",
      archivedAt: null,
    });
  });

  it("falls back to the default level", () => {
    const team = toTeam(teamRow({ court_level: null }), settings);
    expect(team.courtLevel).toBeNull();
    expect(team.effectiveCourtLevel).toBe("nba");
  });
});

describe("courtThemeForTeam", () => {
  it("is null without a team or with the theme switched off", () => {
    expect(courtThemeForTeam(null)).toBeNull();
    expect(
      courtThemeForTeam(toTeam(teamRow({ use_custom_court_theme: false }), settings))
    ).toBeNull();
  });

  it("parses the team's colors back", () => {
    expect(courtThemeForTeam(toTeam(teamRow(), settings))).toEqual({
      backgroundColors: [
        { r: 255, g: 0, b: 0, alpha: 1 },
        { r: 0, g: 0, b: 255, alpha: 1 },
      ],
      backgroundAlpha: 1,
      lineColor: { kind: "black" },
      pattern: "solid",
      patternScale: 1,
    });
  });
});

describe("toGame / toShot", () => {
  it("splits the on-court list", () => {
    const game = toGame({
      id: "games-1",
      team_id: null,
      name: null,
      date: "2026-03-05T00:00:00.000Z",
      team_on_court: "3,5",
      created_at: "2026-03-05T00:00:00.000Z",
    });
    expect(game.onCourt).toEqual([3, 5]);
  });

  it("reads an unknown type code as a two", () => {
    const row: ShotRow = {
      id: "shots-1",
      game_id: "games-1",
      x: 0.5,
      y: 0.6,
      made: true,
      type: 7,
      is_layup: false,
      quarter: 1,
      player_number: 0,
      player_id: null,
      timestamp: "2026-03-05T00:00:00.000Z",
    };
    expect(toShot(row).type).toBe("twoPointer");
  });
});
