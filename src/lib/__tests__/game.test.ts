import { describe, expect, it } from "vitest";
import {
  applySubstitution,
  buildShotInsert,
  describeSubstitution,
  gameTimeline,
  parseOnCourt,
  relocateShot,
  serializeOnCourt,
  validateOnCourt,
} from "@/lib/game";
import type { Shot, Substitution } from "@/types";

describe("on-court set", () => {
  it("parses, dedupes and sorts the stored list", () => {
    expect(parseOnCourt("11, 3,x,3,120")).toEqual([3, 11]);
    expect(parseOnCourt(null)).toEqual([]);
  });

  it("serializes in jersey order", () => {
    expect(serializeOnCourt([11, 3, 3])).toBe("3,11");
  });

  it("allows at most five players", () => {
    expect(validateOnCourt([1, 2, 3, 4, 5, 6])).toEqual({
      ok: false,
      error: "At most 5 players can be on the court",
    });
    expect(validateOnCourt([0])).toEqual({
      ok: false,
      error: "Jersey numbers must be between 1 and 99",
    });
  });
});

describe("applySubstitution", () => {
  it("swaps the outgoing player for the incoming one", () => {
    expect(applySubstitution([1, 2, 3, 4, 5], 5, 6)).toEqual({
      ok: true,
      onCourt: [1, 2, 3, 4, 6],
    });
  });

  it("removes a player without a replacement", () => {
    expect(applySubstitution([3, 5], 5, 0)).toEqual({ ok: true, onCourt: [3] });
  });

  it("rejects a player who is not on the court", () => {
    expect(applySubstitution([3, 5], 7, 12)).toEqual({
      ok: false,
      error: "#7 is not on the court",
    });
  });

  it("rejects a player who is already on the court", () => {
    expect(applySubstitution([3, 5], 5, 3)).toEqual({
      ok: false,
      error: "#3 is already on the court",
    });
  });
});

describe("buildShotInsert", () => {
  const base = {
    gameId: "game-1",
    position: { x: 0.5, y: 8.25 / 47 },
    made: true,
    quarter: 2,
    courtLevel: "nba" as const,
  };

  it("classifies, flags the layup and assigns the shooter", () => {
    expect(
      buildShotInsert({ ...base, player: { number: 23, id: "player-1" } }, { showLayup: true })
    ).toEqual({
      game_id: "game-1",
      x: 0.5,
      y: 8.25 / 47,
      made: true,
      type: 0,
      is_layup: true,
      quarter: 2,
      player_number: 23,
      player_id: "player-1",
    });
  });

  it("leaves the layup flag off when layup tracking is disabled", () => {
    const insert = buildShotInsert(base, { showLayup: false });
    expect(insert.is_layup).toBe(false);
    expect(insert.player_number).toBe(0);
    expect(insert.player_id).toBeNull();
  });

  it("classifies against the game's court", () => {
    const insert = buildShotInsert(
      { ...base, position: { x: 0.5, y: 0.6 }, courtLevel: "college" },
      { showLayup: true }
    );
    expect(insert.type).toBe(1);
    expect(insert.is_layup).toBe(false);
  });
});

describe("relocateShot", () => {
  it("returns only the position and new type", () => {
    expect(relocateShot({ x: 0.5, y: 0.6 }, "college")).toEqual({ x: 0.5, y: 0.6, type: 1 });
    expect(relocateShot({ x: 0.5, y: 0.6 }, "nba")).toEqual({ x: 0.5, y: 0.6, type: 0 });
  });
});

describe("timeline", () => {
  const shot: Shot = {
    id: "s1",
    gameId: "g1",
    x: 0.5,
    y: 0.5,
    made: true,
    type: "twoPointer",
    isLayup: false,
    quarter: 1,
    playerNumber: 4,
    playerId: null,
    timestamp: "2026-01-01T00:00:05.000Z",
  };
  const sub: Substitution = {
    id: "u1",
    gameId: "g1",
    quarter: 1,
    playerOut: 4,
    playerIn: 0,
    timestamp: "2026-01-01T00:00:02.000Z",
  };

  it("merges shots and substitutions in time order", () => {
    expect(gameTimeline([shot], [sub]).map((e) => e.kind)).toEqual(["substitution", "shot"]);
  });

  it("describes substitutions", () => {
    expect(describeSubstitution(sub)).toBe("#4 out");
    expect(describeSubstitution({ playerOut: 4, playerIn: 9 })).toBe("#4 → #9");
  });
});
