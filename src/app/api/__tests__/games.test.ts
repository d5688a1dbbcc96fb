import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { fakeDb } from "@/test/fakeSupabase";
import * as gamesRoute from "@/app/api/games/route";
import * as gameRoute from "@/app/api/games/[id]/route";
import * as substitutionsRoute from "@/app/api/games/[id]/substitutions/route";

vi.mock("@/lib/supabase", async () => {
  const { fakeDb } = await import("@/test/fakeSupabase");
  return { supabaseServer: fakeDb, supabase: fakeDb };
});

function request(url: string, method = "GET", body?: unknown): NextRequest {
  return new NextRequest(`http://localhost${url}`, {
    method,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

function params(id: string) {
  return { params: Promise.resolve({ id }) };
}

beforeEach(() => {
  fakeDb.reset();
  vi.stubEnv("NEXT_PUBLIC_DEFAULT_COURT_LEVEL", "");
});

describe("POST /api/games", () => {
  it("creates a game for a team", async () => {
    const teamId = fakeDb.seedId("teams", { name: "Hawks" });
    const res = await gamesRoute.POST(
      request("/api/games", "POST", {
        teamId,
        name: "vs Eagles",
        date: "2026-03-05",
        onCourt: [5, 3],
      })
    );

    expect(res.status).toBe(201);
    const { game } = await res.json();
    expect(game).toMatchObject({
      teamId,
      name: "vs Eagles",
      date: "2026-03-05T00:00:00.000Z",
      onCourt: [3, 5],
    });
    expect(fakeDb.rows("games")[0].team_on_court).toBe("3,5");
  });

  it("creates a pickup game without a team", async () => {
    const res = await gamesRoute.POST(request("/api/games", "POST", {}));
    expect(res.status).toBe(201);
    expect((await res.json()).game).toMatchObject({ teamId: null, name: null, onCourt: [] });
  });

  it("returns 404 for an unknown team", async () => {
    const res = await gamesRoute.POST(request("/api/games", "POST", { teamId: "nope" }));
    expect(res.status).toBe(404);
  });

  it("rejects more than five players on the court", async () => {
    const res = await gamesRoute.POST(
      request("/api/games", "POST", { onCourt: [1, 2, 3, 4, 5, 6] })
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "At most 5 players can be on the court" });
  });
});

describe("GET /api/games", () => {
  it("lists games newest first, optionally for one team", async () => {
    const teamId = fakeDb.seedId("teams", { name: "Hawks" });
    fakeDb.seed("games", [
      { team_id: teamId, name: "Opener", date: "2026-03-01T00:00:00.000Z" },
      { team_id: teamId, name: "Rematch", date: "2026-03-08T00:00:00.000Z" },
      { team_id: null, name: "Pickup", date: "2026-03-05T00:00:00.000Z" },
    ]);

    const all = await (await gamesRoute.GET(request("/api/games"))).json();
    expect(all.games.map((g: { name: string }) => g.name)).toEqual([
      "Rematch",
      "Pickup",
      "Opener",
    ]);

    const team = await (await gamesRoute.GET(request(`/api/games?team_id=${teamId}`))).json();
    expect(team.games.map((g: { name: string }) => g.name)).toEqual(["Rematch", "Opener"]);
  });
});

describe("GET /api/games/[id]", () => {
  it("returns the game with its court level, roster, shots and substitutions", async () => {
    const teamId = fakeDb.seedId("teams", { name: "Hawks", court_level: "nba" });
    fakeDb.seed("players", [{ team_id: teamId, number: 23, name: "Ana" }]);
    const gameId = fakeDb.seedId("games", {
      team_id: teamId,
      date: "2026-03-05T00:00:00.000Z",
      team_on_court: "23",
    });
    fakeDb.seed("shots", [
      { game_id: gameId, x: 0.5, y: 0.2, made: true, type: 0, player_number: 23 },
      { game_id: gameId, x: 0.1, y: 0.1, made: false, type: 1 },
    ]);
    fakeDb.seed("substitutions", [{ game_id: gameId, quarter: 2, player_out: 23, player_in: 0 }]);

    const res = await gameRoute.GET(request(`/api/games/${gameId}`), params(gameId));
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.courtLevel).toBe("nba");
    expect(body.team.name).toBe("Hawks");
    expect(body.game.onCourt).toEqual([23]);
    expect(body.players.map((p: { name: string }) => p.name)).toEqual(["Ana"]);
    expect(body.shots.map((s: { type: string }) => s.type)).toEqual([
      "twoPointer",
      "threePointer",
    ]);
    expect(body.substitutions).toMatchObject([{ quarter: 2, playerOut: 23, playerIn: 0 }]);
  });

  it("falls back to the default level for a pickup game", async () => {
    const gameId = fakeDb.seedId("games", { date: "2026-03-05T00:00:00.000Z" });
    const body = await (await gameRoute.GET(request(`/api/games/${gameId}`), params(gameId))).json();
    expect(body.team).toBeNull();
    expect(body.courtLevel).toBe("highSchool");
    expect(body.players).toEqual([]);
  });

  it("returns 404 for an unknown game", async () => {
    const res = await gameRoute.GET(request("/api/games/nope"), params("nope"));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Game not found" });
  });

  it("updates the name and on-court set", async () => {
    const gameId = fakeDb.seedId("games", { date: "2026-03-05T00:00:00.000Z" });
    const res = await gameRoute.PATCH(
      request(`/api/games/${gameId}`, "PATCH", { name: "Final", onCourt: [11, 4] }),
      params(gameId)
    );
    expect((await res.json()).game).toMatchObject({ name: "Final", onCourt: [4, 11] });
  });
});

describe("/api/games/[id]/substitutions", () => {
  let gameId: string;

  beforeEach(() => {
    gameId = fakeDb.seedId("games", {
      date: "2026-03-05T00:00:00.000Z",
      team_on_court: "3,5",
    });
  });

  it("swaps players and stores the new on-court set", async () => {
    const res = await substitutionsRoute.POST(
      request(`/api/games/${gameId}/substitutions`, "POST", {
        playerOut: 5,
        playerIn: 12,
        quarter: 1,
      }),
      params(gameId)
    );

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.onCourt).toEqual([3, 12]);
    expect(body.substitution).toMatchObject({ playerOut: 5, playerIn: 12, quarter: 1 });
    expect(fakeDb.rows("games")[0].team_on_court).toBe("3,12");
  });

  it("takes a player off without a replacement", async () => {
    const res = await substitutionsRoute.POST(
      request(`/api/games/${gameId}/substitutions`, "POST", { playerOut: 3, quarter: 2 }),
      params(gameId)
    );
    const body = await res.json();
    expect(body.onCourt).toEqual([5]);
    expect(body.substitution.playerIn).toBe(0);
  });

  it("refuses a player who is not on the court", async () => {
    const res = await substitutionsRoute.POST(
      request(`/api/games/${gameId}/substitutions`, "POST", {
        playerOut: 7,
        playerIn: 12,
        quarter: 1,
      }),
      params(gameId)
    );
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "#7 is not on the court" });
    expect(fakeDb.rows("substitutions")).toEqual([]);
  });

  it("filters the list by period", async () => {
    fakeDb.seed("substitutions", [
      { game_id: gameId, quarter: 1, player_out: 3, player_in: 8 },
      { game_id: gameId, quarter: 2, player_out: 5, player_in: 9 },
    ]);

    const res = await substitutionsRoute.GET(
      request(`/api/games/${gameId}/substitutions?history=quarter&quarter=2`),
      params(gameId)
    );
    const { substitutions } = await res.json();
    expect(substitutions).toMatchObject([{ quarter: 2, playerOut: 5, playerIn: 9 }]);
  });

  it("rejects a bad history view", async () => {
    const res = await substitutionsRoute.GET(
      request(`/api/games/${gameId}/substitutions?history=quarter`),
      params(gameId)
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "quarter is required when history is 'quarter'",
    });
  });
});
