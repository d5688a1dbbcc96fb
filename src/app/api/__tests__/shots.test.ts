import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { fakeDb } from "@/test/fakeSupabase";
import * as gameShotsRoute from "@/app/api/games/[id]/shots/route";
import * as shotRoute from "@/app/api/shots/[id]/route";

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

function postShot(gameId: string, body: unknown) {
  return gameShotsRoute.POST(
    request(`/api/games/${gameId}/shots`, "POST", body),
    params(gameId)
  );
}

let teamId: string;
let playerId: string;
let gameId: string;

beforeEach(() => {
  fakeDb.reset();
  vi.stubEnv("NEXT_PUBLIC_DEFAULT_COURT_LEVEL", "");
  vi.stubEnv("NEXT_PUBLIC_SHOW_LAYUP", "");
  teamId = fakeDb.seedId("teams", { name: "Hawks", court_level: "nba" });
  playerId = fakeDb.seedId("players", { team_id: teamId, number: 23, name: "Ana" });
  gameId = fakeDb.seedId("games", { team_id: teamId, date: "2026-03-05T00:00:00.000Z" });
});

describe("POST /api/games/[id]/shots", () => {
  it("classifies a shot under the basket and flags it as a layup", async () => {
    const res = await postShot(gameId, {
      x: 0.5,
      y: 8.25 / 47,
      made: true,
      quarter: 1,
      playerNumber: 23,
    });

    expect(res.status).toBe(201);
    const { shot } = await res.json();
    expect(shot).toMatchObject({
      gameId,
      made: true,
      type: "twoPointer",
      isLayup: true,
      quarter: 1,
      playerNumber: 23,
      playerId,
    });
    expect(fakeDb.rows("shots")[0].type).toBe(0);
  });

  it("uses the team's court for the three-point line", async () => {
    // 22.95 ft from the basket: inside the NBA arc
    const res = await postShot(gameId, { x: 0.5, y: 0.6, made: false, quarter: 2 });
    const { shot } = await res.json();
    expect(shot).toMatchObject({
      type: "twoPointer",
      isLayup: false,
      playerNumber: 0,
      playerId: null,
    });
  });

  it("counts the same spot as a three on a high school court", async () => {
    const pickup = fakeDb.seedId("games", { date: "2026-03-05T00:00:00.000Z" });
    const res = await postShot(pickup, { x: 0.5, y: 0.6, made: true, quarter: 1 });
    expect((await res.json()).shot.type).toBe("threePointer");
  });

  it("recognizes the free-throw line", async () => {
    const res = await postShot(gameId, { x: 0.5, y: 0.4, made: true, quarter: 1 });
    expect((await res.json()).shot.type).toBe("freeThrow");
  });

  it("skips the layup flag when layup tracking is off", async () => {
    vi.stubEnv("NEXT_PUBLIC_SHOW_LAYUP", "false");
    const res = await postShot(gameId, { x: 0.5, y: 8.25 / 47, made: true, quarter: 1 });
    expect((await res.json()).shot.isLayup).toBe(false);
  });

  it("keeps a number with no roster entry unlinked", async () => {
    const res = await postShot(gameId, {
      x: 0.5,
      y: 0.5,
      made: false,
      quarter: 1,
      playerNumber: 9,
    });
    expect((await res.json()).shot).toMatchObject({ playerNumber: 9, playerId: null });
  });

  it("validates the position and quarter", async () => {
    expect((await postShot(gameId, { x: 1.5, y: 0.5, made: true, quarter: 1 })).status).toBe(400);
    expect((await postShot(gameId, { x: 0.5, y: 0.5, made: "yes", quarter: 1 })).status).toBe(
      400
    );
    const res = await postShot(gameId, { x: 0.5, y: 0.5, made: true, quarter: 0 });
    expect(await res.json()).toEqual({ error: "'quarter' must be a whole number from 1" });
  });

  it("returns 404 for an unknown game", async () => {
    const res = await postShot("nope", { x: 0.5, y: 0.5, made: true, quarter: 1 });
    expect(res.status).toBe(404);
  });
});

describe("GET /api/games/[id]/shots", () => {
  beforeEach(() => {
    fakeDb.seed("shots", [
      { game_id: gameId, x: 0.5, y: 0.2, made: true, type: 0, quarter: 1 },
      { game_id: gameId, x: 0.5, y: 0.7, made: false, type: 1, quarter: 2 },
      { game_id: gameId, x: 0.5, y: 0.7, made: true, type: 1, quarter: 3 },
    ]);
  });

  it("returns every shot oldest first by default", async () => {
    const res = await gameShotsRoute.GET(request(`/api/games/${gameId}/shots`), params(gameId));
    const { shots } = await res.json();
    expect(shots.map((s: { quarter: number }) => s.quarter)).toEqual([1, 2, 3]);
  });

  it("applies the period and hidden filters", async () => {
    const res = await gameShotsRoute.GET(
      request(`/api/games/${gameId}/shots?history=h1&hide=missed`),
      params(gameId)
    );
    const { shots } = await res.json();
    expect(shots).toHaveLength(1);
    expect(shots[0]).toMatchObject({ quarter: 1, made: true, type: "twoPointer" });
  });

  it("rejects an unknown filter", async () => {
    const res = await gameShotsRoute.GET(
      request(`/api/games/${gameId}/shots?hide=dunks`),
      params(gameId)
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Unknown shot filter 'dunks'" });
  });

  it("reports a failed query", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    // The game lookup runs first, then the shots query fails
    fakeDb.failNext("shots");
    const res = await gameShotsRoute.GET(request(`/api/games/${gameId}/shots`), params(gameId));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Database query failed" });
  });
});

describe("/api/shots/[id]", () => {
  let shotId: string;

  beforeEach(() => {
    const college = fakeDb.seedId("teams", { name: "Eagles", court_level: "college" });
    const collegeGame = fakeDb.seedId("games", {
      team_id: college,
      date: "2026-03-06T00:00:00.000Z",
    });
    shotId = fakeDb.seedId("shots", {
      game_id: collegeGame,
      x: 0.5,
      y: 0.3,
      made: false,
      type: 0,
      is_layup: false,
    });
  });

  it("re-classifies a moved shot for the game's court", async () => {
    // 22.95 ft from the basket: beyond the college arc
    const res = await shotRoute.PATCH(
      request(`/api/shots/${shotId}`, "PATCH", { x: 0.5, y: 0.6 }),
      params(shotId)
    );
    expect(res.status).toBe(200);
    expect((await res.json()).shot).toMatchObject({
      x: 0.5,
      y: 0.6,
      type: "threePointer",
      isLayup: false,
    });
  });

  it("requires both coordinates to move a shot", async () => {
    const res = await shotRoute.PATCH(
      request(`/api/shots/${shotId}`, "PATCH", { x: 0.5 }),
      params(shotId)
    );
    expect(res.status).toBe(400);
  });

  it("edits the result, layup flag and quarter", async () => {
    const res = await shotRoute.PATCH(
      request(`/api/shots/${shotId}`, "PATCH", { made: true, isLayup: true, quarter: 5 }),
      params(shotId)
    );
    expect((await res.json()).shot).toMatchObject({
      made: true,
      isLayup: true,
      quarter: 5,
      type: "twoPointer",
    });
  });

  it("clears the shooter with player number 0", async () => {
    const res = await shotRoute.PATCH(
      request(`/api/shots/${shotId}`, "PATCH", { playerNumber: 0 }),
      params(shotId)
    );
    expect((await res.json()).shot).toMatchObject({ playerNumber: 0, playerId: null });
  });

  it("deletes a shot", async () => {
    const res = await shotRoute.DELETE(request(`/api/shots/${shotId}`, "DELETE"), params(shotId));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: shotId });
    expect(fakeDb.rows("shots")).toEqual([]);

    const again = await shotRoute.DELETE(request(`/api/shots/${shotId}`, "DELETE"), params(shotId));
    expect(again.status).toBe(404);
    expect(await again.json()).toEqual({ error: "Shot not found" });
  });
});
