import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { fakeDb } from "@/test/fakeSupabase";
import * as rosterRoute from "@/app/api/teams/[id]/players/route";
import * as playerRoute from "@/app/api/players/[id]/route";

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

function activityTexts(): unknown[] {
  return fakeDb.rows("activity_log").map((row) => row.description_text);
}

let hawks: string;

beforeEach(() => {
  fakeDb.reset();
  hawks = fakeDb.seedId("teams", { name: "Hawks" });
});

describe("POST /api/teams/[id]/players", () => {
  it("adds a player and logs it on both sides", async () => {
    const res = await rosterRoute.POST(
      request(`/api/teams/${hawks}/players`, "POST", { number: 23, name: "Ana" }),
      params(hawks)
    );

    expect(res.status).toBe(201);
    const { player } = await res.json();
    expect(player).toMatchObject({ teamId: hawks, number: 23, name: "Ana", archivedAt: null });
    expect(fakeDb.rows("activity_log")).toMatchObject([
      {
        subject_id: player.id,
        subject_type: "player",
        description_text: "Created and joined Hawks",
        related_id: hawks,
      },
      {
        subject_id: hawks,
        subject_type: "team",
        description_text: "Ana (#23) joined",
        related_id: player.id,
      },
    ]);
  });

  it("refuses a jersey number already in use", async () => {
    fakeDb.seed("players", [{ team_id: hawks, number: 23, name: "Ana" }]);
    const res = await rosterRoute.POST(
      request(`/api/teams/${hawks}/players`, "POST", { number: 23 }),
      params(hawks)
    );
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "Jersey #23 is already taken" });
  });

  it("frees the number of an archived player", async () => {
    fakeDb.seed("players", [
      { team_id: hawks, number: 23, name: "Ana", archived_at: "2025-06-01T00:00:00.000Z" },
    ]);
    const res = await rosterRoute.POST(
      request(`/api/teams/${hawks}/players`, "POST", { number: 23 }),
      params(hawks)
    );
    expect(res.status).toBe(201);
  });

  it("validates the jersey number", async () => {
    const res = await rosterRoute.POST(
      request(`/api/teams/${hawks}/players`, "POST", { number: 100 }),
      params(hawks)
    );
    expect(res.status).toBe(400);
  });

  it("returns 404 for an unknown team", async () => {
    const res = await rosterRoute.POST(
      request("/api/teams/nope/players", "POST", { number: 5 }),
      params("nope")
    );
    expect(res.status).toBe(404);
  });
});

describe("PATCH /api/players/[id]", () => {
  let ana: string;

  beforeEach(() => {
    ana = fakeDb.seedId("players", { team_id: hawks, number: 23, name: "Ana" });
  });

  it("changes the jersey number", async () => {
    const res = await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { number: 32 }),
      params(ana)
    );
    expect(res.status).toBe(200);
    expect((await res.json()).player.number).toBe(32);
    expect(activityTexts()).toEqual(["Changed jersey #23 → #32"]);
  });

  it("refuses a number held by a teammate", async () => {
    fakeDb.seed("players", [{ team_id: hawks, number: 11, name: "Bea" }]);
    const res = await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { number: 11 }),
      params(ana)
    );
    expect(res.status).toBe(409);
    expect(activityTexts()).toEqual([]);
  });

  it("logs a name change", async () => {
    await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { name: "" }),
      params(ana)
    );
    expect(activityTexts()).toEqual(['Changed name "Ana" → "(no name)"']);
  });

  it("moves a player to another team", async () => {
    const eagles = fakeDb.seedId("teams", { name: "Eagles" });
    const res = await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { teamId: eagles }),
      params(ana)
    );
    expect((await res.json()).player.teamId).toBe(eagles);
    expect(activityTexts()).toEqual([
      "Left Hawks",
      "Ana (#23) left",
      "Joined Eagles",
      "Ana (#23) joined",
    ]);
  });

  it("releases a player from their team", async () => {
    const res = await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { teamId: null }),
      params(ana)
    );
    expect((await res.json()).player.teamId).toBeNull();
    expect(activityTexts()).toEqual(["Left Hawks", "Ana (#23) left"]);
  });

  it("does nothing when nothing changes", async () => {
    const res = await playerRoute.PATCH(
      request(`/api/players/${ana}`, "PATCH", { number: 23, name: "Ana" }),
      params(ana)
    );
    expect(res.status).toBe(200);
    expect(activityTexts()).toEqual([]);
  });
});

describe("DELETE /api/players/[id]", () => {
  it("archives the player and logs it", async () => {
    const ana = fakeDb.seedId("players", { team_id: hawks, number: 23, name: "Ana" });
    const res = await playerRoute.DELETE(request(`/api/players/${ana}`, "DELETE"), params(ana));

    expect(res.status).toBe(200);
    expect((await res.json()).player.archivedAt).not.toBeNull();
    expect(activityTexts()).toEqual(["Archived from Hawks", "Ana (#23) archived"]);

    const roster = await rosterRoute.GET(request(`/api/teams/${hawks}/players`), params(hawks));
    expect((await roster.json()).players).toEqual([]);
  });
});
