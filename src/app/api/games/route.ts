import { NextRequest, NextResponse } from "next/server";
import { supabaseServer as supabase } from "@/lib/supabase";
import { findTeam } from "@/lib/db";
import { serializeOnCourt } from "@/lib/game";
import { jsonError, routeError } from "@/lib/http";
import { toGame } from "@/lib/mappers";
import {
  optionalText,
  parseGameDate,
  parseOnCourtBody,
  readJsonObject,
} from "@/lib/validation";
import type { GameInsert } from "@/types";

const corsHeaders = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

export async function OPTIONS() {
  return new NextResponse(null, { status: 204, headers: corsHeaders });
}

export async function GET(request: NextRequest) {
  const teamId = request.nextUrl.searchParams.get("team_id");

  try {
    let query = supabase.from("games").select("*");
    if (teamId) {
      query = query.eq("team_id", teamId);
    }
    const { data, error } = await query.order("date", { ascending: false });

    if (error) {
      console.error("Supabase games query error:", error);
      return jsonError("Database query failed", 500, corsHeaders);
    }

    return NextResponse.json(
      { games: (data ?? []).map(toGame) },
      { headers: corsHeaders }
    );
  } catch (err) {
    return routeError("Games", err, corsHeaders);
  }
}

export async function POST(request: NextRequest) {
  const body = await readJsonObject(request);
  if (!body) {
    return jsonError("Request body must be a JSON object", 400, corsHeaders);
  }

  const teamId = body.teamId ?? null;
  if (teamId !== null && typeof teamId !== "string") {
    return jsonError("'teamId' must be a string or null", 400, corsHeaders);
  }

  const name = optionalText(body, "name");
  if (name instanceof Error) return jsonError(name.message, 400, corsHeaders);

  const date = parseGameDate(body);
  if (date instanceof Error) return jsonError(date.message, 400, corsHeaders);

  const onCourt = parseOnCourtBody(body);
  if (onCourt instanceof Error) return jsonError(onCourt.message, 400, corsHeaders);

  try {
    if (teamId !== null) {
      const team = await findTeam(teamId);
      if (!team || team.archived_at) {
        return jsonError("Team not found", 404, corsHeaders);
      }
    }

    const insert: GameInsert = {
      team_id: teamId,
      name: name ?? null,
      date: date ?? new Date().toISOString(),
      team_on_court: serializeOnCourt(onCourt ?? []),
    };

    const { data, error } = await supabase
      .from("games")
      .insert(insert)
      .select()
      .single();

    if (error || !data) {
      console.error("Supabase game insert error:", error);
      return jsonError("Database query failed", 500, corsHeaders);
    }

    return NextResponse.json(
      { game: toGame(data) },
      { status: 201, headers: corsHeaders }
    );
  } catch (err) {
    return routeError("Game create", err, corsHeaders);
  }
}
