import { NextRequest, NextResponse } from "next/server";
import { supabaseServer as supabase } from "@/lib/supabase";
import { isCourtLevel } from "@/lib/court/config";
import { teamCreated, writeActivity } from "@/lib/activityLog";
import { jsonError, routeError } from "@/lib/http";
import { toTeam } from "@/lib/mappers";
import {
  optionalBoolean,
  optionalText,
  parseCourtThemeBody,
  readJsonObject,
} from "@/lib/validation";
import type { TeamInsert } from "@/types";

const corsHeaders = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

export async function OPTIONS() {
  return new NextResponse(null, { status: 204, headers: corsHeaders });
}

export async function GET(request: NextRequest) {
  const includeArchived =
    request.nextUrl.searchParams.get("include_archived") === "true";

  try {
    let query = supabase.from("teams").select("*");
    if (!includeArchived) {
      query = query.is("archived_at", null);
    }
    const { data, error } = await query.order("name", { ascending: true });

    if (error) {
      console.error("Supabase teams query error:", error);
      return jsonError("Database query failed", 500, corsHeaders);
    }

    return NextResponse.json(
      { teams: (data ?? []).map((row) => toTeam(row)) },
      { headers: corsHeaders }
    );
  } catch (err) {
    return routeError("Teams", err, corsHeaders);
  }
}

export async function POST(request: NextRequest) {
  const body = await readJsonObject(request);
  if (!body) {
    return jsonError("Request body must be a JSON object", 400, corsHeaders);
  }

  const name = optionalText(body, "name");
  if (name instanceof Error) return jsonError(name.message, 400, corsHeaders);
  if (!name) return jsonError("'name' is required", 400, corsHeaders);

  const courtLevel = body.courtLevel ?? null;
  if (courtLevel !== null && !isCourtLevel(courtLevel)) {
    return jsonError(
      "courtLevel must be 'highSchool', 'college' or 'nba'",
      400,
      corsHeaders
    );
  }

  const useCustomCourtTheme = optionalBoolean(body, "useCustomCourtTheme");
  if (useCustomCourtTheme instanceof Error) {
    return jsonError(useCustomCourtTheme.message, 400, corsHeaders);
  }

  const insert: TeamInsert = {
    name,
    court_level: courtLevel,
    use_custom_court_theme: useCustomCourtTheme ?? false,
  };

  if (body.courtTheme !== undefined) {
    const theme = parseCourtThemeBody(body.courtTheme);
    if (theme instanceof Error) return jsonError(theme.message, 400, corsHeaders);
    Object.assign(insert, theme);
  }

  try {
    const { data, error } = await supabase
      .from("teams")
      .insert(insert)
      .select()
      .single();

    if (error || !data) {
      console.error("Supabase team insert error:", error);
      return jsonError("Database query failed", 500, corsHeaders);
    }

    await writeActivity(supabase, teamCreated({ id: data.id }));

    return NextResponse.json(
      { team: toTeam(data) },
      { status: 201, headers: corsHeaders }
    );
  } catch (err) {
    return routeError("Team create", err, corsHeaders);
  }
}
