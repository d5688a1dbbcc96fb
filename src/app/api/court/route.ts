import { NextRequest, NextResponse } from "next/server";
import {
  courtLevelName,
  getCourtConfiguration,
  isCourtLevel,
  type CanvasSize,
} from "@/lib/court/config";
import { courtLinePaths } from "@/lib/court/geometry";
import { toSvgPath, zoneFillPath } from "@/lib/court/svg";
import { zoneName, zonePolygons } from "@/lib/court/zones";
import { jsonError, routeError } from "@/lib/http";
import { loadSettings } from "@/lib/settings";
import type { CourtResponse } from "@/types";

const corsHeaders = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

const DEFAULT_SIZE: CanvasSize = { width: 500, height: 470 };
const MAX_DIMENSION = 4000;

export async function OPTIONS() {
  return new NextResponse(null, { status: 204, headers: corsHeaders });
}

function parseDimension(raw: string | null, fallback: number): number | null {
  if (raw === null) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 && value <= MAX_DIMENSION ? value : null;
}

/**
 * Court markings and scoring-zone fills as SVG path data.
 *
 * Query params:
 *   level  - highSchool | college | nba (default from settings)
 *   width, height - canvas size in pixels (default 500x470)
 */
export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;

  const level = searchParams.get("level") ?? loadSettings().defaultCourtLevel;
  if (!isCourtLevel(level)) {
    return jsonError("level must be 'highSchool', 'college' or 'nba'", 400, corsHeaders);
  }

  const width = parseDimension(searchParams.get("width"), DEFAULT_SIZE.width);
  const height = parseDimension(searchParams.get("height"), DEFAULT_SIZE.height);
  if (width === null || height === null) {
    return jsonError(
      `width and height must be positive numbers up to ${MAX_DIMENSION}`,
      400,
      corsHeaders
    );
  }

  try {
    const configuration = getCourtConfiguration(level);
    const size: CanvasSize = { width, height };

    const response: CourtResponse = {
      level,
      name: courtLevelName(level),
      configuration,
      size,
      lines: courtLinePaths(configuration, size).map((primitive) => ({
        element: primitive.element,
        style: primitive.style,
        d: toSvgPath(primitive),
      })),
      zones: zonePolygons(configuration, size).map((fill) => ({
        zone: fill.zone,
        name: zoneName(fill.zone),
        d: zoneFillPath(fill),
      })),
    };

    return NextResponse.json(response, {
      headers: { ...corsHeaders, "Cache-Control": "public, max-age=3600" },
    });
  } catch (err) {
    return routeError("Court", err, corsHeaders);
  }
}
