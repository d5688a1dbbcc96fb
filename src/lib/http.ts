import { NextResponse } from "next/server";

// ============================================================
// Shared response helpers for the API routes
// ============================================================

export type CorsHeaders = Record<string, string>;

export class DatabaseError extends Error {
  readonly detail: unknown;
  constructor(context: string, detail: unknown) {
    super(`${context} failed`);
    this.name = "DatabaseError";
    this.detail = detail;
  }
}

export function jsonError(
  message: string,
  status: number,
  headers: CorsHeaders
): NextResponse {
  return NextResponse.json({ error: message }, { status, headers });
}

/**
 * Last-resort handler for a route's try/catch: database failures become
 * "Database query failed", anything else "Internal server error".
 */
export function routeError(
  label: string,
  err: unknown,
  headers: CorsHeaders
): NextResponse {
  if (err instanceof DatabaseError) {
    console.error(`Supabase ${label} error:`, err.message, err.detail);
    return jsonError("Database query failed", 500, headers);
  }
  console.error(`${label} route error:`, err);
  return jsonError("Internal server error", 500, headers);
}
