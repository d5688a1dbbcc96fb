import { SHOT_FILTER_KEYS, type HistoryFilter, type ShotFilters } from "./stats";

// ============================================================
// Shared API fetcher
// Used by all React Query hooks in src/hooks/
// ============================================================

export class ApiError extends Error {
  status: number;
  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export interface LoadErrorCopy {
  title: string;
  detail: string | null;
  retryable: boolean;
}

/**
 * Text for a section that failed to load. A 404 is final, other API errors
 * show the server's message, and anything that is not an ApiError means
 * the request never got an answer.
 */
export function describeLoadError(error: Error, section: string): LoadErrorCopy {
  if (!(error instanceof ApiError)) {
    return {
      title: "Can't reach the server.",
      detail: `Check your connection and try loading ${section} again.`,
      retryable: true,
    };
  }
  if (error.status === 404) {
    return {
      title: `${section.charAt(0).toUpperCase()}${section.slice(1)} not found`,
      detail: null,
      retryable: false,
    };
  }
  return {
    title: `Unable to load ${section}.`,
    detail: error.message,
    retryable: error.status >= 500,
  };
}

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export async function apiFetch<T>(
  url: string,
  method: HttpMethod = "GET",
  body?: unknown
): Promise<T> {
  const init: RequestInit = { method };
  if (body !== undefined) {
    init.headers = { "Content-Type": "application/json" };
    init.body = JSON.stringify(body);
  }

  const res = await fetch(url, init);
  if (!res.ok) {
    const payload: unknown = await res.json().catch(() => ({}));
    const msg =
      typeof payload === "object" &&
      payload !== null &&
      "error" in payload &&
      typeof payload.error === "string"
        ? payload.error
        : `HTTP ${res.status}`;
    throw new ApiError(msg, res.status);
  }
  return res.json() as Promise<T>;
}

// ---- Shot view params ----

/**
 * Search string for the shots and stats routes: `history`, `quarter` and
 * `hide` for every filter switched off. Empty for the default view.
 */
export function shotViewQuery(
  history: HistoryFilter,
  quarter: number,
  filters: ShotFilters
): string {
  const params = new URLSearchParams();
  if (history !== "all") {
    params.set("history", history);
    params.set("quarter", String(quarter));
  }
  const hidden = SHOT_FILTER_KEYS.filter((key) => !filters[key]);
  if (hidden.length > 0) params.set("hide", hidden.join(","));
  return params.toString();
}

// ---- Query keys ----

export const queryKeys = {
  teams: ["teams"] as const,
  team: (id: string) => ["teams", id] as const,
  teamPlayers: (id: string) => ["teams", id, "players"] as const,
  games: (teamId?: string | null) => ["games", teamId ?? "all"] as const,
  game: (id: string) => ["games", "detail", id] as const,
  gameStats: (id: string) => ["games", "detail", id, "stats"] as const,
};
