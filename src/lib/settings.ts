import { parseCourtLevel, type CourtLevel } from "./court/config";

// ============================================================
// App settings
// Read from NEXT_PUBLIC_* variables so the client bundle sees
// the same values as the API routes.
// ============================================================

export interface AppSettings {
  /** Court level for games whose team has none */
  defaultCourtLevel: CourtLevel;
  /** Layup tracking: auto-flag and the layup toggle */
  showLayup: boolean;
  /** "2PT" vs "2-Pointer" */
  useAbbreviations: boolean;
}

export const DEFAULT_SETTINGS: Readonly<AppSettings> = Object.freeze({
  defaultCourtLevel: "highSchool",
  showLayup: true,
  useAbbreviations: true,
});

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return fallback;
  }
}

export function loadSettings(
  env: Record<string, string | undefined> = {
    NEXT_PUBLIC_DEFAULT_COURT_LEVEL: process.env.NEXT_PUBLIC_DEFAULT_COURT_LEVEL,
    NEXT_PUBLIC_SHOW_LAYUP: process.env.NEXT_PUBLIC_SHOW_LAYUP,
    NEXT_PUBLIC_USE_ABBREVIATIONS: process.env.NEXT_PUBLIC_USE_ABBREVIATIONS,
  }
): AppSettings {
  return {
    defaultCourtLevel: parseCourtLevel(
      env.NEXT_PUBLIC_DEFAULT_COURT_LEVEL,
      DEFAULT_SETTINGS.defaultCourtLevel
    ),
    showLayup: parseFlag(env.NEXT_PUBLIC_SHOW_LAYUP, DEFAULT_SETTINGS.showLayup),
    useAbbreviations: parseFlag(
      env.NEXT_PUBLIC_USE_ABBREVIATIONS,
      DEFAULT_SETTINGS.useAbbreviations
    ),
  };
}

/** Team level when set, else the app default. */
export function effectiveCourtLevel(
  teamLevel: string | null | undefined,
  settings: AppSettings = loadSettings()
): CourtLevel {
  return parseCourtLevel(teamLevel, settings.defaultCourtLevel);
}
