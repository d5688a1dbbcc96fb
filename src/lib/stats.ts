import type { CourtConfiguration } from "./court/config";
import type { ShotType } from "./court/shotType";
import { ZONE_PAINT_ORDER, zoneAt, type ScoringZone } from "./court/zones";

// ============================================================
// Shooting Statistics
// Pure aggregation over recorded shots. Percentages are 0–100.
// ============================================================

/** The fields aggregation needs from a recorded shot. */
export interface StatShot {
  x: number;
  y: number;
  made: boolean;
  type: ShotType;
  isLayup: boolean;
  quarter: number;
  playerNumber: number;
}

export interface ShootingStats {
  twoPointAttempts: number;
  twoPointMade: number;
  threePointAttempts: number;
  threePointMade: number;
  freeThrowAttempts: number;
  freeThrowMade: number;
  fieldGoalAttempts: number;
  fieldGoalMade: number;
  fieldGoalPct: number;
  effectiveFieldGoalPct: number;
  layupAttempts: number;
  layupMade: number;
  points: number;
}

export function computeShootingStats(shots: readonly StatShot[]): ShootingStats {
  let twoPointAttempts = 0;
  let twoPointMade = 0;
  let threePointAttempts = 0;
  let threePointMade = 0;
  let freeThrowAttempts = 0;
  let freeThrowMade = 0;
  let layupAttempts = 0;
  let layupMade = 0;

  for (const shot of shots) {
    switch (shot.type) {
      case "twoPointer":
        twoPointAttempts++;
        if (shot.made) twoPointMade++;
        break;
      case "threePointer":
        threePointAttempts++;
        if (shot.made) threePointMade++;
        break;
      case "freeThrow":
        freeThrowAttempts++;
        if (shot.made) freeThrowMade++;
        break;
    }
    if (shot.isLayup) {
      layupAttempts++;
      if (shot.made) layupMade++;
    }
  }

  const fieldGoalAttempts = twoPointAttempts + threePointAttempts;
  const fieldGoalMade = twoPointMade + threePointMade;

  return {
    twoPointAttempts,
    twoPointMade,
    threePointAttempts,
    threePointMade,
    freeThrowAttempts,
    freeThrowMade,
    fieldGoalAttempts,
    fieldGoalMade,
    fieldGoalPct:
      fieldGoalAttempts > 0 ? (fieldGoalMade / fieldGoalAttempts) * 100 : 0,
    // eFG% = (FGM + 0.5 * 3PM) / FGA
    effectiveFieldGoalPct:
      fieldGoalAttempts > 0
        ? ((fieldGoalMade + 0.5 * threePointMade) / fieldGoalAttempts) * 100
        : 0,
    layupAttempts,
    layupMade,
    points: 2 * twoPointMade + 3 * threePointMade + freeThrowMade,
  };
}

// ============================================================
// Periods
// ============================================================

export type HistoryFilter = "quarter" | "h1" | "h2" | "all";

export const HISTORY_FILTERS: readonly HistoryFilter[] = [
  "quarter",
  "h1",
  "h2",
  "all",
] as const;

export function isHistoryFilter(value: unknown): value is HistoryFilter {
  return (
    typeof value === "string" &&
    (HISTORY_FILTERS as readonly string[]).includes(value)
  );
}

export function isFirstHalf(quarter: number): boolean {
  return quarter === 1 || quarter === 2;
}

export function isSecondHalf(quarter: number): boolean {
  return quarter === 3 || quarter === 4;
}

/** Quarters above 4 are overtime periods: "OT1", "OT2", ... */
export function periodLabel(quarter: number): string {
  return quarter > 4 ? `OT${quarter - 4}` : `Q${quarter}`;
}

/**
 * Period filter shared by shots and substitutions. Overtime only shows up
 * under "all" or when it is the current period.
 */
export function matchesHistory(
  quarter: number,
  filter: HistoryFilter,
  currentQuarter: number
): boolean {
  switch (filter) {
    case "quarter":
      return quarter === currentQuarter;
    case "h1":
      return isFirstHalf(quarter);
    case "h2":
      return isSecondHalf(quarter);
    case "all":
      return true;
  }
}

export interface PeriodStatsRow {
  label: string;
  stats: ShootingStats;
  isTotal: boolean;
}

export function gameSummaryRows(shots: readonly StatShot[]): PeriodStatsRow[] {
  return [
    {
      label: "1st Half",
      stats: computeShootingStats(shots.filter((s) => isFirstHalf(s.quarter))),
      isTotal: false,
    },
    {
      label: "2nd Half",
      stats: computeShootingStats(shots.filter((s) => isSecondHalf(s.quarter))),
      isTotal: false,
    },
    { label: "Full Game", stats: computeShootingStats(shots), isTotal: true },
  ];
}

// ============================================================
// Per-player breakdown
// ============================================================

export interface PlayerStatsRow {
  /** Jersey number; 0 = unassigned, null on the total row */
  number: number | null;
  label: string;
  name: string | null;
  stats: ShootingStats;
  isTotal: boolean;
}

/**
 * One row per jersey number (ascending), then unassigned shots as "--",
 * then a "Total" row. `names` maps jersey number to player name.
 */
export function playerStatsRows(
  shots: readonly StatShot[],
  names: ReadonlyMap<number, string | null> = new Map()
): PlayerStatsRow[] {
  const numbers = [...new Set(shots.map((s) => s.playerNumber))]
    .filter((n) => n !== 0)
    .sort((a, b) => a - b);

  const rows: PlayerStatsRow[] = numbers.map((number) => ({
    number,
    label: `#${number}`,
    name: names.get(number) ?? null,
    stats: computeShootingStats(shots.filter((s) => s.playerNumber === number)),
    isTotal: false,
  }));

  const unassigned = shots.filter((s) => s.playerNumber === 0);
  if (unassigned.length > 0) {
    rows.push({
      number: 0,
      label: "--",
      name: null,
      stats: computeShootingStats(unassigned),
      isTotal: false,
    });
  }

  rows.push({
    number: null,
    label: "Total",
    name: null,
    stats: computeShootingStats(shots),
    isTotal: true,
  });

  return rows;
}

// ============================================================
// Zone summary
// ============================================================

export interface ZoneSummary {
  zone: ScoringZone;
  fgm: number;
  fga: number;
  /** 0–1, matching the overlay's color scale */
  fgPct: number;
}

/** FGM/FGA per scoring zone in paint order. Free throws are excluded. */
export function zoneSummary(
  shots: readonly StatShot[],
  config: CourtConfiguration
): ZoneSummary[] {
  const tally = new Map<ScoringZone, { fgm: number; fga: number }>(
    ZONE_PAINT_ORDER.map((zone) => [zone, { fgm: 0, fga: 0 }])
  );

  for (const shot of shots) {
    if (shot.type === "freeThrow") continue;
    const entry = tally.get(zoneAt(shot, config));
    if (!entry) continue;
    entry.fga++;
    if (shot.made) entry.fgm++;
  }

  return ZONE_PAINT_ORDER.map((zone) => {
    const { fgm, fga } = tally.get(zone) ?? { fgm: 0, fga: 0 };
    return { zone, fgm, fga, fgPct: fga > 0 ? fgm / fga : 0 };
  });
}

// ============================================================
// Shot filters
// ============================================================

export interface ShotFilters {
  made: boolean;
  missed: boolean;
  twoPoint: boolean;
  threePoint: boolean;
  freeThrow: boolean;
  layup: boolean;
}

export const SHOT_FILTER_KEYS: readonly (keyof ShotFilters)[] = [
  "made",
  "missed",
  "twoPoint",
  "threePoint",
  "freeThrow",
  "layup",
];

export const ALL_SHOT_FILTERS: Readonly<ShotFilters> = Object.freeze({
  made: true,
  missed: true,
  twoPoint: true,
  threePoint: true,
  freeThrow: true,
  layup: true,
});

export function isFiltering(filters: ShotFilters): boolean {
  return Object.values(filters).some((on) => !on);
}

/** A layup is governed by the layup toggle alone, whatever its type. */
export function matchesShotFilters(shot: StatShot, filters: ShotFilters): boolean {
  const resultMatches = shot.made ? filters.made : filters.missed;
  if (!resultMatches) return false;
  if (shot.isLayup) return filters.layup;

  switch (shot.type) {
    case "twoPointer":
      return filters.twoPoint;
    case "threePointer":
      return filters.threePoint;
    case "freeThrow":
      return filters.freeThrow;
  }
}

export function filterShots<T extends StatShot>(
  shots: readonly T[],
  history: HistoryFilter,
  currentQuarter: number,
  filters: ShotFilters = ALL_SHOT_FILTERS
): T[] {
  return shots.filter(
    (shot) =>
      matchesHistory(shot.quarter, history, currentQuarter) &&
      matchesShotFilters(shot, filters)
  );
}

/** Formatted like the stats table: whole-number percent. */
export function formatPct(pct: number): string {
  return pct.toFixed(0);
}
