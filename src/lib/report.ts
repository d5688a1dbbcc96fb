import {
  formatPct,
  gameSummaryRows,
  playerStatsRows,
  type PlayerStatsRow,
  type ShootingStats,
  type StatShot,
} from "./stats";

// ============================================================
// Game report export
// A printable HTML page (print to PDF from the browser) and a
// CSV of the per-player table.
// ============================================================

export interface ReportInput {
  gameDate: string;
  teamName: string | null;
  shots: readonly StatShot[];
  /** Jersey number → player name for the team's roster */
  playerNames: ReadonlyMap<number, string | null>;
}

export type ReportFormat = "html" | "csv";

export function isReportFormat(value: unknown): value is ReportFormat {
  return value === "html" || value === "csv";
}

const STAT_HEADERS = ["2Pa", "2Pm", "3Pa", "3Pm", "FTa", "FTm", "FGa", "FGm", "FG%", "eFG%"];

function statCells(stats: ShootingStats, pctSuffix: string): string[] {
  return [
    String(stats.twoPointAttempts),
    String(stats.twoPointMade),
    String(stats.threePointAttempts),
    String(stats.threePointMade),
    String(stats.freeThrowAttempts),
    String(stats.freeThrowMade),
    String(stats.fieldGoalAttempts),
    String(stats.fieldGoalMade),
    `${formatPct(stats.fieldGoalPct)}${pctSuffix}`,
    `${formatPct(stats.effectiveFieldGoalPct)}${pctSuffix}`,
  ];
}

function numberCell(row: PlayerStatsRow): string {
  if (row.isTotal) return "";
  return row.number !== null && row.number > 0 ? `#${row.number}` : "--";
}

function nameCell(row: PlayerStatsRow): string {
  if (row.isTotal) return "Total";
  if (row.name) return row.name;
  return row.number === 0 ? "Unassigned" : "";
}

// Header-safe: ASCII letters, digits, "_" and "-" only
function safeNamePart(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]+/g, "_").replace(/^_+|_+$/g, "");
}

/** "Stats_Lady_Hawks_2026-03-05.html", or "Stats_Game_..." without a team. */
export function reportFileName(
  teamName: string | null,
  gameDate: string,
  format: ReportFormat
): string {
  const teamPart = safeNamePart(teamName ?? "") || "Game";
  const datePart = new Date(gameDate).toISOString().slice(0, 10);
  return `Stats_${teamPart}_${datePart}.${format}`;
}

export function formatLongDate(iso: string): string {
  return new Intl.DateTimeFormat("en-US", {
    dateStyle: "long",
    timeZone: "UTC",
  }).format(new Date(iso));
}

// ---- HTML ----

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function tableRow(cells: string[], tag: "td" | "th", className?: string): string {
  const cls = className ? ` class="${className}"` : "";
  return `<tr${cls}>${cells.map((c) => `<${tag}>${escapeHtml(c)}</${tag}>`).join("")}</tr>`;
}

const REPORT_STYLES = [
  "body{font-family:-apple-system,BlinkMacSystemFont,Segoe UI,Roboto,Helvetica,Arial,sans-serif;padding:24px;color:#111;}",
  "h1{font-size:24px;margin:0 0 8px 0;}",
  "h2{font-size:14px;margin:24px 0 8px 0;}",
  "table{border-collapse:collapse;width:100%;}",
  "th,td{border-bottom:1px solid #ddd;padding:6px;font-size:11px;text-align:center;}",
  "th:first-child,td:first-child{text-align:left;}",
  ".subtitle{font-size:16px;color:#555;margin:0;}",
  ".muted{color:#888;font-size:12px;}",
  ".total{font-weight:700;background:#eef4ff;}",
  "footer{margin-top:24px;text-align:right;color:#999;font-size:9px;}",
].join("");

export function buildReportHtml(input: ReportInput): string {
  const summary = gameSummaryRows(input.shots);
  const players = playerStatsRows(input.shots, input.playerNames);
  const parts: string[] = [];

  parts.push(
    `<!DOCTYPE html><html><head><meta charset="utf-8"/><title>Game Statistics</title><style>${REPORT_STYLES}</style></head><body>`
  );
  parts.push("<h1>Game Statistics</h1>");
  if (input.teamName) {
    parts.push(`<p class="subtitle">${escapeHtml(input.teamName)}</p>`);
  }
  parts.push(`<p class="muted">${escapeHtml(formatLongDate(input.gameDate))}</p>`);

  parts.push("<h2>Game Summary</h2><table>");
  parts.push(tableRow(["Period", ...STAT_HEADERS], "th"));
  for (const row of summary) {
    parts.push(
      tableRow([row.label, ...statCells(row.stats, "%")], "td", row.isTotal ? "total" : undefined)
    );
  }
  parts.push("</table>");

  // Player table is skipped for a game with no shots.
  if (input.shots.length > 0) {
    parts.push("<h2>Player Statistics</h2><table>");
    parts.push(tableRow(["#", "Name", ...STAT_HEADERS], "th"));
    for (const row of players) {
      parts.push(
        tableRow(
          [numberCell(row), nameCell(row), ...statCells(row.stats, "%")],
          "td",
          row.isTotal ? "total" : undefined
        )
      );
    }
    parts.push("</table>");
  }

  parts.push("<footer>Generated by Shot Chart</footer></body></html>");
  return parts.join("\n");
}

// ---- CSV ----

export function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Per-player table; percentages as whole numbers without the % sign. */
export function buildReportCsv(input: ReportInput): string {
  const rows = playerStatsRows(input.shots, input.playerNames);
  const lines = [["#", "Name", ...STAT_HEADERS].map(csvField).join(",")];
  for (const row of rows) {
    lines.push(
      [numberCell(row), nameCell(row), ...statCells(row.stats, "")].map(csvField).join(",")
    );
  }
  return lines.join("\n") + "\n";
}
