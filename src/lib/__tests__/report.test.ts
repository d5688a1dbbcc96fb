import { describe, expect, it } from "vitest";
import {
  buildReportCsv,
  buildReportHtml,
  escapeHtml,
  formatLongDate,
  reportFileName,
  type ReportInput,
} from "@/lib/report";
import type { StatShot } from "@/lib/stats";

function shot(overrides: Partial<StatShot>): StatShot {
  return {
    x: 0.5,
    y: 0.5,
    made: false,
    type: "twoPointer",
    isLayup: false,
    quarter: 1,
    playerNumber: 0,
    ...overrides,
  };
}

const input: ReportInput = {
  gameDate: "2026-03-05T18:00:00.000Z",
  teamName: "Lady Hawks",
  playerNames: new Map([[3, "Ana"]]),
  shots: [
    shot({ made: true, playerNumber: 3 }),
    shot({ made: true, type: "threePointer", quarter: 2, playerNumber: 3 }),
    shot({ type: "threePointer", quarter: 3, playerNumber: 5 }),
    shot({ made: true, type: "freeThrow", quarter: 4 }),
    shot({ isLayup: true, playerNumber: 5 }),
  ],
};

describe("report naming", () => {
  it("builds the download name from the team and game date", () => {
    expect(reportFileName("Lady Hawks", input.gameDate, "csv")).toBe(
      "Stats_Lady_Hawks_2026-03-05.csv"
    );
    expect(reportFileName(null, input.gameDate, "html")).toBe("Stats_Game_2026-03-05.html");
  });

  it.each([
    ['The "A" Team', "Stats_The_A_Team_2026-03-05.csv"],
    ["Tigers 🏀", "Stats_Tigers_2026-03-05.csv"],
    ["東京 Hoops", "Stats_Hoops_2026-03-05.csv"],
    ["Lady  Hawks / JV", "Stats_Lady_Hawks_JV_2026-03-05.csv"],
    ["東京", "Stats_Game_2026-03-05.csv"],
  ])("keeps only header-safe characters of %s", (team, expected) => {
    expect(reportFileName(team, input.gameDate, "csv")).toBe(expected);
  });

  it("formats the game date for the header", () => {
    expect(formatLongDate(input.gameDate)).toBe("March 5, 2026");
  });
});

describe("buildReportCsv", () => {
  it("writes one row per player plus unassigned and total rows", () => {
    expect(buildReportCsv(input)).toBe(
      [
        "#,Name,2Pa,2Pm,3Pa,3Pm,FTa,FTm,FGa,FGm,FG%,eFG%",
        "#3,Ana,1,1,1,1,0,0,2,2,100,125",
        "#5,,1,0,1,0,0,0,2,0,0,0",
        "--,Unassigned,0,0,0,0,1,1,0,0,0,0",
        ",Total,2,1,2,1,1,1,4,2,50,63",
      ].join("\n") + "\n"
    );
  });

  it("quotes names containing commas", () => {
    const csv = buildReportCsv({ ...input, playerNames: new Map([[3, "Smith, Ana"]]) });
    expect(csv.split("\n")[1]).toBe('#3,"Smith, Ana",1,1,1,1,0,0,2,2,100,125');
  });
});

describe("buildReportHtml", () => {
  it("renders the header and both tables", () => {
    const lines = buildReportHtml(input).split("\n");
    expect(lines).toContain("<h1>Game Statistics</h1>");
    expect(lines).toContain('<p class="subtitle">Lady Hawks</p>');
    expect(lines).toContain('<p class="muted">March 5, 2026</p>');
    expect(lines).toContain(
      "<tr><td>#3</td><td>Ana</td><td>1</td><td>1</td><td>1</td><td>1</td><td>0</td><td>0</td><td>2</td><td>2</td><td>100%</td><td>125%</td></tr>"
    );
    expect(lines[lines.length - 1]).toBe(
      "<footer>Generated by Shot Chart</footer></body></html>"
    );
  });

  it("skips the player table for a game without shots", () => {
    const html = buildReportHtml({ ...input, shots: [], teamName: null });
    expect(html).not.toContain("Player Statistics");
    expect(html).not.toContain('class="subtitle"');
  });

  it("escapes names", () => {
    expect(escapeHtml(`<b>Tom & "Jerry's"</b>`)).toBe(
      "&lt;b&gt;Tom &amp; &quot;Jerry&#39;s&quot;&lt;/b&gt;"
    );
  });
});
