import { describe, expect, it } from "vitest";
import { getCourtConfiguration } from "../config";
import { zoneFillPath } from "../svg";
import { ZONE_PAINT_ORDER, zoneAt, zoneName, zonePolygons } from "../zones";

const nba = getCourtConfiguration("nba");
const highSchool = getCourtConfiguration("highSchool");
const size = { width: 500, height: 470 };

describe("zonePolygons", () => {
  const fills = zonePolygons(nba, size);

  it("returns one fill per zone in paint order", () => {
    expect(fills.map((f) => f.zone)).toEqual([...ZONE_PAINT_ORDER]);
    expect(fills[0].zone).toBe("deep");
    expect(fills[fills.length - 1].zone).toBe("restricted");
  });

  it("covers the whole canvas with the deep fill", () => {
    expect(zoneFillPath(fills[0])).toBe(
      "M 0.00 0.00 L 500.00 0.00 L 500.00 470.00 L 0.00 470.00 Z"
    );
  });

  it("draws both corner boxes down to the extended arc", () => {
    const corner = fills.find((f) => f.zone === "corner3");
    if (!corner) throw new Error("missing corner3");
    expect(zoneFillPath(corner)).toBe(
      "M 0.00 0.00 L 30.00 0.00 L 30.00 221.63 L 0.00 221.63 Z " +
        "M 470.00 0.00 L 500.00 0.00 L 500.00 221.63 L 470.00 221.63 Z"
    );
  });

  it("is pure", () => {
    expect(zonePolygons(nba, size)).toEqual(fills);
  });
});

describe("zoneAt", () => {
  it.each([
    [{ x: 0.5, y: 7 / 47 }, "restricted"],
    [{ x: 0.5, y: 12 / 47 }, "paint"],
    [{ x: 0.5, y: 3 / 47 }, "paint"],
    [{ x: 0.5, y: 22 / 47 }, "midRange"],
    [{ x: 0.02, y: 0.1 }, "corner3"],
    [{ x: 0.5, y: 30 / 47 }, "aboveBreak3"],
    [{ x: 0.5, y: 0.9 }, "deep"],
  ])("NBA %o is %s", (position, zone) => {
    expect(zoneAt(position, nba)).toBe(zone);
  });

  it("handles the high-school arc that stops short of the corners", () => {
    expect(zoneAt({ x: 0.16, y: 2 / 47 }, highSchool)).toBe("midRange");
    expect(zoneAt({ x: 0.1, y: 2 / 47 }, highSchool)).toBe("aboveBreak3");
  });
});

describe("zone names", () => {
  it("names every zone", () => {
    expect(zoneName("aboveBreak3")).toBe("Above the Break 3");
    expect(zoneName("restricted")).toBe("Restricted Area");
  });
});
