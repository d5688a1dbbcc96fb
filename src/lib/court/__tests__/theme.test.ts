import { describe, expect, it } from "vitest";
import {
  DEFAULT_COURT_THEME,
  colorToCss,
  colorToHex,
  isCourtBackgroundPattern,
  lineColorCss,
  lineColorToString,
  parseColorList,
  parseHexColor,
  parseLineColor,
  themeFromColumns,
  themeToColumns,
  usableColors,
  zoneColors,
  type CourtTheme,
} from "../theme";

const red = { r: 255, g: 0, b: 0, alpha: 1 };
const blue = { r: 0, g: 0, b: 255, alpha: 1 };
const green = { r: 0, g: 255, b: 0, alpha: 1 };

describe("parseHexColor", () => {
  it("reads six-digit colors with or without #", () => {
    expect(parseHexColor("#FF8000")).toEqual({ r: 255, g: 128, b: 0, alpha: 1 });
    expect(parseHexColor(" 00ff00 ")).toEqual(green);
  });

  it("reads an alpha byte", () => {
    expect(parseHexColor("ff000080")).toEqual({ r: 255, g: 0, b: 0, alpha: 128 / 255 });
  });

  it("rejects other lengths and non-hex digits", () => {
    expect(parseHexColor("#FFF")).toBeNull();
    expect(parseHexColor("GGGGGG")).toBeNull();
  });
});

describe("color formatting", () => {
  it("writes uppercase hex without alpha", () => {
    expect(colorToHex({ r: 255, g: 128, b: 0, alpha: 0.5 })).toBe("#FF8000");
  });

  it("combines color alpha with layer opacity", () => {
    expect(colorToCss(red, 0.5)).toBe("rgba(255, 0, 0, 0.5)");
  });

  it("drops invalid entries from a color list", () => {
    expect(parseColorList("#FF0000, bogus,#0000FF")).toEqual([red, blue]);
    expect(parseColorList(null)).toEqual([]);
  });
});

describe("line colors", () => {
  it("parses named and custom colors", () => {
    expect(parseLineColor("Black")).toEqual({ kind: "black" });
    expect(parseLineColor("#123456")).toEqual({
      kind: "custom",
      color: { r: 0x12, g: 0x34, b: 0x56, alpha: 1 },
    });
  });

  it("falls back to white", () => {
    expect(parseLineColor("nope")).toEqual({ kind: "white" });
    expect(parseLineColor(null)).toEqual({ kind: "white" });
  });

  it("stores and renders line colors", () => {
    expect(lineColorToString(parseLineColor("#123456"))).toBe("#123456");
    expect(lineColorToString({ kind: "black" })).toBe("black");
    expect(lineColorCss({ kind: "white" })).toBe("#FFFFFF");
  });
});

describe("theme columns", () => {
  it("uses the default theme when a team has no columns", () => {
    expect(themeFromColumns(null)).toEqual({ ...DEFAULT_COURT_THEME, backgroundColors: [] });
  });

  it("repairs out-of-range stored values", () => {
    const theme = themeFromColumns({
      court_background_color: "#FF0000",
      court_background_alpha: 0,
      court_line_color: null,
      court_background_pattern: "plaid",
      court_pattern_scale: -1,
    });
    expect(theme).toEqual({
      backgroundColors: [red],
      backgroundAlpha: 1,
      lineColor: { kind: "white" },
      pattern: "solid",
      patternScale: 1,
    });
  });

  it("writes a theme back to columns", () => {
    const theme: CourtTheme = {
      backgroundColors: [red, blue],
      backgroundAlpha: 0.8,
      lineColor: { kind: "black" },
      pattern: "halfVertical",
      patternScale: 1,
    };
    expect(themeToColumns(theme)).toEqual({
      court_background_color: "#FF0000,#0000FF",
      court_background_alpha: 0.8,
      court_line_color: "black",
      court_background_pattern: "halfVertical",
      court_pattern_scale: 1,
    });
  });
});

describe("pattern colors", () => {
  const theme: CourtTheme = {
    backgroundColors: [red, blue, green],
    backgroundAlpha: 1,
    lineColor: { kind: "white" },
    pattern: "halfVertical",
    patternScale: 1,
  };

  it("clips colors to the pattern's maximum", () => {
    expect(usableColors(theme)).toEqual([red, blue]);
  });

  it("cycles colors over the zones in paint order", () => {
    expect(zoneColors({ ...theme, backgroundColors: [red, blue] })).toEqual({
      deep: red,
      aboveBreak3: blue,
      corner3: red,
      midRange: blue,
      paint: red,
      restricted: blue,
    });
    expect(zoneColors({ ...theme, backgroundColors: [] })).toEqual({});
  });

  it("only accepts known pattern ids", () => {
    expect(isCourtBackgroundPattern("checkerboard")).toBe(true);
    expect(isCourtBackgroundPattern("toString")).toBe(false);
  });
});
