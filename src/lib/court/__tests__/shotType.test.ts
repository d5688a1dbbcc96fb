import { describe, expect, it } from "vitest";
import { getCourtConfiguration } from "../config";
import {
  classifyShot,
  distanceFromBasket,
  isLayupToggleAvailable,
  shotTypeCode,
  shotTypeFromCode,
  shotTypeLabel,
  shouldAutoFlagLayup,
} from "../shotType";

const nba = getCourtConfiguration("nba");
const college = getCourtConfiguration("college");
const highSchool = getCourtConfiguration("highSchool");

describe("classifyShot", () => {
  it("treats the free-throw spot as a free throw", () => {
    expect(classifyShot({ x: 0.5, y: 19 / 47 }, nba)).toBe("freeThrow");
  });

  it("accepts taps within 2 ft of the free-throw line", () => {
    expect(classifyShot({ x: 0.5, y: 20.9 / 47 }, nba)).toBe("freeThrow");
  });

  it("ignores the free-throw box more than 6 ft off center", () => {
    expect(classifyShot({ x: 0.5 + 6.5 / 50, y: 19 / 47 }, nba)).toBe("twoPointer");
  });

  it("uses the corner threshold near the sideline", () => {
    // 22 ft straight out from the basket, inside the corner band
    expect(classifyShot({ x: 0.06, y: 5.25 / 47 }, nba)).toBe("threePointer");
  });

  it("uses the arc threshold away from the corners", () => {
    // 22 ft straight up the middle is inside the 23.75 ft arc
    expect(classifyShot({ x: 0.5, y: 27.25 / 47 }, nba)).toBe("twoPointer");
  });

  it("depends on the court level", () => {
    const position = { x: 0.5, y: 0.6 };
    expect(classifyShot(position, nba)).toBe("twoPointer");
    expect(classifyShot(position, college)).toBe("threePointer");
  });

  it("counts a shot on the painted line as a three", () => {
    expect(classifyShot({ x: 0.5, y: 25 / 47 }, highSchool)).toBe("threePointer");
    expect(classifyShot({ x: 0.5, y: 24.25 / 47 }, highSchool)).toBe("twoPointer");
  });

  it("scores a wide sideline tap against the corner distance", () => {
    // 25.6 ft out along the baseline side, beyond both thresholds
    expect(classifyShot({ x: 0.02, y: 0.3 }, nba)).toBe("threePointer");
  });

  it.each([
    // 22.5 ft from the basket: past the 21.5 ft corner threshold, short of the 23.5 ft arc
    { label: "in the corner", position: { x: 0.06, y: (5.25 + Math.sqrt(22.5 ** 2 - 22 ** 2)) / 47 }, expected: "threePointer" },
    { label: "above the break", position: { x: 0.5, y: (5.25 + 22.5) / 47 }, expected: "twoPointer" },
  ])("classifies the same distance differently $label", ({ position, expected }) => {
    expect(distanceFromBasket(position)).toBeCloseTo(22.5);
    expect(classifyShot(position, nba)).toBe(expected);
  });

  it("does not reject positions outside the court", () => {
    expect(classifyShot({ x: 0.5, y: 1.4 }, nba)).toBe("threePointer");
  });
});

describe("layup distance", () => {
  it("measures from the basket in feet", () => {
    expect(distanceFromBasket({ x: 0.5, y: 5.25 / 47 })).toBe(0);
    expect(distanceFromBasket({ x: 0.5 + 3 / 50, y: (5.25 + 4) / 47 })).toBeCloseTo(5);
  });

  it("auto-flags within 5 ft and offers the toggle within 8 ft", () => {
    const close = { x: 0.5, y: 8.25 / 47 };
    const mid = { x: 0.5, y: 11.25 / 47 };
    const far = { x: 0.5, y: 14.25 / 47 };

    expect(shouldAutoFlagLayup(close)).toBe(true);
    expect(shouldAutoFlagLayup(mid)).toBe(false);
    expect(isLayupToggleAvailable(mid)).toBe(true);
    expect(isLayupToggleAvailable(far)).toBe(false);
  });
});

describe("shot type codes", () => {
  it("maps types to stored codes and back", () => {
    expect(shotTypeCode("twoPointer")).toBe(0);
    expect(shotTypeCode("threePointer")).toBe(1);
    expect(shotTypeCode("freeThrow")).toBe(2);
    expect(shotTypeFromCode(2)).toBe("freeThrow");
    expect(shotTypeFromCode(7)).toBeNull();
  });

  it("labels types in short and long form", () => {
    expect(shotTypeLabel("twoPointer")).toBe("2PT");
    expect(shotTypeLabel("threePointer", false)).toBe("3-Pointer");
    expect(shotTypeLabel("freeThrow", false)).toBe("Free Throw");
  });
});

describe("high school three-point line", () => {
  const radius = highSchool.threePointArcFeet;

  it.each([0, 15, 30, 45, 60, 75, 90, 105, 120, 135, 150, 165, 180])(
    "counts a tap on the arc at %i degrees as a three",
    (degrees) => {
      const angle = (degrees * Math.PI) / 180;
      const position = {
        x: (25 + radius * Math.cos(angle)) / 50,
        y: (5.25 + radius * Math.sin(angle)) / 47,
      };
      expect(classifyShot(position, highSchool)).toBe("threePointer");
    }
  );

  it.each([22, 23, 25])("classifies %i ft the same in and out of the corner band", (feet) => {
    const corner = { x: 0.06, y: (5.25 + Math.sqrt(feet ** 2 - 22 ** 2)) / 47 };
    const top = { x: 0.5, y: (5.25 + feet) / 47 };
    expect(classifyShot(corner, highSchool)).toBe(classifyShot(top, highSchool));
  });
});

describe("left/right symmetry", () => {
  // Sixty-fourths mirror exactly: 1 - k/64 === (64 - k)/64
  const steps = Array.from({ length: 65 }, (_, k) => k / 64);
  const depths = Array.from({ length: 41 }, (_, j) => j / 40);

  it.each([
    ["high school", highSchool],
    ["college", college],
    ["NBA", nba],
  ])("mirrors every classification on the %s court", (_name, config) => {
    const mismatches: { x: number; y: number }[] = [];
    for (const x of steps) {
      for (const y of depths) {
        if (classifyShot({ x, y }, config) !== classifyShot({ x: 1 - x, y }, config)) {
          mismatches.push({ x, y });
        }
      }
    }
    expect(mismatches).toEqual([]);
  });
});
