import { describe, expect, it } from "vitest";
import { cellKey, containsCell, isInBounds, stepCell, wrapCell, wrapScalar } from "./grid-space";

describe("grid-space", () => {
  it("wraps scalar into [0, size)", () => {
    expect(wrapScalar(40, 40)).toBe(0);
    expect(wrapScalar(-1, 40)).toBe(39);
    expect(wrapScalar(17, 40)).toBe(17);
  });

  it("wraps cells past every edge", () => {
    expect(wrapCell({ x: -1, y: 30 }, 40, 30)).toEqual({ x: 39, y: 0 });
    expect(wrapCell({ x: 40, y: -1 }, 40, 30)).toEqual({ x: 0, y: 29 });
  });

  it("checks bounds on the half-open grid", () => {
    expect(isInBounds({ x: 0, y: 0 }, 40, 30)).toBe(true);
    expect(isInBounds({ x: 39, y: 29 }, 40, 30)).toBe(true);
    expect(isInBounds({ x: 40, y: 5 }, 40, 30)).toBe(false);
    expect(isInBounds({ x: 5, y: -1 }, 40, 30)).toBe(false);
  });

  it("steps one cell in screen coordinates", () => {
    expect(stepCell({ x: 5, y: 5 }, "up")).toEqual({ x: 5, y: 4 });
    expect(stepCell({ x: 5, y: 5 }, "down")).toEqual({ x: 5, y: 6 });
    expect(stepCell({ x: 5, y: 5 }, "left")).toEqual({ x: 4, y: 5 });
    expect(stepCell({ x: 5, y: 5 }, "right")).toEqual({ x: 6, y: 5 });
  });

  it("finds cells from an offset", () => {
    const cells = [
      { x: 1, y: 1 },
      { x: 2, y: 1 }
    ];
    expect(containsCell(cells, { x: 1, y: 1 })).toBe(true);
    expect(containsCell(cells, { x: 1, y: 1 }, 1)).toBe(false);
    expect(cellKey({ x: 3, y: 7 })).toBe("3,7");
  });
});
