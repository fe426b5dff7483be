import { describe, expect, it } from "vitest";
import { MODE_POLICIES, effectiveSpeed, ticksPerMove } from "./mode-policy";

describe("mode-policy", () => {
  it("ramps classic speed with snake length", () => {
    expect(effectiveSpeed(MODE_POLICIES.classic, { snakeLength: 3, speedBoost: false })).toBeCloseTo(8.15);
    expect(effectiveSpeed(MODE_POLICIES.classic, { snakeLength: 40, speedBoost: false })).toBeCloseTo(10);
    expect(effectiveSpeed(MODE_POLICIES.survival, { snakeLength: 40, speedBoost: false })).toBe(8);
  });

  it("applies the speed boost before the length ramp", () => {
    expect(effectiveSpeed(MODE_POLICIES.time_attack, { snakeLength: 3, speedBoost: true })).toBe(12);
    expect(effectiveSpeed(MODE_POLICIES.classic, { snakeLength: 3, speedBoost: true })).toBeCloseTo(12.15);
  });

  it("derives a rounded cadence of at least one tick", () => {
    expect(ticksPerMove(8, 60)).toBe(8);
    expect(ticksPerMove(8.15, 60)).toBe(7);
    expect(ticksPerMove(12, 60)).toBe(5);
    expect(ticksPerMove(500, 60)).toBe(1);
  });

  it("limits only time attack by the clock", () => {
    expect(MODE_POLICIES.time_attack.timeLimitTicks).toBe(3600);
    expect(MODE_POLICIES.classic.timeLimitTicks).toBeNull();
    expect(MODE_POLICIES.survival.spawnsObstacles).toBe(true);
    expect(MODE_POLICIES.classic.spawnsObstacles).toBe(false);
  });
});
