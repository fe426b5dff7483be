import { GAME_CONFIG, MODE_RULES, POWERUP_EFFECTS } from "../config/game-config";
import type { GameConfig, PlayMode } from "../types";

export interface ModePolicy {
  mode: PlayMode;
  /** Extra moves per second for each snake segment. */
  lengthSpeedBonus: number;
  spawnsObstacles: boolean;
  timeLimitTicks: number | null;
}

export const MODE_POLICIES: Record<PlayMode, ModePolicy> = {
  classic: {
    mode: "classic",
    lengthSpeedBonus: MODE_RULES.classicLengthSpeedBonus,
    spawnsObstacles: false,
    timeLimitTicks: null
  },
  time_attack: {
    mode: "time_attack",
    lengthSpeedBonus: 0,
    spawnsObstacles: false,
    timeLimitTicks: MODE_RULES.timeAttackSeconds * GAME_CONFIG.fps
  },
  survival: {
    mode: "survival",
    lengthSpeedBonus: 0,
    spawnsObstacles: true,
    timeLimitTicks: null
  }
};

export interface SpeedInput {
  snakeLength: number;
  speedBoost: boolean;
}

/** Moves per second. */
export function effectiveSpeed(
  policy: ModePolicy,
  input: SpeedInput,
  config: Pick<GameConfig, "baseSpeed" | "speedMultiplier"> = GAME_CONFIG
): number {
  let speed = config.baseSpeed * config.speedMultiplier;
  if (input.speedBoost) {
    speed *= POWERUP_EFFECTS.speedBoostFactor;
  }
  return speed + policy.lengthSpeedBonus * input.snakeLength;
}

export function ticksPerMove(speed: number, fps: number = GAME_CONFIG.fps): number {
  return Math.max(1, Math.round(fps / speed));
}
