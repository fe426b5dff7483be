import type { GameConfig, PlayMode, PowerupKind } from "../types";

export const GAME_CONFIG: GameConfig = {
  gridWidth: 40,
  gridHeight: 30,
  fps: 60,
  baseSpeed: 8,
  speedMultiplier: 1,
  startLength: 3
};

export const PLAY_MODES: readonly PlayMode[] = ["classic", "time_attack", "survival"];

export const POWERUP_KINDS: readonly PowerupKind[] = ["speed_boost", "shield", "multiplier", "ghost"];

// Ticks at GAME_CONFIG.fps, so 300 is five seconds.
export const POWERUP_DURATIONS: Record<PowerupKind, number> = {
  speed_boost: 300,
  shield: 300,
  multiplier: 300,
  ghost: 300
};

export const POWERUP_EFFECTS = {
  speedBoostFactor: 1.5,
  scoreMultiplier: 2
};

export const SCORE_RULES = {
  foodBaseScore: 10
};

export const MODE_RULES = {
  classicLengthSpeedBonus: 0.05,
  timeAttackSeconds: 60,
  obstacleLengthStep: 5
};

export const SPAWN_RULES = {
  maxPickups: 2,
  powerupIntervalTicks: GAME_CONFIG.fps * 10,
  maxAttempts: 10_000
};

export const PARTICLE_RULES = {
  life: 30,
  maxSpeed: 0.15,
  foodBurst: 15,
  pickupBurst: 15,
  shieldBurst: 20
};

export const GAME_VERSION = "0.1.0";
