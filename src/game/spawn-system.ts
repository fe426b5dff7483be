import { GAME_CONFIG, MODE_RULES, POWERUP_DURATIONS, POWERUP_KINDS, SPAWN_RULES } from "../config/game-config";
import type { Cell, ObstacleState, PickupState, PowerupKind } from "../types";
import { pickRandom, randInt, type RandomFn } from "../util/random";
import { cellKey, cellsEqual } from "../world/grid-space";

export type SpawnTarget = "food" | "powerup" | "obstacle";

export class SpawnExhaustedError extends Error {
  readonly target: SpawnTarget;
  readonly attempts: number;

  constructor(target: SpawnTarget, attempts: number) {
    super(`no free cell for ${target} after ${attempts} attempts`);
    this.name = "SpawnExhaustedError";
    this.target = target;
    this.attempts = attempts;
  }
}

export interface SpawnConfig {
  width: number;
  height: number;
  maxPickups: number;
  powerupIntervalTicks: number;
  obstacleLengthStep: number;
  maxAttempts: number;
}

export const DEFAULT_SPAWN_CONFIG: SpawnConfig = {
  width: GAME_CONFIG.gridWidth,
  height: GAME_CONFIG.gridHeight,
  maxPickups: SPAWN_RULES.maxPickups,
  powerupIntervalTicks: SPAWN_RULES.powerupIntervalTicks,
  obstacleLengthStep: MODE_RULES.obstacleLengthStep,
  maxAttempts: SPAWN_RULES.maxAttempts
};

interface Occupancy {
  snake: boolean;
  food: boolean;
  pickups: boolean;
  obstacles: boolean;
}

const OCCUPANCY: Record<SpawnTarget, Occupancy> = {
  food: { snake: true, food: false, pickups: true, obstacles: true },
  powerup: { snake: true, food: true, pickups: true, obstacles: true },
  obstacle: { snake: true, food: true, pickups: true, obstacles: true }
};

/**
 * Places food, power-up pickups and obstacles on free cells by rejection
 * sampling. Attempts are capped; running out means the board is effectively
 * full, which ordinary play never reaches.
 */
export class SpawnSystem {
  private readonly random: RandomFn;
  private readonly config: SpawnConfig;
  private nextId = 1;
  private powerupTimerTicks = 0;

  food: Cell = { x: 0, y: 0 };
  readonly pickups: PickupState[] = [];
  readonly obstacles: ObstacleState[] = [];

  constructor(random: RandomFn = Math.random, config: SpawnConfig = DEFAULT_SPAWN_CONFIG) {
    this.random = random;
    this.config = config;
  }

  get powerupTimer(): number {
    return this.powerupTimerTicks;
  }

  reset(snake: readonly Cell[]): void {
    this.nextId = 1;
    this.powerupTimerTicks = 0;
    this.pickups.length = 0;
    this.obstacles.length = 0;
    this.respawnFood(snake);
  }

  respawnFood(snake: readonly Cell[]): Cell {
    this.food = this.findFreeCell("food", snake);
    return this.food;
  }

  /** Advances the power-up timer; on each full interval tries one spawn. */
  updatePowerupTimer(snake: readonly Cell[]): PickupState | null {
    this.powerupTimerTicks += 1;
    if (this.powerupTimerTicks < this.config.powerupIntervalTicks) {
      return null;
    }
    this.powerupTimerTicks = 0;
    return this.trySpawnPowerup(snake);
  }

  trySpawnPowerup(snake: readonly Cell[], kind?: PowerupKind): PickupState | null {
    if (this.pickups.length >= this.config.maxPickups) {
      return null;
    }
    const position = this.findFreeCell("powerup", snake);
    const chosen = kind ?? pickRandom(this.random, POWERUP_KINDS);
    const pickup: PickupState = {
      id: this.nextId++,
      position,
      kind: chosen,
      durationTicks: POWERUP_DURATIONS[chosen]
    };
    this.pickups.push(pickup);
    return pickup;
  }

  /** Adds one obstacle when the length sits on a step boundary and the field is under quota. */
  updateObstacles(snake: readonly Cell[]): ObstacleState | null {
    if (!shouldSpawnObstacle(snake.length, this.obstacles.length, this.config.obstacleLengthStep)) {
      return null;
    }
    const obstacle: ObstacleState = {
      id: this.nextId++,
      position: this.findFreeCell("obstacle", snake)
    };
    this.obstacles.push(obstacle);
    return obstacle;
  }

  consumePickup(pickupId: number): void {
    const idx = this.pickups.findIndex((pickup) => pickup.id === pickupId);
    if (idx >= 0) {
      this.pickups.splice(idx, 1);
    }
  }

  removeObstacleAt(cell: Cell): boolean {
    const idx = this.obstacles.findIndex((obstacle) => cellsEqual(obstacle.position, cell));
    if (idx < 0) {
      return false;
    }
    this.obstacles.splice(idx, 1);
    return true;
  }

  private findFreeCell(target: SpawnTarget, snake: readonly Cell[]): Cell {
    const occupied = this.occupiedCells(target, snake);
    for (let attempt = 0; attempt < this.config.maxAttempts; attempt += 1) {
      const candidate = {
        x: randInt(this.random, 0, this.config.width),
        y: randInt(this.random, 0, this.config.height)
      };
      if (!occupied.has(cellKey(candidate))) {
        return candidate;
      }
    }
    throw new SpawnExhaustedError(target, this.config.maxAttempts);
  }

  private occupiedCells(target: SpawnTarget, snake: readonly Cell[]): Set<string> {
    const avoid = OCCUPANCY[target];
    const occupied = new Set<string>();
    if (avoid.snake) {
      snake.forEach((cell) => occupied.add(cellKey(cell)));
    }
    if (avoid.food) {
      occupied.add(cellKey(this.food));
    }
    if (avoid.pickups) {
      this.pickups.forEach((pickup) => occupied.add(cellKey(pickup.position)));
    }
    if (avoid.obstacles) {
      this.obstacles.forEach((obstacle) => occupied.add(cellKey(obstacle.position)));
    }
    return occupied;
  }
}

export function shouldSpawnObstacle(snakeLength: number, obstacleCount: number, step: number): boolean {
  return snakeLength > 0 && snakeLength % step === 0 && obstacleCount < Math.floor(snakeLength / step);
}
