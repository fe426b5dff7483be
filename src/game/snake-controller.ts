import type { Cell, Direction, SnakeSnapshot } from "../types";
import { cellsEqual, containsCell, isInBounds, stepCell, wrapCell } from "../world/grid-space";
import { PowerupTimers } from "./powerup-timers";

const OPPOSITE: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left"
};

export interface SnakeConfig {
  width: number;
  height: number;
}

export type MoveResult = { ok: true } | { ok: false; collision: "wall" | "self" };

export class SnakeController {
  readonly body: Cell[] = [];
  readonly powerups = new PowerupTimers();
  private currentDirection: Direction = "right";
  private pendingGrowth = 0;
  private readonly config: SnakeConfig;

  constructor(config: SnakeConfig) {
    this.config = config;
  }

  get head(): Cell {
    const head = this.body[0];
    if (!head) {
      throw new Error("snake has no segments; call reset() first");
    }
    return head;
  }

  get direction(): Direction {
    return this.currentDirection;
  }

  get growPending(): number {
    return this.pendingGrowth;
  }

  get length(): number {
    return this.body.length;
  }

  /**
   * Lays the body out in a straight line behind `start`, away from `direction`.
   * Defaults to the grid centre heading right.
   */
  reset(startLength = 3, start?: Cell, direction: Direction = "right"): void {
    const head = start ?? {
      x: Math.floor(this.config.width / 2),
      y: Math.floor(this.config.height / 2)
    };
    const back = OPPOSITE[direction];
    this.body.length = 0;
    let cell = { x: head.x, y: head.y };
    for (let i = 0; i < Math.max(1, startLength); i += 1) {
      this.body.push(cell);
      cell = stepCell(cell, back);
    }
    this.currentDirection = direction;
    this.pendingGrowth = 0;
    this.powerups.clear();
  }

  /** Rejects a turn that would put the head on the neck. */
  setDirection(direction: Direction): boolean {
    const neck = this.body[1];
    const next = wrapCell(stepCell(this.head, direction), this.config.width, this.config.height);
    if (neck && cellsEqual(next, neck)) {
      return false;
    }
    this.currentDirection = direction;
    return true;
  }

  grow(amount = 1): void {
    this.pendingGrowth += Math.max(0, amount);
  }

  move(ghost: boolean): MoveResult {
    let next = stepCell(this.head, this.currentDirection);
    if (ghost) {
      next = wrapCell(next, this.config.width, this.config.height);
    } else if (!isInBounds(next, this.config.width, this.config.height)) {
      return { ok: false, collision: "wall" };
    }

    // The tail still counts here: it has not moved out of the way yet.
    if (containsCell(this.body, next, 1)) {
      return { ok: false, collision: "self" };
    }

    this.body.unshift(next);
    if (this.pendingGrowth > 0) {
      this.pendingGrowth -= 1;
    } else {
      this.body.pop();
    }
    return { ok: true };
  }

  snapshot(): SnakeSnapshot {
    return {
      body: this.body.map((cell) => ({ x: cell.x, y: cell.y })),
      direction: this.currentDirection,
      growPending: this.pendingGrowth
    };
  }
}
