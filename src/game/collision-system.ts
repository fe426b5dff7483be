import type { Cell, ObstacleState, PickupState } from "../types";
import { cellsEqual } from "../world/grid-space";

export function checkFoodCollision(head: Cell, food: Cell): boolean {
  return cellsEqual(head, food);
}

export function checkObstacleCollision(head: Cell, obstacles: readonly ObstacleState[]): ObstacleState | null {
  for (const obstacle of obstacles) {
    if (cellsEqual(head, obstacle.position)) {
      return obstacle;
    }
  }
  return null;
}

export function checkPickupCollisions(head: Cell, pickups: readonly PickupState[]): PickupState[] {
  return pickups.filter((pickup) => cellsEqual(head, pickup.position));
}
