import type { Cell, Direction } from "../types";

export const DIRECTION_DELTAS: Record<Direction, Cell> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 }
};

export function wrapScalar(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export function wrapCell(cell: Cell, width: number, height: number): Cell {
  return {
    x: wrapScalar(cell.x, width),
    y: wrapScalar(cell.y, height)
  };
}

export function isInBounds(cell: Cell, width: number, height: number): boolean {
  return cell.x >= 0 && cell.x < width && cell.y >= 0 && cell.y < height;
}

export function stepCell(cell: Cell, direction: Direction): Cell {
  const delta = DIRECTION_DELTAS[direction];
  return { x: cell.x + delta.x, y: cell.y + delta.y };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function cellKey(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

export function containsCell(cells: readonly Cell[], cell: Cell, fromIndex = 0): boolean {
  for (let i = fromIndex; i < cells.length; i += 1) {
    if (cellsEqual(cells[i], cell)) {
      return true;
    }
  }
  return false;
}
