import type {
  GridCoordinate,
  Path,
  WorldPoint,
} from "@/shared/types/grid";
import { NAVIGATION_CONSTANTS } from "@/shared/constants/NavigationConstants";

export function isSameCoordinate(a: GridCoordinate, b: GridCoordinate): boolean {
  return a.col === b.col && a.row === b.row;
}

export function coordinateKey(coord: GridCoordinate): string {
  return `${coord.col},${coord.row}`;
}

export function manhattanDistance(a: GridCoordinate, b: GridCoordinate): number {
  return Math.abs(a.col - b.col) + Math.abs(a.row - b.row);
}

/**
 * Exact cost of the cheapest obstacle-free 8-directional route.
 */
export function octileDistance(a: GridCoordinate, b: GridCoordinate): number {
  const dx = Math.abs(a.col - b.col);
  const dy = Math.abs(a.row - b.row);
  return (
    NAVIGATION_CONSTANTS.CARDINAL_COST * (dx + dy) +
    (NAVIGATION_CONSTANTS.DIAGONAL_COST - 2 * NAVIGATION_CONSTANTS.CARDINAL_COST) *
      Math.min(dx, dy)
  );
}

/**
 * Weighted length of a path. Each leg between consecutive waypoints is priced
 * by its octile distance, so smoothed paths with long legs are costed too.
 */
export function pathCost(path: Path): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    total += octileDistance(path[i - 1], path[i]);
  }
  return total;
}

export function worldDistance(a: WorldPoint, b: WorldPoint): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function worldToGrid(
  x: number,
  y: number,
  tileSize: number,
): GridCoordinate {
  return {
    col: Math.floor(x / tileSize),
    row: Math.floor(y / tileSize),
  };
}

export function gridToWorldCenter(
  coord: GridCoordinate,
  tileSize: number,
): WorldPoint {
  return {
    x: (coord.col + 0.5) * tileSize,
    y: (coord.row + 0.5) * tileSize,
  };
}
