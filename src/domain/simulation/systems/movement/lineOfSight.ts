import type { GridAdapter, GridCoordinate } from "@/shared/types/grid";

/**
 * Cells visited by an integer Bresenham walk from `from` to `to`, both included.
 */
export function bresenhamLine(
  from: GridCoordinate,
  to: GridCoordinate,
): GridCoordinate[] {
  const cells: GridCoordinate[] = [];
  walkLine(from, to, (cell) => {
    cells.push(cell);
    return true;
  });
  return cells;
}

/**
 * True when every cell on the Bresenham line between the two cells is walkable.
 * Stops at the first blocked cell.
 */
export function hasLineOfSight(
  grid: GridAdapter,
  from: GridCoordinate,
  to: GridCoordinate,
): boolean {
  return walkLine(from, to, (cell) => grid.isWalkable(cell));
}

function walkLine(
  from: GridCoordinate,
  to: GridCoordinate,
  visit: (cell: GridCoordinate) => boolean,
): boolean {
  const dx = Math.abs(to.col - from.col);
  const dy = Math.abs(to.row - from.row);
  const sx = from.col < to.col ? 1 : -1;
  const sy = from.row < to.row ? 1 : -1;
  let err = dx - dy;
  let col = from.col;
  let row = from.row;

  while (true) {
    if (!visit({ col, row })) return false;
    if (col === to.col && row === to.row) return true;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      col += sx;
    }
    if (e2 < dx) {
      err += dx;
      row += sy;
    }
  }
}
