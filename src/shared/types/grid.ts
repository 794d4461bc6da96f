/**
 * Grid-space types shared by the pathfinder, the robot controller and the
 * grid adapter.
 *
 * @module shared/types/grid
 */

/**
 * Integer cell address. Value type: compare with `isSameCoordinate`.
 */
export interface GridCoordinate {
  readonly col: number;
  readonly row: number;
}

/**
 * Ordered waypoints from start to goal, both inclusive.
 */
export type Path = readonly GridCoordinate[];

/**
 * Continuous position in world units (pixels).
 */
export interface WorldPoint {
  x: number;
  y: number;
}

/**
 * Walkability and coordinate conversion, provided by the host world.
 * Read-only from the navigation core's point of view.
 */
export interface GridAdapter {
  /** In bounds, not a blocking tile type and not occupied by a static obstacle */
  isWalkable(coord: GridCoordinate): boolean;
  worldToGrid(x: number, y: number): GridCoordinate;
  /** Center of the cell in world units */
  gridToWorld(coord: GridCoordinate): WorldPoint;
}
