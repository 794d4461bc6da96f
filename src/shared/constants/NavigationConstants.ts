/**
 * Fixed constants of the grid search.
 *
 * @module shared/constants/NavigationConstants
 */
export const NAVIGATION_CONSTANTS = {
  CARDINAL_COST: 1,
  DIAGONAL_COST: Math.SQRT2,
  /** Neighbor order: cardinals first (N, E, S, W), then diagonals (NE, SE, SW, NW) */
  DIRECTIONS: [
    [0, -1],
    [1, 0],
    [0, 1],
    [-1, 0],
    [1, -1],
    [1, 1],
    [-1, 1],
    [-1, -1],
  ] as const,
} as const;
