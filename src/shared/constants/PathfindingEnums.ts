/**
 * Pathfinding enumerations.
 *
 * @module shared/constants/PathfindingEnums
 */

/**
 * Outcome of a single A* search.
 * Every status other than FOUND means "no path" to callers of `findPath`.
 */
export enum PathSearchStatus {
  FOUND = "found",
  INVALID_ENDPOINT = "invalid_endpoint",
  NO_PATH = "no_path",
  ITERATION_LIMIT = "iteration_limit",
}
