import type { GridAdapter, GridCoordinate, Path } from "@/shared/types/grid";
import { CONFIG, type HeuristicName } from "@/config/config";
import { NAVIGATION_CONSTANTS } from "@/shared/constants/NavigationConstants";
import { PathSearchStatus } from "@/shared/constants/PathfindingEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { OpenSet } from "./OpenSet";
import { hasLineOfSight } from "./lineOfSight";
import {
  coordinateKey,
  isSameCoordinate,
  manhattanDistance,
  octileDistance,
  pathCost,
} from "./helpers";

export interface PathfinderOptions {
  /** Node expansions before the search reports ITERATION_LIMIT */
  maxIterations: number;
  heuristic: HeuristicName;
}

export interface PathSearchResult {
  status: PathSearchStatus;
  path: Path | null;
  /** Nodes expanded (popped from the open set) */
  iterations: number;
  /** Weighted length of the path, null when none was found */
  cost: number | null;
}

const HEURISTICS: Record<
  HeuristicName,
  (a: GridCoordinate, b: GridCoordinate) => number
> = {
  octile: octileDistance,
  manhattan: manhattanDistance,
};

/**
 * Node table of a single search. Parents are indices into the same table.
 */
class SearchArena {
  readonly coords: GridCoordinate[] = [];
  readonly parent: number[] = [];
  readonly g: number[] = [];
  readonly h: number[] = [];
  readonly f: number[] = [];
  readonly closed: boolean[] = [];
  private readonly index = new Map<string, number>();

  add(coord: GridCoordinate, parent: number, g: number, h: number): number {
    const handle = this.coords.length;
    this.coords.push(coord);
    this.parent.push(parent);
    this.g.push(g);
    this.h.push(h);
    this.f.push(g + h);
    this.closed.push(false);
    this.index.set(coordinateKey(coord), handle);
    return handle;
  }

  find(coord: GridCoordinate): number | undefined {
    return this.index.get(coordinateKey(coord));
  }

  /**
   * Lower f first; on equal f the node closer to the goal (lower h) wins,
   * then the node discovered first.
   */
  less = (a: number, b: number): boolean => {
    if (this.f[a] !== this.f[b]) return this.f[a] < this.f[b];
    if (this.h[a] !== this.h[b]) return this.h[a] < this.h[b];
    return a < b;
  };

  reconstruct(handle: number): GridCoordinate[] {
    const path: GridCoordinate[] = [];
    let current = handle;
    while (current !== -1) {
      path.push(this.coords[current]);
      current = this.parent[current];
    }
    return path.reverse();
  }
}

/**
 * Weighted 8-directional A* over a grid adapter.
 *
 * Stateless between calls: every search allocates its own node table and open
 * set, so one instance can serve any number of robots in a tick.
 *
 * - Diagonal steps cost √2 and are only legal when both orthogonal neighbours
 *   of the step are walkable (no corner cutting).
 * - Closed nodes are never reopened.
 * - A failed search, for whatever reason, yields `null` from `findPath`; use
 *   `search` to see the reason.
 */
export class Pathfinder {
  private readonly options: PathfinderOptions;
  private readonly heuristic: (a: GridCoordinate, b: GridCoordinate) => number;

  constructor(
    public readonly grid: GridAdapter,
    options: Partial<PathfinderOptions> = {},
  ) {
    this.options = {
      maxIterations: CONFIG.PATHFINDING.MAX_ITERATIONS,
      heuristic: CONFIG.PATHFINDING.HEURISTIC,
      ...options,
    };
    this.heuristic = HEURISTICS[this.options.heuristic];
  }

  public findPath(start: GridCoordinate, goal: GridCoordinate): Path | null {
    return this.search(start, goal).path;
  }

  public search(start: GridCoordinate, goal: GridCoordinate): PathSearchResult {
    if (!this.grid.isWalkable(start) || !this.grid.isWalkable(goal)) {
      return {
        status: PathSearchStatus.INVALID_ENDPOINT,
        path: null,
        iterations: 0,
        cost: null,
      };
    }

    if (isSameCoordinate(start, goal)) {
      return {
        status: PathSearchStatus.FOUND,
        path: [{ col: start.col, row: start.row }],
        iterations: 0,
        cost: 0,
      };
    }

    const arena = new SearchArena();
    const open = new OpenSet(arena.less);
    open.push(arena.add(start, -1, 0, this.heuristic(start, goal)));

    let iterations = 0;
    while (open.size > 0) {
      if (iterations >= this.options.maxIterations) {
        logger.debug(
          `🧭 Pathfinder: iteration limit ${this.options.maxIterations} reached`,
          LogCategory.PATHFINDING,
          { start, goal, openNodes: open.size },
        );
        return {
          status: PathSearchStatus.ITERATION_LIMIT,
          path: null,
          iterations,
          cost: null,
        };
      }

      const current = open.pop();
      if (current === undefined) break;
      iterations++;
      arena.closed[current] = true;

      const coord = arena.coords[current];
      if (isSameCoordinate(coord, goal)) {
        return {
          status: PathSearchStatus.FOUND,
          path: arena.reconstruct(current),
          iterations,
          cost: arena.g[current],
        };
      }

      for (const [neighbor, cost] of this.neighbors(coord)) {
        const existing = arena.find(neighbor);
        if (existing !== undefined && arena.closed[existing]) continue;

        const tentativeG = arena.g[current] + cost;
        if (existing === undefined) {
          open.push(
            arena.add(neighbor, current, tentativeG, this.heuristic(neighbor, goal)),
          );
        } else if (tentativeG < arena.g[existing]) {
          arena.g[existing] = tentativeG;
          arena.f[existing] = tentativeG + arena.h[existing];
          arena.parent[existing] = current;
          open.decreaseKey(existing);
        }
      }
    }

    return {
      status: PathSearchStatus.NO_PATH,
      path: null,
      iterations,
      cost: null,
    };
  }

  /**
   * Walkable neighbours of a cell with their step cost.
   */
  public neighbors(coord: GridCoordinate): Array<[GridCoordinate, number]> {
    const result: Array<[GridCoordinate, number]> = [];
    for (const [dx, dy] of NAVIGATION_CONSTANTS.DIRECTIONS) {
      const next = { col: coord.col + dx, row: coord.row + dy };
      if (!this.grid.isWalkable(next)) continue;

      const diagonal = dx !== 0 && dy !== 0;
      if (
        diagonal &&
        (!this.grid.isWalkable({ col: coord.col + dx, row: coord.row }) ||
          !this.grid.isWalkable({ col: coord.col, row: coord.row + dy }))
      ) {
        continue;
      }

      result.push([
        next,
        diagonal
          ? NAVIGATION_CONSTANTS.DIAGONAL_COST
          : NAVIGATION_CONSTANTS.CARDINAL_COST,
      ]);
    }
    return result;
  }

  /**
   * Drops waypoints that can be skipped along a straight sightline.
   *
   * From each kept waypoint the next kept one is the farthest later waypoint
   * still in line of sight; adjacent waypoints are always kept as a fallback.
   * Applying it to its own output returns the same path.
   */
  public smoothPath(path: Path): Path {
    if (path.length <= 2) return path;

    const smoothed: GridCoordinate[] = [path[0]];
    let current = 0;

    while (current < path.length - 1) {
      let next = current + 1;
      for (let i = path.length - 1; i > current + 1; i--) {
        if (hasLineOfSight(this.grid, path[current], path[i])) {
          next = i;
          break;
        }
      }
      smoothed.push(path[next]);
      current = next;
    }

    return smoothed;
  }

  public hasLineOfSight(from: GridCoordinate, to: GridCoordinate): boolean {
    return hasLineOfSight(this.grid, from, to);
  }

  /**
   * Weighted length of a path under this pathfinder's step costs.
   */
  public pathCost(path: Path): number {
    return pathCost(path);
  }
}
