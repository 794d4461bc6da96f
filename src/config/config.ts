/**
 * Application configuration loaded from environment variables.
 *
 * Values are read once at import. Invalid values abort startup with an error
 * naming the offending variable.
 *
 * @module config
 */

export type HeuristicName = "octile" | "manhattan";

const HEURISTICS: readonly HeuristicName[] = ["octile", "manhattan"];

function readPositiveNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(
      `Invalid value for ${name}: "${raw}" (expected a positive number)`,
    );
  }
  return value;
}

function readFraction(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(
      `Invalid value for ${name}: "${raw}" (expected a number between 0 and 1)`,
    );
  }
  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw !== "false" && raw !== "0";
}

function readHeuristic(name: string, fallback: HeuristicName): HeuristicName {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const match = HEURISTICS.find((h) => h === raw);
  if (!match) {
    throw new Error(
      `Invalid value for ${name}: "${raw}" (expected one of ${HEURISTICS.join(", ")})`,
    );
  }
  return match;
}

/**
 * Application configuration object.
 *
 * @property TICK_RATE_HZ - Host loop frequency used by `SimulationRunner.start()`
 * @property TILE_SIZE - Edge length of a grid tile in world units (pixels)
 * @property PATHFINDING.MAX_ITERATIONS - Node expansions before a search gives up
 * @property PATHFINDING.HEURISTIC - A* heuristic
 * @property PATHFINDING.SMOOTH_PATHS - Whether robots smooth planned paths
 * @property ROBOT - Defaults applied to newly spawned robots
 * @property LOG - Logger settings
 */
export const CONFIG = {
  TICK_RATE_HZ: readPositiveNumber("TICK_RATE_HZ", 20),
  TILE_SIZE: readPositiveNumber("TILE_SIZE", 32),
  PATHFINDING: {
    MAX_ITERATIONS: Math.floor(
      readPositiveNumber("PATHFINDING_MAX_ITERATIONS", 1000),
    ),
    HEURISTIC: readHeuristic("PATHFINDING_HEURISTIC", "octile"),
    SMOOTH_PATHS: readBoolean("PATHFINDING_SMOOTH_PATHS", true),
  },
  ROBOT: {
    SPEED: readPositiveNumber("ROBOT_SPEED", 100),
    CAPACITY: readPositiveNumber("ROBOT_CAPACITY", 100),
    SEARCH_RADIUS: readPositiveNumber("ROBOT_SEARCH_RADIUS", 480),
    ACTION_RADIUS: readPositiveNumber("ROBOT_ACTION_RADIUS", 40),
    ARRIVAL_RADIUS: readPositiveNumber("ROBOT_ARRIVAL_RADIUS", 24),
    WAYPOINT_TOLERANCE: readPositiveNumber("ROBOT_WAYPOINT_TOLERANCE", 4),
    POWER_CAPACITY: readPositiveNumber("ROBOT_POWER_CAPACITY", 1000),
    POWER_DRAIN_PER_SECOND: readPositiveNumber("ROBOT_POWER_DRAIN", 1),
    LOW_POWER_FRACTION: readFraction("ROBOT_LOW_POWER_FRACTION", 0.2),
  },
  LOG: {
    LEVEL: process.env.LOG_LEVEL || "info",
    DIR: process.env.LOG_DIR || "",
    MAX_MEMORY_LOGS: Math.floor(readPositiveNumber("LOG_MAX_MEMORY", 5000)),
    THROTTLE_WINDOW_MS: readPositiveNumber("LOG_THROTTLE_WINDOW_MS", 5000),
    MAX_THROTTLE_COUNT: readPositiveNumber("LOG_MAX_THROTTLE_COUNT", 3),
    WRITE_INTERVAL_MS: readPositiveNumber("LOG_WRITE_INTERVAL_MS", 5000),
  },
};

export type AppConfig = typeof CONFIG;
