/**
 * Log level enumerations for the navigation core.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Numeric rank of each level, used for minimum-level filtering.
 */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Host tick loop */
  SIMULATION = "simulation",
  /** Waypoint following and position integration */
  MOVEMENT = "movement",
  /** A* search and path smoothing */
  PATHFINDING = "pathfinding",
  /** Robot task state machine */
  ROBOTS = "robots",
  /** Tile grid, collectibles and stockpile */
  WORLD = "world",
  /** Configuration loading */
  CONFIG = "config",
  /** General/uncategorized logs */
  GENERAL = "general",
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export function isLogCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" && Object.values<string>(LogCategory).includes(value)
  );
}
