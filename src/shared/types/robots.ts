/**
 * Robot, task and collaborator types.
 *
 * @module shared/types/robots
 */
import type { GridCoordinate, Path, WorldPoint } from "./grid";
import type {
  ActionStatus,
  RobotStateType,
  TaskKind,
} from "../constants/RobotEnums";
import type { RobotInventory } from "@/domain/simulation/systems/robots/RobotInventory";

/**
 * Something a robot can seek and act on, as handed out by a target registry.
 */
export interface TargetRef {
  readonly id: string;
  readonly position: Readonly<WorldPoint>;
}

export type TaskRef =
  | { readonly kind: TaskKind.TARGET; readonly target: TargetRef }
  | { readonly kind: TaskKind.BASE; readonly base: GridCoordinate };

export type RobotState =
  | { readonly type: RobotStateType.IDLE }
  | { readonly type: RobotStateType.MOVING_TO_TARGET; readonly target: TargetRef }
  | {
      readonly type: RobotStateType.PERFORMING_ACTION;
      readonly target: TargetRef;
      elapsed: number;
    }
  | { readonly type: RobotStateType.RETURNING_TO_BASE; readonly base: GridCoordinate }
  | { readonly type: RobotStateType.UNLOADING; readonly base: GridCoordinate };

export interface RobotPower {
  current: number;
  capacity: number;
  /** Units drained per second of movement */
  drainPerSecond: number;
}

export interface Robot {
  readonly id: string;
  position: WorldPoint;
  state: RobotState;
  path: Path;
  /** In [0, path.length]; equal to path.length when the path is exhausted */
  pathIndex: number;
  /** World units per second */
  speed: number;
  readonly inventory: RobotInventory;
  readonly power: RobotPower;
  /** Base the robot unloads at; null until one is assigned */
  home: GridCoordinate | null;
  stats: {
    distanceTravelled: number;
    deliveries: number;
    abandonedTasks: number;
  };
}

/**
 * Lookup of eligible targets, provided by the host entity registry.
 */
export interface TargetRegistry {
  findNearestEligible(origin: WorldPoint, radius: number): TargetRef | null;
  isStillValid(target: TargetRef): boolean;
}

/**
 * Materials handed over at the base, keyed by material type.
 */
export type InventoryContents = Readonly<Record<string, number>>;

export interface InventorySink {
  deposit(inventory: InventoryContents): void;
}

/**
 * Domain action run while a robot is in range of its target.
 */
export type PerformAction = (
  robot: Robot,
  target: TargetRef,
  dt: number,
) => ActionStatus;

/**
 * Persistable progress of a robot: state tag, task id and path index.
 */
export interface RobotSnapshot {
  id: string;
  state: RobotStateType;
  taskId: string | null;
  pathIndex: number;
  pathLength: number;
  position: WorldPoint;
  load: number;
}
