/**
 * Payloads carried by each navigation event.
 *
 * @module shared/types/events
 */
import type { NavigationEventType } from "../constants/EventEnums";
import type { AbandonReason, RobotStateType } from "../constants/RobotEnums";
import type { PathSearchStatus } from "../constants/PathfindingEnums";
import type { GridCoordinate, WorldPoint } from "./grid";
import type { InventoryContents } from "./robots";

export interface NavigationEventPayloads {
  [NavigationEventType.ROBOT_SPAWNED]: {
    robotId: string;
    position: WorldPoint;
  };
  [NavigationEventType.ROBOT_REMOVED]: { robotId: string };
  [NavigationEventType.ROBOT_STATE_CHANGED]: {
    robotId: string;
    from: RobotStateType;
    to: RobotStateType;
  };
  [NavigationEventType.ROBOT_PATH_PLANNED]: {
    robotId: string;
    goal: GridCoordinate;
    waypoints: number;
    cost: number;
  };
  [NavigationEventType.ROBOT_PATH_UNREACHABLE]: {
    robotId: string;
    goal: GridCoordinate;
    status: PathSearchStatus;
  };
  [NavigationEventType.ROBOT_TASK_ABANDONED]: {
    robotId: string;
    taskId: string | null;
    reason: AbandonReason;
  };
  [NavigationEventType.ROBOT_UNLOADED]: {
    robotId: string;
    base: GridCoordinate;
    contents: InventoryContents;
  };
  [NavigationEventType.COLLECTIBLE_DEPLETED]: {
    collectibleId: string;
    materialType: string;
  };
  [NavigationEventType.SIMULATION_TICK]: { tick: number; dt: number };
}
