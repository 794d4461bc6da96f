/**
 * Event names emitted through the simulation event bus.
 *
 * @module shared/constants/EventEnums
 */
export enum NavigationEventType {
  ROBOT_SPAWNED = "robot:spawned",
  ROBOT_REMOVED = "robot:removed",
  ROBOT_STATE_CHANGED = "robot:state_changed",
  ROBOT_PATH_PLANNED = "robot:path_planned",
  ROBOT_PATH_UNREACHABLE = "robot:path_unreachable",
  ROBOT_TASK_ABANDONED = "robot:task_abandoned",
  ROBOT_UNLOADED = "robot:unloaded",
  COLLECTIBLE_DEPLETED = "collectible:depleted",
  SIMULATION_TICK = "simulation:tick",
}
