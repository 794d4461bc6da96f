/**
 * Robot task state enumerations.
 *
 * @module shared/constants/RobotEnums
 */

/**
 * Behavioral states of the robot task state machine.
 */
export enum RobotStateType {
  IDLE = "idle",
  MOVING_TO_TARGET = "moving_to_target",
  PERFORMING_ACTION = "performing_action",
  RETURNING_TO_BASE = "returning_to_base",
  UNLOADING = "unloading",
}

/**
 * Discriminant of a robot's task reference.
 */
export enum TaskKind {
  TARGET = "target",
  BASE = "base",
}

/**
 * Result of one invocation of a domain action.
 */
export enum ActionStatus {
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
}

/**
 * Why a robot gave up on its current target.
 */
export enum AbandonReason {
  TARGET_INVALID = "target_invalid",
  UNREACHABLE = "unreachable",
  ERROR = "error",
  MANUAL = "manual",
}
