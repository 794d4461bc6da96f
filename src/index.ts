import "reflect-metadata";

export { CONFIG, type AppConfig, type HeuristicName } from "./config/config";
export { TYPES } from "./config/Types";
export { createContainer, type ContainerOptions } from "./config/container";

export type { GridAdapter, GridCoordinate, Path, WorldPoint } from "./shared/types/grid";
export type {
  InventoryContents,
  InventorySink,
  PerformAction,
  Robot,
  RobotSnapshot,
  RobotState,
  TargetRef,
  TargetRegistry,
  TaskRef,
} from "./shared/types/robots";
export type { NavigationEventPayloads } from "./shared/types/events";
export {
  AbandonReason,
  ActionStatus,
  RobotStateType,
  TaskKind,
} from "./shared/constants/RobotEnums";
export { PathSearchStatus } from "./shared/constants/PathfindingEnums";
export { NavigationEventType } from "./shared/constants/EventEnums";
export { TileType } from "./shared/constants/TileTypeEnums";

export {
  Pathfinder,
  type PathfinderOptions,
  type PathSearchResult,
} from "./domain/simulation/systems/movement/Pathfinder";
export { bresenhamLine, hasLineOfSight } from "./domain/simulation/systems/movement/lineOfSight";
export {
  coordinateKey,
  isSameCoordinate,
  manhattanDistance,
  octileDistance,
  pathCost,
} from "./domain/simulation/systems/movement/helpers";

export {
  RobotController,
  type RobotControllerOptions,
} from "./domain/simulation/systems/robots/RobotController";
export { RobotInventory } from "./domain/simulation/systems/robots/RobotInventory";
export { RobotSystem, type RobotSettings } from "./domain/simulation/systems/robots/RobotSystem";
export { createRobot, type RobotSpawnOptions } from "./domain/simulation/systems/robots/createRobot";
export { createCollectAction } from "./domain/simulation/systems/robots/actions";

export { TileGrid } from "./domain/world/TileGrid";
export {
  CollectibleRegistry,
  type Collectible,
  type CollectibleInput,
} from "./domain/world/CollectibleRegistry";
export { MaterialStockpile } from "./domain/world/MaterialStockpile";
export {
  generateTestWorld,
  MATERIAL_TYPES,
  type TestWorld,
  type TestWorldOptions,
} from "./domain/world/generation/TestWorldGenerator";

export { BatchedEventEmitter } from "./domain/simulation/core/BatchedEventEmitter";
export { simulationEvents } from "./domain/simulation/core/events";
export { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
export { logger, Logger, LogLevel, LogCategory } from "./infrastructure/utils/logger";
