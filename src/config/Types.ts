/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  RobotSystem: Symbol.for("RobotSystem"),
  RobotSettings: Symbol.for("RobotSettings"),
  PerformAction: Symbol.for("PerformAction"),

  GridAdapter: Symbol.for("GridAdapter"),
  TargetRegistry: Symbol.for("TargetRegistry"),
  CollectibleRegistry: Symbol.for("CollectibleRegistry"),
  InventorySink: Symbol.for("InventorySink"),
  MaterialStockpile: Symbol.for("MaterialStockpile"),

  EventBus: Symbol.for("EventBus"),
};
