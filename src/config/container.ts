import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";

/**
 * Dependency injection container configuration.
 *
 * Binds one simulation around a host-provided grid. Everything is a
 * singleton within the container; build a new container per simulation.
 *
 * @module config
 */
import type { GridAdapter } from "../shared/types/grid";
import type { InventorySink, PerformAction, TargetRegistry } from "../shared/types/robots";
import { TileGrid } from "../domain/world/TileGrid";
import { CollectibleRegistry } from "../domain/world/CollectibleRegistry";
import { MaterialStockpile } from "../domain/world/MaterialStockpile";
import { BatchedEventEmitter } from "../domain/simulation/core/BatchedEventEmitter";
import { simulationEvents } from "../domain/simulation/core/events";
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import {
  RobotSystem,
  type RobotSettings,
} from "../domain/simulation/systems/robots/RobotSystem";
import { createCollectAction } from "../domain/simulation/systems/robots/actions";

export interface ContainerOptions {
  grid: TileGrid;
  robotSettings?: RobotSettings;
  /** Defaults to the process-wide `simulationEvents` bus */
  events?: BatchedEventEmitter;
}

export function createContainer(options: ContainerOptions): Container {
  const container = new Container();
  const { grid } = options;

  container
    .bind<BatchedEventEmitter>(TYPES.EventBus)
    .toConstantValue(options.events ?? simulationEvents);
  container.bind<GridAdapter>(TYPES.GridAdapter).toConstantValue(grid);

  container
    .bind<CollectibleRegistry>(TYPES.CollectibleRegistry)
    .toDynamicValue(
      (context) =>
        new CollectibleRegistry({
          worldWidth: grid.worldWidth,
          worldHeight: grid.worldHeight,
          cellSize: grid.tileSize * 4,
          events: context.container.get<BatchedEventEmitter>(TYPES.EventBus),
        }),
    )
    .inSingletonScope();
  container
    .bind<TargetRegistry>(TYPES.TargetRegistry)
    .toService(TYPES.CollectibleRegistry);

  container
    .bind<MaterialStockpile>(TYPES.MaterialStockpile)
    .toDynamicValue(() => new MaterialStockpile())
    .inSingletonScope();
  container.bind<InventorySink>(TYPES.InventorySink).toService(TYPES.MaterialStockpile);

  container
    .bind<PerformAction>(TYPES.PerformAction)
    .toDynamicValue((context) =>
      createCollectAction(
        context.container.get<CollectibleRegistry>(TYPES.CollectibleRegistry),
      ),
    )
    .inSingletonScope();
  container
    .bind<RobotSettings>(TYPES.RobotSettings)
    .toConstantValue(options.robotSettings ?? {});

  container.bind<RobotSystem>(TYPES.RobotSystem).to(RobotSystem).inSingletonScope();
  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}
