import { describe, it, expect } from "vitest";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import { SimulationRunner } from "../../src/domain/simulation/core/SimulationRunner";
import { RobotSystem } from "../../src/domain/simulation/systems/robots/RobotSystem";
import { CollectibleRegistry } from "../../src/domain/world/CollectibleRegistry";
import { MaterialStockpile } from "../../src/domain/world/MaterialStockpile";
import { simulationEvents } from "../../src/domain/simulation/core/events";
import type { GridAdapter } from "../../src/shared/types/grid";
import type { InventorySink, TargetRegistry } from "../../src/shared/types/robots";
import { openGrid } from "../setup";

describe("createContainer", () => {
  it("debe resolver los sistemas como singletons", () => {
    const container = createContainer({ grid: openGrid(4, 4) });

    const runner = container.get<SimulationRunner>(TYPES.SimulationRunner);
    expect(runner).toBeInstanceOf(SimulationRunner);
    expect(container.get<SimulationRunner>(TYPES.SimulationRunner)).toBe(runner);
    expect(runner.robotSystem).toBe(container.get<RobotSystem>(TYPES.RobotSystem));
    expect(runner.robotSystem).toBeInstanceOf(RobotSystem);
  });

  it("debe enlazar el registro y el almacén detrás de sus interfaces", () => {
    const grid = openGrid(4, 4);
    const container = createContainer({ grid });

    const registry = container.get<CollectibleRegistry>(TYPES.CollectibleRegistry);
    expect(registry).toBeInstanceOf(CollectibleRegistry);
    expect(container.get<TargetRegistry>(TYPES.TargetRegistry)).toBe(registry);

    const stockpile = container.get<MaterialStockpile>(TYPES.MaterialStockpile);
    expect(container.get<InventorySink>(TYPES.InventorySink)).toBe(stockpile);
    expect(container.get<GridAdapter>(TYPES.GridAdapter)).toBe(grid);
  });

  it("debe usar el bus de eventos compartido si no se pasa otro", () => {
    const container = createContainer({ grid: openGrid(4, 4) });
    expect(container.get(TYPES.EventBus)).toBe(simulationEvents);
  });

  it("debe construir simulaciones independientes por contenedor", () => {
    const a = createContainer({ grid: openGrid(4, 4) });
    const b = createContainer({ grid: openGrid(4, 4) });
    expect(a.get(TYPES.RobotSystem)).not.toBe(b.get(TYPES.RobotSystem));
  });
});
