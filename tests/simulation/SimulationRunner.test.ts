import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Container } from "inversify";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import { CONFIG } from "../../src/config/config";
import { SimulationRunner } from "../../src/domain/simulation/core/SimulationRunner";
import { BatchedEventEmitter } from "../../src/domain/simulation/core/BatchedEventEmitter";
import type { RobotSystem } from "../../src/domain/simulation/systems/robots/RobotSystem";
import type { CollectibleRegistry } from "../../src/domain/world/CollectibleRegistry";
import type { MaterialStockpile } from "../../src/domain/world/MaterialStockpile";
import { logger } from "../../src/infrastructure/utils/logger";
import { NavigationEventType } from "../../src/shared/constants/EventEnums";
import { RobotStateType } from "../../src/shared/constants/RobotEnums";
import { cellCenter, coord, openGrid } from "../setup";

describe("SimulationRunner", () => {
  let container: Container;
  let events: BatchedEventEmitter;
  let runner: SimulationRunner;
  let robots: RobotSystem;
  let collectibles: CollectibleRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    events = new BatchedEventEmitter();
    container = createContainer({
      grid: openGrid(10, 10),
      events,
      robotSettings: { searchRadius: 1000 },
    });
    runner = container.get<SimulationRunner>(TYPES.SimulationRunner);
    robots = container.get<RobotSystem>(TYPES.RobotSystem);
    collectibles = container.get<CollectibleRegistry>(TYPES.CollectibleRegistry);
  });

  afterEach(() => {
    runner.stop();
    vi.useRealTimers();
  });

  describe("step", () => {
    it("debe avanzar los robots y entregar los eventos del tick", () => {
      const ticks = vi.fn();
      const changes = vi.fn();
      events.subscribe(NavigationEventType.SIMULATION_TICK, ticks);
      events.subscribe(NavigationEventType.ROBOT_STATE_CHANGED, changes);
      robots.spawnRobot({ id: "r1", position: cellCenter(0, 0) });
      collectibles.add({ id: "c1", materialType: "glass", position: cellCenter(5, 5), quantity: 10 });

      runner.step(0.1);

      expect(runner.getTickCount()).toBe(1);
      expect(robots.getRobot("r1")?.state.type).toBe(RobotStateType.MOVING_TO_TARGET);
      expect(ticks).toHaveBeenCalledWith({ tick: 1, dt: 0.1 });
      expect(changes).toHaveBeenCalledWith({
        robotId: "r1",
        from: RobotStateType.IDLE,
        to: RobotStateType.MOVING_TO_TARGET,
      });
      expect(events.getQueueSize()).toBe(0);
    });

    it("debe marcar los logs con el tick actual", () => {
      runner.step(0.1);
      runner.step(0.1);
      logger.clear();
      robots.spawnRobot({ id: "stamped", position: cellCenter(0, 0) });

      expect(logger.queryLogs({ messageContains: "spawned stamped" })[0]?.tick).toBe(2);
    });

    it("debe entregar una carga completa al almacén", () => {
      robots.spawnRobot({ id: "r1", position: cellCenter(0, 0), home: coord(0, 0) });
      collectibles.add({ id: "c1", materialType: "plastic", position: cellCenter(9, 9), quantity: 100 });
      const stockpile = container.get<MaterialStockpile>(TYPES.MaterialStockpile);

      for (let i = 0; i < 300 && stockpile.getDeliveryCount() === 0; i++) {
        runner.step(0.1);
      }

      expect(stockpile.getDeliveryCount()).toBe(1);
      expect(stockpile.getTotals()).toEqual({ plastic: 100 });
      expect(collectibles.size).toBe(0);
      expect(robots.getRobot("r1")?.inventory.load).toBe(0);
    });
  });

  describe("start/stop", () => {
    it("debe avanzar con un timer de frecuencia fija hasta detenerse", () => {
      const intervalMs = 1000 / CONFIG.TICK_RATE_HZ;

      runner.start();
      expect(runner.isRunning()).toBe(true);
      vi.advanceTimersByTime(intervalMs * 3);
      expect(runner.getTickCount()).toBe(3);

      runner.stop();
      expect(runner.isRunning()).toBe(false);
      vi.advanceTimersByTime(intervalMs * 3);
      expect(runner.getTickCount()).toBe(3);
    });

    it("debe ser idempotente al llamar a start", () => {
      const intervalMs = 1000 / CONFIG.TICK_RATE_HZ;
      runner.start();
      runner.start();
      vi.advanceTimersByTime(intervalMs * 2);
      expect(runner.getTickCount()).toBe(2);
    });

    it("debe loguear y sobrevivir a un tick que falla", () => {
      const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => undefined);
      events.on(NavigationEventType.SIMULATION_TICK, () => {
        throw new Error("listener failed");
      });

      runner.start();
      vi.advanceTimersByTime((1000 / CONFIG.TICK_RATE_HZ) * 2);

      expect(runner.getTickCount()).toBe(2);
      expect(errorSpy).toHaveBeenCalledTimes(2);
      errorSpy.mockRestore();
    });
  });
});
