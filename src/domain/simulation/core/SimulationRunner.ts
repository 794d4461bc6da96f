import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import { CONFIG } from "@/config/config";
import type { GridAdapter } from "@/shared/types/grid";
import type { TargetRegistry } from "@/shared/types/robots";
import { NavigationEventType } from "@/shared/constants/EventEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { RobotSystem } from "../systems/robots/RobotSystem";
import type { BatchedEventEmitter } from "./BatchedEventEmitter";

/**
 * Host tick loop.
 *
 * `step` advances every robot by one tick and then delivers the events queued
 * during it. `start` drives `step` from a fixed-rate timer at `TICK_RATE_HZ`;
 * callers that own their own loop only use `step`.
 */
@injectable()
export class SimulationRunner {
  @inject(TYPES.RobotSystem) public readonly robotSystem!: RobotSystem;
  @inject(TYPES.GridAdapter) private readonly grid!: GridAdapter;
  @inject(TYPES.TargetRegistry) private readonly registry!: TargetRegistry;
  @inject(TYPES.EventBus) private readonly events!: BatchedEventEmitter;

  private tickCounter = 0;
  private tickInterval?: NodeJS.Timeout;

  public step(dt: number = 1 / CONFIG.TICK_RATE_HZ): void {
    this.tickCounter++;
    logger.setTick(this.tickCounter);

    this.robotSystem.update(dt, this.grid, this.registry);
    this.events.publish(NavigationEventType.SIMULATION_TICK, {
      tick: this.tickCounter,
      dt,
    });
    this.events.flushEvents();
  }

  public start(): void {
    if (this.tickInterval) return;

    const intervalMs = 1000 / CONFIG.TICK_RATE_HZ;
    this.tickInterval = setInterval(() => {
      try {
        this.step(intervalMs / 1000);
      } catch (error) {
        logger.error("⏱️ SimulationRunner: tick failed", LogCategory.SIMULATION, {
          tick: this.tickCounter,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }, intervalMs);

    logger.info(
      `⏱️ SimulationRunner: started at ${CONFIG.TICK_RATE_HZ} Hz`,
      LogCategory.SIMULATION,
    );
  }

  public stop(): void {
    if (!this.tickInterval) return;
    clearInterval(this.tickInterval);
    this.tickInterval = undefined;
    logger.info(
      `⏱️ SimulationRunner: stopped after ${this.tickCounter} ticks`,
      LogCategory.SIMULATION,
    );
  }

  public isRunning(): boolean {
    return this.tickInterval !== undefined;
  }

  public getTickCount(): number {
    return this.tickCounter;
  }
}
