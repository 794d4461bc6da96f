import { injectable, inject, optional } from "inversify";
import { TYPES } from "@/config/Types";
import type { GridAdapter } from "@/shared/types/grid";
import type {
  InventorySink,
  PerformAction,
  Robot,
  RobotSnapshot,
  TargetRegistry,
} from "@/shared/types/robots";
import { AbandonReason, RobotStateType } from "@/shared/constants/RobotEnums";
import { NavigationEventType } from "@/shared/constants/EventEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { BatchedEventEmitter } from "@/domain/simulation/core/BatchedEventEmitter";
import { RobotController, type RobotControllerOptions } from "./RobotController";
import { createRobot, type RobotSpawnOptions } from "./createRobot";

/**
 * Tuning shared by every controller the system creates.
 */
export type RobotSettings = Omit<
  RobotControllerOptions,
  "sink" | "performAction" | "events"
>;

/**
 * Owns the robots of a simulation and ticks their controllers.
 *
 * Robots are updated sequentially in spawn order. A controller that throws is
 * logged, sent back to idle and skipped for the rest of the tick; the other
 * robots are still updated.
 */
@injectable()
export class RobotSystem {
  private controllers = new Map<string, RobotController>();

  constructor(
    @inject(TYPES.InventorySink) private readonly sink: InventorySink,
    @inject(TYPES.PerformAction) private readonly performAction: PerformAction,
    @inject(TYPES.RobotSettings)
    @optional()
    private readonly settings: RobotSettings = {},
    @inject(TYPES.EventBus)
    @optional()
    private readonly events?: BatchedEventEmitter,
  ) {}

  public spawnRobot(options: RobotSpawnOptions): Robot {
    if (options.id !== undefined && this.controllers.has(options.id)) {
      throw new Error(`Robot ${options.id} already exists`);
    }

    const robot = createRobot(options);
    const controller = new RobotController(robot, {
      ...this.settings,
      sink: this.sink,
      performAction: this.performAction,
      events: this.events,
    });
    this.controllers.set(robot.id, controller);

    logger.info(`🤖 RobotSystem: spawned ${robot.id}`, LogCategory.ROBOTS, {
      position: robot.position,
      home: robot.home,
    });
    this.events?.publish(NavigationEventType.ROBOT_SPAWNED, {
      robotId: robot.id,
      position: { x: robot.position.x, y: robot.position.y },
    });
    return robot;
  }

  public removeRobot(id: string): boolean {
    if (!this.controllers.delete(id)) return false;
    logger.info(`🤖 RobotSystem: removed ${id}`, LogCategory.ROBOTS);
    this.events?.publish(NavigationEventType.ROBOT_REMOVED, { robotId: id });
    return true;
  }

  public getRobot(id: string): Robot | undefined {
    return this.controllers.get(id)?.robot;
  }

  public getController(id: string): RobotController {
    const controller = this.controllers.get(id);
    if (!controller) {
      throw new Error(`Unknown robot ${id}`);
    }
    return controller;
  }

  public listRobots(): Robot[] {
    return [...this.controllers.values()].map((c) => c.robot);
  }

  public get robotCount(): number {
    return this.controllers.size;
  }

  public update(dt: number, grid: GridAdapter, registry: TargetRegistry): void {
    for (const [id, controller] of [...this.controllers]) {
      try {
        controller.tick(dt, grid, registry);
      } catch (error) {
        logger.error(`🤖 RobotSystem: update of ${id} failed`, LogCategory.ROBOTS, {
          robotId: id,
          error: error instanceof Error ? error.message : String(error),
        });
        controller.abandonTask(AbandonReason.ERROR);
      }
    }
  }

  public getSnapshots(): RobotSnapshot[] {
    return [...this.controllers.values()].map((c) => c.snapshot());
  }

  public countByState(): Record<RobotStateType, number> {
    const counts: Record<RobotStateType, number> = {
      [RobotStateType.IDLE]: 0,
      [RobotStateType.MOVING_TO_TARGET]: 0,
      [RobotStateType.PERFORMING_ACTION]: 0,
      [RobotStateType.RETURNING_TO_BASE]: 0,
      [RobotStateType.UNLOADING]: 0,
    };
    for (const controller of this.controllers.values()) {
      counts[controller.robot.state.type]++;
    }
    return counts;
  }
}
