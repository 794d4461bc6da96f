import type { GridAdapter, GridCoordinate, Path } from "@/shared/types/grid";
import type {
  InventorySink,
  PerformAction,
  Robot,
  RobotSnapshot,
  RobotState,
  TargetRef,
  TargetRegistry,
  TaskRef,
} from "@/shared/types/robots";
import {
  AbandonReason,
  ActionStatus,
  RobotStateType,
  TaskKind,
} from "@/shared/constants/RobotEnums";
import { NavigationEventType } from "@/shared/constants/EventEnums";
import { CONFIG } from "@/config/config";
import { logger, LogCategory, LogLevel } from "@/infrastructure/utils/logger";
import type { BatchedEventEmitter } from "@/domain/simulation/core/BatchedEventEmitter";
import { Pathfinder, type PathfinderOptions } from "../movement/Pathfinder";
import { coordinateKey, isSameCoordinate, worldDistance } from "../movement/helpers";
import { followPath, isPathExhausted, moveToward } from "./pathFollowing";

export interface RobotControllerOptions {
  sink: InventorySink;
  performAction: PerformAction;
  /** World units around the robot searched for targets while idle */
  searchRadius?: number;
  /** Distance to the target at which the action starts */
  actionRadius?: number;
  /** Distance to the base center at which unloading starts */
  arrivalRadius?: number;
  /** Distance to a waypoint center at which it counts as reached */
  waypointTolerance?: number;
  /** Fraction of power capacity below which an idle robot heads home */
  lowPowerFraction?: number;
  pathfinder?: Partial<PathfinderOptions>;
  smoothPaths?: boolean;
  events?: BatchedEventEmitter;
}

/**
 * Task state machine of a single robot.
 *
 * Each `tick` evaluates the current state once and performs at most one
 * transition. The grid and target registry are passed in on every tick; the
 * controller keeps no reference to them beyond a pathfinder bound to the last
 * grid it saw.
 *
 * Failures never throw: an unreachable target is abandoned and the robot goes
 * back to idle, an unreachable base is retried on the next tick.
 */
export class RobotController {
  private readonly sink: InventorySink;
  private readonly performAction: PerformAction;
  private readonly searchRadius: number;
  private readonly actionRadius: number;
  private readonly arrivalRadius: number;
  private readonly waypointTolerance: number;
  private readonly lowPowerFraction: number;
  private readonly pathfinderOptions: Partial<PathfinderOptions>;
  private readonly smoothPaths: boolean;
  private readonly events?: BatchedEventEmitter;
  private pathfinder: Pathfinder | null = null;

  constructor(
    public readonly robot: Robot,
    options: RobotControllerOptions,
  ) {
    this.sink = options.sink;
    this.performAction = options.performAction;
    this.searchRadius = options.searchRadius ?? CONFIG.ROBOT.SEARCH_RADIUS;
    this.actionRadius = options.actionRadius ?? CONFIG.ROBOT.ACTION_RADIUS;
    this.arrivalRadius = options.arrivalRadius ?? CONFIG.ROBOT.ARRIVAL_RADIUS;
    this.waypointTolerance =
      options.waypointTolerance ?? CONFIG.ROBOT.WAYPOINT_TOLERANCE;
    this.lowPowerFraction =
      options.lowPowerFraction ?? CONFIG.ROBOT.LOW_POWER_FRACTION;
    this.pathfinderOptions = options.pathfinder ?? {};
    this.smoothPaths = options.smoothPaths ?? CONFIG.PATHFINDING.SMOOTH_PATHS;
    this.events = options.events;
  }

  public tick(dt: number, grid: GridAdapter, registry: TargetRegistry): void {
    if (!(dt >= 0)) {
      throw new RangeError(`Tick duration must be a non-negative number, got ${dt}`);
    }

    const state = this.robot.state;
    switch (state.type) {
      case RobotStateType.IDLE:
        this.tickIdle(grid, registry);
        break;
      case RobotStateType.MOVING_TO_TARGET:
        this.tickMovingToTarget(state.target, dt, grid, registry);
        break;
      case RobotStateType.PERFORMING_ACTION:
        this.tickPerformingAction(state, dt, registry);
        break;
      case RobotStateType.RETURNING_TO_BASE:
        this.tickReturningToBase(state.base, dt, grid);
        break;
      case RobotStateType.UNLOADING:
        this.transition({ type: RobotStateType.IDLE });
        break;
      default: {
        const unknown: never = state;
        throw new Error(`Unknown robot state ${JSON.stringify(unknown)}`);
      }
    }
  }

  public getState(): RobotState {
    return this.robot.state;
  }

  public getTask(): TaskRef | null {
    const state = this.robot.state;
    switch (state.type) {
      case RobotStateType.MOVING_TO_TARGET:
      case RobotStateType.PERFORMING_ACTION:
        return { kind: TaskKind.TARGET, target: state.target };
      case RobotStateType.RETURNING_TO_BASE:
      case RobotStateType.UNLOADING:
        return { kind: TaskKind.BASE, base: state.base };
      default:
        return null;
    }
  }

  public setHome(home: GridCoordinate | null): void {
    this.robot.home = home;
  }

  /**
   * Drops the current task and returns to idle. Returns false when the robot
   * was already idle.
   */
  public abandonTask(reason: AbandonReason = AbandonReason.MANUAL): boolean {
    if (this.robot.state.type === RobotStateType.IDLE) return false;

    const taskId = this.getTaskId();
    this.clearPath();
    this.robot.stats.abandonedTasks++;
    this.transition({ type: RobotStateType.IDLE });

    logger.agentLog(
      reason === AbandonReason.ERROR ? LogLevel.WARN : LogLevel.DEBUG,
      LogCategory.ROBOTS,
      this.robot.id,
      `task ${taskId ?? "none"} abandoned (${reason})`,
    );
    this.events?.publish(NavigationEventType.ROBOT_TASK_ABANDONED, {
      robotId: this.robot.id,
      taskId,
      reason,
    });
    return true;
  }

  public snapshot(): RobotSnapshot {
    return {
      id: this.robot.id,
      state: this.robot.state.type,
      taskId: this.getTaskId(),
      pathIndex: this.robot.pathIndex,
      pathLength: this.robot.path.length,
      position: { x: this.robot.position.x, y: this.robot.position.y },
      load: this.robot.inventory.load,
    };
  }

  private tickIdle(grid: GridAdapter, registry: TargetRegistry): void {
    const robot = this.robot;
    const full = robot.inventory.isFull();

    if (robot.home && (full || this.isLowPower())) {
      this.clearPath();
      this.transition({ type: RobotStateType.RETURNING_TO_BASE, base: robot.home });
      return;
    }
    if (full) return;

    const target = registry.findNearestEligible(robot.position, this.searchRadius);
    if (!target) return;

    const path = this.planPath(
      grid,
      grid.worldToGrid(target.position.x, target.position.y),
    );
    if (!path) return;

    this.setPath(path);
    this.transition({ type: RobotStateType.MOVING_TO_TARGET, target });
  }

  private tickMovingToTarget(
    target: TargetRef,
    dt: number,
    grid: GridAdapter,
    registry: TargetRegistry,
  ): void {
    if (!registry.isStillValid(target)) {
      this.abandonTask(AbandonReason.TARGET_INVALID);
      return;
    }

    if (worldDistance(this.robot.position, target.position) <= this.actionRadius) {
      this.clearPath();
      this.transition({
        type: RobotStateType.PERFORMING_ACTION,
        target,
        elapsed: 0,
      });
      return;
    }

    if (isPathExhausted(this.robot)) {
      const goal = grid.worldToGrid(target.position.x, target.position.y);
      // Already in the target's cell: final approach off the cell center
      if (isSameCoordinate(this.currentCell(grid), goal)) {
        moveToward(this.robot, target.position, dt);
        return;
      }
      const path = this.planPath(grid, goal);
      if (!path) {
        this.abandonTask(AbandonReason.UNREACHABLE);
        return;
      }
      this.setPath(path);
    }

    followPath(this.robot, grid, dt, this.waypointTolerance);
  }

  private tickPerformingAction(
    state: Extract<RobotState, { type: RobotStateType.PERFORMING_ACTION }>,
    dt: number,
    registry: TargetRegistry,
  ): void {
    let status = ActionStatus.COMPLETED;
    if (registry.isStillValid(state.target)) {
      status = this.performAction(this.robot, state.target, dt);
      state.elapsed += dt;
    }
    if (status === ActionStatus.IN_PROGRESS) return;

    const robot = this.robot;
    if (robot.inventory.isFull() && robot.home) {
      this.transition({ type: RobotStateType.RETURNING_TO_BASE, base: robot.home });
      return;
    }
    if (robot.inventory.isFull()) {
      logger.agentLog(
        LogLevel.WARN,
        LogCategory.ROBOTS,
        robot.id,
        "inventory full but no base assigned",
      );
    }
    this.transition({ type: RobotStateType.IDLE });
  }

  private tickReturningToBase(
    base: GridCoordinate,
    dt: number,
    grid: GridAdapter,
  ): void {
    if (worldDistance(this.robot.position, grid.gridToWorld(base)) <= this.arrivalRadius) {
      this.clearPath();
      this.transition({ type: RobotStateType.UNLOADING, base });
      this.unload(base);
      return;
    }

    if (isPathExhausted(this.robot)) {
      if (isSameCoordinate(this.currentCell(grid), base)) {
        moveToward(this.robot, grid.gridToWorld(base), dt);
        return;
      }
      const path = this.planPath(grid, base);
      if (!path) return;
      this.setPath(path);
    }

    followPath(this.robot, grid, dt, this.waypointTolerance);
  }

  /**
   * Single hand-off on entering the unloading state.
   */
  private unload(base: GridCoordinate): void {
    const robot = this.robot;
    const contents = robot.inventory.snapshot();
    const load = robot.inventory.load;

    this.sink.deposit(contents);
    robot.inventory.empty();
    robot.power.current = robot.power.capacity;
    if (load > 0) robot.stats.deliveries++;

    logger.agentLog(
      LogLevel.INFO,
      LogCategory.ROBOTS,
      robot.id,
      `📦 unloaded ${load} at ${coordinateKey(base)}`,
      contents,
    );
    this.events?.publish(NavigationEventType.ROBOT_UNLOADED, {
      robotId: robot.id,
      base,
      contents,
    });
  }

  private currentCell(grid: GridAdapter): GridCoordinate {
    return grid.worldToGrid(this.robot.position.x, this.robot.position.y);
  }

  private planPath(grid: GridAdapter, goal: GridCoordinate): Path | null {
    const pathfinder = this.getPathfinder(grid);
    const start = this.currentCell(grid);
    const result = pathfinder.search(start, goal);

    if (!result.path) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.PATHFINDING,
        this.robot.id,
        `no path ${coordinateKey(start)} -> ${coordinateKey(goal)} (${result.status})`,
        { iterations: result.iterations },
      );
      this.events?.publish(NavigationEventType.ROBOT_PATH_UNREACHABLE, {
        robotId: this.robot.id,
        goal,
        status: result.status,
      });
      return null;
    }

    const path = this.smoothPaths ? pathfinder.smoothPath(result.path) : result.path;
    this.events?.publish(NavigationEventType.ROBOT_PATH_PLANNED, {
      robotId: this.robot.id,
      goal,
      waypoints: path.length,
      cost: pathfinder.pathCost(path),
    });
    return path;
  }

  private getPathfinder(grid: GridAdapter): Pathfinder {
    if (!this.pathfinder || this.pathfinder.grid !== grid) {
      this.pathfinder = new Pathfinder(grid, this.pathfinderOptions);
    }
    return this.pathfinder;
  }

  private setPath(path: Path): void {
    this.robot.path = path;
    this.robot.pathIndex = 0;
  }

  private clearPath(): void {
    this.robot.path = [];
    this.robot.pathIndex = 0;
  }

  private isLowPower(): boolean {
    const { current, capacity } = this.robot.power;
    return current < capacity * this.lowPowerFraction;
  }

  private getTaskId(): string | null {
    const task = this.getTask();
    if (!task) return null;
    return task.kind === TaskKind.TARGET
      ? task.target.id
      : `base:${coordinateKey(task.base)}`;
  }

  private transition(next: RobotState): void {
    const from = this.robot.state.type;
    this.robot.state = next;
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.ROBOTS,
      this.robot.id,
      `${from} -> ${next.type}`,
    );
    this.events?.publish(NavigationEventType.ROBOT_STATE_CHANGED, {
      robotId: this.robot.id,
      from,
      to: next.type,
    });
  }
}
