import type { GridCoordinate, WorldPoint } from "@/shared/types/grid";
import type { Robot } from "@/shared/types/robots";
import { RobotStateType } from "@/shared/constants/RobotEnums";
import { CONFIG } from "@/config/config";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { RobotInventory } from "./RobotInventory";

export interface RobotSpawnOptions {
  id?: string;
  position: WorldPoint;
  home?: GridCoordinate | null;
  speed?: number;
  capacity?: number;
  powerCapacity?: number;
  powerDrainPerSecond?: number;
}

/**
 * Builds an idle robot with an empty inventory and a full battery.
 */
export function createRobot(options: RobotSpawnOptions): Robot {
  const speed = options.speed ?? CONFIG.ROBOT.SPEED;
  if (!(speed > 0)) {
    throw new RangeError(`Robot speed must be positive, got ${speed}`);
  }
  const powerCapacity = options.powerCapacity ?? CONFIG.ROBOT.POWER_CAPACITY;

  return {
    id: options.id ?? RandomUtils.id("robot"),
    position: { x: options.position.x, y: options.position.y },
    state: { type: RobotStateType.IDLE },
    path: [],
    pathIndex: 0,
    speed,
    inventory: new RobotInventory(options.capacity ?? CONFIG.ROBOT.CAPACITY),
    power: {
      current: powerCapacity,
      capacity: powerCapacity,
      drainPerSecond:
        options.powerDrainPerSecond ?? CONFIG.ROBOT.POWER_DRAIN_PER_SECOND,
    },
    home: options.home ?? null,
    stats: { distanceTravelled: 0, deliveries: 0, abandonedTasks: 0 },
  };
}
