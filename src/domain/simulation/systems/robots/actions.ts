import type { PerformAction } from "@/shared/types/robots";
import { ActionStatus } from "@/shared/constants/RobotEnums";
import type { CollectibleRegistry } from "@/domain/world/CollectibleRegistry";

/**
 * Picks up as much of the target collectible as fits into the robot's
 * inventory. Completes in a single tick.
 */
export function createCollectAction(registry: CollectibleRegistry): PerformAction {
  return (robot, target) => {
    const collectible = registry.get(target.id);
    if (!collectible) return ActionStatus.COMPLETED;

    const wanted = Math.min(robot.inventory.freeSpace, collectible.quantity);
    const taken = registry.collect(collectible.id, wanted);
    robot.inventory.add(collectible.materialType, taken);
    return ActionStatus.COMPLETED;
  };
}
