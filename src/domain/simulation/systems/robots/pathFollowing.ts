import type { GridAdapter, WorldPoint } from "@/shared/types/grid";
import type { Robot } from "@/shared/types/robots";

export interface FollowStep {
  /** World units moved this tick */
  moved: number;
  /** True when every waypoint has been consumed */
  exhausted: boolean;
}

export function isPathExhausted(robot: Robot): boolean {
  return robot.pathIndex >= robot.path.length;
}

/**
 * Advances a robot along its waypoints for one tick.
 *
 * Waypoints whose cell center is within `tolerance` are consumed first; the
 * robot then moves straight toward the next center by at most `speed * dt`
 * without overshooting it. Power drains only while moving and never drops
 * below zero.
 */
export function followPath(
  robot: Robot,
  grid: GridAdapter,
  dt: number,
  tolerance: number,
): FollowStep {
  while (robot.pathIndex < robot.path.length) {
    const target = grid.gridToWorld(robot.path[robot.pathIndex]);
    const dx = target.x - robot.position.x;
    const dy = target.y - robot.position.y;
    const distance = Math.hypot(dx, dy);

    if (distance <= tolerance) {
      robot.pathIndex++;
      continue;
    }

    return { moved: moveToward(robot, target, dt), exhausted: false };
  }

  return { moved: 0, exhausted: true };
}

/**
 * Moves a robot straight toward `point` by at most `speed * dt`, stopping on
 * it. Returns the distance moved.
 */
export function moveToward(robot: Robot, point: WorldPoint, dt: number): number {
  const dx = point.x - robot.position.x;
  const dy = point.y - robot.position.y;
  const distance = Math.hypot(dx, dy);
  const step = Math.min(robot.speed * dt, distance);
  if (step <= 0) return 0;

  robot.position.x += (dx / distance) * step;
  robot.position.y += (dy / distance) * step;
  robot.stats.distanceTravelled += step;
  robot.power.current = Math.max(
    0,
    robot.power.current - robot.power.drainPerSecond * dt,
  );
  return step;
}
