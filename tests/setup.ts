import "reflect-metadata";
import { vi } from "vitest";
import { logger, LogLevel } from "../src/infrastructure/utils/logger";
import { TileGrid } from "../src/domain/world/TileGrid";
import type { GridCoordinate, WorldPoint } from "../src/shared/types/grid";
import type {
  InventoryContents,
  InventorySink,
  TargetRef,
  TargetRegistry,
} from "../src/shared/types/robots";

// Solo errores en consola durante los tests
logger.setMinLevel(LogLevel.ERROR);

export const TILE = 32;

/**
 * Center of a cell in world units for the default test tile size.
 */
export function cellCenter(col: number, row: number): WorldPoint {
  return { x: (col + 0.5) * TILE, y: (row + 0.5) * TILE };
}

export function gridFromAscii(rows: string[]): TileGrid {
  return TileGrid.fromAscii(rows, TILE);
}

export function openGrid(width: number, height: number): TileGrid {
  return new TileGrid(width, height, TILE);
}

/**
 * Registry over a fixed list of targets. Targets stay valid until `invalidate`.
 */
export function createMockRegistry(targets: TargetRef[] = []) {
  const valid = new Map(targets.map((t) => [t.id, t]));

  const registry = {
    findNearestEligible: vi.fn(
      (origin: WorldPoint, radius: number): TargetRef | null => {
        let best: TargetRef | null = null;
        let bestDistance = Number.POSITIVE_INFINITY;
        for (const target of valid.values()) {
          const d = Math.hypot(
            target.position.x - origin.x,
            target.position.y - origin.y,
          );
          if (d <= radius && d < bestDistance) {
            best = target;
            bestDistance = d;
          }
        }
        return best;
      },
    ),
    isStillValid: vi.fn((target: TargetRef) => valid.has(target.id)),
    invalidate(id: string) {
      valid.delete(id);
    },
  } satisfies TargetRegistry & { invalidate(id: string): void };

  return registry;
}

export function createMockSink() {
  const deposits: InventoryContents[] = [];
  const sink = {
    deposits,
    deposit: vi.fn((inventory: InventoryContents) => {
      deposits.push(inventory);
    }),
  } satisfies InventorySink & { deposits: InventoryContents[] };
  return sink;
}

export function target(id: string, col: number, row: number): TargetRef {
  return { id, position: cellCenter(col, row) };
}

export function coord(col: number, row: number): GridCoordinate {
  return { col, row };
}
