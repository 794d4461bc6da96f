import type { GridCoordinate, WorldPoint } from "@/shared/types/grid";
import { TileType } from "@/shared/constants/TileTypeEnums";
import { CONFIG } from "@/config/config";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { TileGrid } from "../TileGrid";

export const MATERIAL_TYPES = [
  "plastic",
  "metal",
  "glass",
  "paper",
  "rubber",
  "organic",
  "wood",
  "electronic",
] as const;

export type MaterialType = (typeof MATERIAL_TYPES)[number];

export interface CollectibleSpawn {
  position: WorldPoint;
  materialType: MaterialType;
  quantity: number;
}

export interface TestWorldOptions {
  widthTiles: number;
  heightTiles: number;
  seed: string;
  tileSize?: number;
  /** Number of collectibles scattered over the landfill */
  collectibleCount?: number;
}

export interface TestWorld {
  grid: TileGrid;
  /** Walkable cell next to the factory where robots unload */
  base: GridCoordinate;
  factory: { from: GridCoordinate; to: GridCoordinate };
  landfill: { from: GridCoordinate; to: GridCoordinate };
  collectibles: CollectibleSpawn[];
}

/**
 * Generates a small demonstration world: a factory block in the center with a
 * dirt road leading west, a landfill area to the west and a block city with
 * random buildings to the east. Same seed, same world.
 */
export function generateTestWorld(options: TestWorldOptions): TestWorld {
  const { widthTiles, heightTiles, seed } = options;
  const tileSize = options.tileSize ?? CONFIG.TILE_SIZE;
  const rng = RandomUtils.createRng(`test-world-${seed}`);
  const grid = new TileGrid(widthTiles, heightTiles, tileSize);

  const centerCol = Math.floor(widthTiles / 2);
  const centerRow = Math.floor(heightTiles / 2);

  const landfill = {
    from: { col: 1, row: 1 },
    to: {
      col: Math.max(1, Math.floor(widthTiles / 4)),
      row: Math.max(1, heightTiles - 2),
    },
  };
  for (let row = landfill.from.row; row <= landfill.to.row; row++) {
    for (let col = landfill.from.col; col <= landfill.to.col; col++) {
      grid.setTileType(
        { col, row },
        rng() < 0.8 ? TileType.LANDFILL : TileType.DIRT,
      );
    }
  }

  const cityFrom = Math.floor((widthTiles * 3) / 4);
  for (let row = 1; row < heightTiles - 1; row++) {
    for (let col = cityFrom; col < widthTiles - 1; col++) {
      if (col % 8 === 0 || col % 8 === 7 || row % 8 === 0 || row % 8 === 7) {
        grid.setTileType({ col, row }, TileType.ROAD_TAR);
      } else if (rng() < 0.6) {
        grid.setTileType({ col, row }, TileType.BUILDING);
      }
    }
  }

  const factory = {
    from: { col: centerCol - 2, row: centerRow - 2 },
    to: { col: centerCol + 2, row: centerRow + 2 },
  };
  grid.fillRect(factory.from, factory.to, TileType.FACTORY);

  for (let col = Math.max(0, centerCol - 10); col < factory.from.col; col++) {
    grid.setTileType({ col, row: centerRow }, TileType.ROAD_DIRT);
  }

  const base = { col: factory.from.col - 1, row: centerRow };

  const collectibles: CollectibleSpawn[] = [];
  const count = options.collectibleCount ?? 10;
  for (let i = 0; i < count; i++) {
    const col = landfill.from.col + Math.floor(rng() * (landfill.to.col - landfill.from.col + 1));
    const row = landfill.from.row + Math.floor(rng() * (landfill.to.row - landfill.from.row + 1));
    const center = grid.gridToWorld({ col, row });
    collectibles.push({
      position: center,
      materialType: MATERIAL_TYPES[Math.floor(rng() * MATERIAL_TYPES.length)],
      quantity: 5 + Math.floor(rng() * 46),
    });
  }

  logger.info(
    `🗺️ Test world generated: ${widthTiles}x${heightTiles}`,
    LogCategory.WORLD,
    { seed, walkable: grid.countWalkable(), collectibles: collectibles.length },
  );

  return { grid, base, factory, landfill, collectibles };
}
