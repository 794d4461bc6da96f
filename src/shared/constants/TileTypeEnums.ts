/**
 * Tile type enumerations for the navigation grid.
 *
 * @module shared/constants/TileTypeEnums
 */

/**
 * Enumeration of tile types a grid cell can hold.
 */
export enum TileType {
  EMPTY = "empty",
  GRASS = "grass",
  DIRT = "dirt",
  LANDFILL = "landfill",
  ROAD_DIRT = "road_dirt",
  ROAD_TAR = "road_tar",
  ROAD_ASPHALT = "road_asphalt",
  BRIDGE = "bridge",
  FACTORY = "factory",
  BUILDING = "building",
  WATER = "water",
}

/**
 * Tile types that permanently block movement.
 */
export const BLOCKING_TILE_TYPES: ReadonlySet<TileType> = new Set([
  TileType.FACTORY,
  TileType.BUILDING,
  TileType.WATER,
]);

export function isBlockingTileType(type: TileType): boolean {
  return BLOCKING_TILE_TYPES.has(type);
}
