import type {
  GridAdapter,
  GridCoordinate,
  WorldPoint,
} from "@/shared/types/grid";
import { CONFIG } from "@/config/config";
import { TileType, isBlockingTileType } from "@/shared/constants/TileTypeEnums";
import {
  gridToWorldCenter,
  worldToGrid,
} from "@/domain/simulation/systems/movement/helpers";

interface Tile {
  type: TileType;
  /** Static obstacle standing on the tile (construction site, parked machine) */
  occupied: boolean;
}

/**
 * Characters accepted by `TileGrid.fromAscii`.
 */
const ASCII_TILES: Record<string, { type: TileType; occupied?: boolean }> = {
  ".": { type: TileType.GRASS },
  ",": { type: TileType.DIRT },
  L: { type: TileType.LANDFILL },
  "=": { type: TileType.ROAD_TAR },
  "+": { type: TileType.BRIDGE },
  "#": { type: TileType.BUILDING },
  F: { type: TileType.FACTORY },
  "~": { type: TileType.WATER },
  o: { type: TileType.GRASS, occupied: true },
};

/**
 * Rectangular tile world implementing the grid adapter.
 *
 * A cell is walkable when it is in bounds, its tile type does not block
 * movement and nothing occupies it. Mutations come from the host (construction,
 * deconstruction); the navigation core only reads.
 */
export class TileGrid implements GridAdapter {
  private readonly tiles: Tile[];

  constructor(
    public readonly widthTiles: number,
    public readonly heightTiles: number,
    public readonly tileSize: number = CONFIG.TILE_SIZE,
    fill: TileType = TileType.GRASS,
  ) {
    if (!Number.isInteger(widthTiles) || widthTiles <= 0) {
      throw new RangeError(`Grid width must be a positive integer, got ${widthTiles}`);
    }
    if (!Number.isInteger(heightTiles) || heightTiles <= 0) {
      throw new RangeError(`Grid height must be a positive integer, got ${heightTiles}`);
    }
    if (!(tileSize > 0)) {
      throw new RangeError(`Tile size must be positive, got ${tileSize}`);
    }

    this.tiles = Array.from({ length: widthTiles * heightTiles }, () => ({
      type: fill,
      occupied: false,
    }));
  }

  /**
   * Builds a grid from rows of characters, one character per tile.
   * `.` grass, `,` dirt, `L` landfill, `=` road, `+` bridge, `#` building,
   * `F` factory, `~` water, `o` grass with a static obstacle.
   */
  static fromAscii(rows: readonly string[], tileSize: number = CONFIG.TILE_SIZE): TileGrid {
    if (rows.length === 0) {
      throw new RangeError("ASCII map must contain at least one row");
    }
    const width = rows[0].length;
    const grid = new TileGrid(width, rows.length, tileSize);

    rows.forEach((line, row) => {
      if (line.length !== width) {
        throw new RangeError(
          `ASCII map row ${row} has length ${line.length}, expected ${width}`,
        );
      }
      for (let col = 0; col < width; col++) {
        const legend = ASCII_TILES[line[col]];
        if (!legend) {
          throw new RangeError(`Unknown tile character "${line[col]}" at ${col},${row}`);
        }
        grid.setTileType({ col, row }, legend.type);
        grid.setOccupied({ col, row }, legend.occupied ?? false);
      }
    });

    return grid;
  }

  get worldWidth(): number {
    return this.widthTiles * this.tileSize;
  }

  get worldHeight(): number {
    return this.heightTiles * this.tileSize;
  }

  public inBounds(coord: GridCoordinate): boolean {
    return (
      Number.isInteger(coord.col) &&
      Number.isInteger(coord.row) &&
      coord.col >= 0 &&
      coord.row >= 0 &&
      coord.col < this.widthTiles &&
      coord.row < this.heightTiles
    );
  }

  private tileAt(coord: GridCoordinate): Tile | undefined {
    if (!this.inBounds(coord)) return undefined;
    return this.tiles[coord.row * this.widthTiles + coord.col];
  }

  public isWalkable(coord: GridCoordinate): boolean {
    const tile = this.tileAt(coord);
    if (!tile) return false;
    return !isBlockingTileType(tile.type) && !tile.occupied;
  }

  public getTileType(coord: GridCoordinate): TileType | undefined {
    return this.tileAt(coord)?.type;
  }

  public isOccupied(coord: GridCoordinate): boolean {
    return this.tileAt(coord)?.occupied ?? false;
  }

  /**
   * Returns false when the coordinate is out of bounds.
   */
  public setTileType(coord: GridCoordinate, type: TileType): boolean {
    const tile = this.tileAt(coord);
    if (!tile) return false;
    tile.type = type;
    return true;
  }

  /**
   * Returns false when the coordinate is out of bounds.
   */
  public setOccupied(coord: GridCoordinate, occupied: boolean): boolean {
    const tile = this.tileAt(coord);
    if (!tile) return false;
    tile.occupied = occupied;
    return true;
  }

  /**
   * Fills an inclusive rectangle of tiles; cells outside the grid are skipped.
   */
  public fillRect(
    from: GridCoordinate,
    to: GridCoordinate,
    type: TileType,
  ): void {
    for (let row = Math.min(from.row, to.row); row <= Math.max(from.row, to.row); row++) {
      for (let col = Math.min(from.col, to.col); col <= Math.max(from.col, to.col); col++) {
        this.setTileType({ col, row }, type);
      }
    }
  }

  public worldToGrid(x: number, y: number): GridCoordinate {
    return worldToGrid(x, y, this.tileSize);
  }

  public gridToWorld(coord: GridCoordinate): WorldPoint {
    return gridToWorldCenter(coord, this.tileSize);
  }

  public countWalkable(): number {
    let count = 0;
    for (let row = 0; row < this.heightTiles; row++) {
      for (let col = 0; col < this.widthTiles; col++) {
        if (this.isWalkable({ col, row })) count++;
      }
    }
    return count;
  }
}
