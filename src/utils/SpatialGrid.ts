import type { WorldPoint } from "@/shared/types/grid";

export interface SpatialMatch<T> {
  entity: T;
  distance: number;
}

/**
 * Uniform bucket grid over world space for radius queries.
 *
 * Bucket size is independent of the tile size; entities outside the world
 * bounds are stored but never returned by queries.
 */
export class SpatialGrid<T = string> {
  private cells = new Map<string, Set<T>>();
  private entityPositions = new Map<T, WorldPoint>();
  private readonly cols: number;
  private readonly rows: number;

  constructor(
    worldWidth: number,
    worldHeight: number,
    private readonly cellSize: number,
  ) {
    if (!(cellSize > 0)) {
      throw new RangeError(`Spatial cell size must be positive, got ${cellSize}`);
    }
    this.cols = Math.ceil(worldWidth / cellSize);
    this.rows = Math.ceil(worldHeight / cellSize);
  }

  get size(): number {
    return this.entityPositions.size;
  }

  private cellKey(x: number, y: number): string {
    return `${Math.floor(x / this.cellSize)},${Math.floor(y / this.cellSize)}`;
  }

  public insert(entity: T, position: WorldPoint): void {
    this.remove(entity);

    const key = this.cellKey(position.x, position.y);
    let cell = this.cells.get(key);
    if (!cell) {
      cell = new Set();
      this.cells.set(key, cell);
    }
    cell.add(entity);
    this.entityPositions.set(entity, { x: position.x, y: position.y });
  }

  public remove(entity: T): boolean {
    const pos = this.entityPositions.get(entity);
    if (!pos) return false;

    const key = this.cellKey(pos.x, pos.y);
    const cell = this.cells.get(key);
    if (cell) {
      cell.delete(entity);
      if (cell.size === 0) this.cells.delete(key);
    }
    this.entityPositions.delete(entity);
    return true;
  }

  public has(entity: T): boolean {
    return this.entityPositions.has(entity);
  }

  public getPosition(entity: T): WorldPoint | undefined {
    return this.entityPositions.get(entity);
  }

  public clear(): void {
    this.cells.clear();
    this.entityPositions.clear();
  }

  /**
   * Entities within `radius` of `center` (inclusive), in no particular order.
   */
  public queryRadius(center: WorldPoint, radius: number): SpatialMatch<T>[] {
    const results: SpatialMatch<T>[] = [];
    if (radius < 0) return results;

    const centerCol = Math.floor(center.x / this.cellSize);
    const centerRow = Math.floor(center.y / this.cellSize);
    const cellRadius = Math.ceil(radius / this.cellSize);

    const minCol = Math.max(0, centerCol - cellRadius);
    const maxCol = Math.min(this.cols - 1, centerCol + cellRadius);
    const minRow = Math.max(0, centerRow - cellRadius);
    const maxRow = Math.min(this.rows - 1, centerRow + cellRadius);

    for (let col = minCol; col <= maxCol; col++) {
      for (let row = minRow; row <= maxRow; row++) {
        const cell = this.cells.get(`${col},${row}`);
        if (!cell) continue;

        for (const entity of cell) {
          const pos = this.entityPositions.get(entity);
          if (!pos) continue;
          const distance = Math.hypot(pos.x - center.x, pos.y - center.y);
          if (distance <= radius) {
            results.push({ entity, distance });
          }
        }
      }
    }

    return results;
  }

  /**
   * Closest entity within the radius accepted by `filter`. Equal distances go
   * to the entity inserted first.
   */
  public findNearest(
    center: WorldPoint,
    radius: number,
    filter?: (entity: T) => boolean,
  ): SpatialMatch<T> | null {
    let best: SpatialMatch<T> | null = null;
    let bestOrder = Number.POSITIVE_INFINITY;
    const order = new Map<T, number>();
    let i = 0;
    for (const entity of this.entityPositions.keys()) order.set(entity, i++);

    for (const match of this.queryRadius(center, radius)) {
      if (filter && !filter(match.entity)) continue;
      const rank = order.get(match.entity) ?? Number.POSITIVE_INFINITY;
      if (
        !best ||
        match.distance < best.distance ||
        (match.distance === best.distance && rank < bestOrder)
      ) {
        best = match;
        bestOrder = rank;
      }
    }
    return best;
  }

  public getStats(): {
    totalEntities: number;
    totalCells: number;
    occupiedCells: number;
    maxEntitiesInCell: number;
  } {
    let maxEntities = 0;
    for (const cell of this.cells.values()) {
      maxEntities = Math.max(maxEntities, cell.size);
    }
    return {
      totalEntities: this.entityPositions.size,
      totalCells: this.cols * this.rows,
      occupiedCells: this.cells.size,
      maxEntitiesInCell: maxEntities,
    };
  }
}
