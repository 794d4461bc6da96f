import type { WorldPoint } from "@/shared/types/grid";
import type { TargetRef, TargetRegistry } from "@/shared/types/robots";
import { NavigationEventType } from "@/shared/constants/EventEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { SpatialGrid } from "@/utils/SpatialGrid";
import type { BatchedEventEmitter } from "@/domain/simulation/core/BatchedEventEmitter";

export interface Collectible {
  readonly id: string;
  readonly materialType: string;
  readonly position: Readonly<WorldPoint>;
  quantity: number;
}

export interface CollectibleInput {
  id?: string;
  materialType: string;
  position: WorldPoint;
  quantity: number;
}

export interface CollectibleRegistryOptions {
  worldWidth: number;
  worldHeight: number;
  /** Bucket size of the spatial index in world units */
  cellSize?: number;
  events?: BatchedEventEmitter;
}

/**
 * Scattered materials robots can pick up, with a spatial index for
 * nearest-target queries. A collectible leaves the registry as soon as its
 * quantity reaches zero.
 */
export class CollectibleRegistry implements TargetRegistry {
  private readonly collectibles = new Map<string, Collectible>();
  private readonly index: SpatialGrid<string>;
  private readonly events?: BatchedEventEmitter;

  constructor(options: CollectibleRegistryOptions) {
    this.index = new SpatialGrid<string>(
      options.worldWidth,
      options.worldHeight,
      options.cellSize ?? 128,
    );
    this.events = options.events;
  }

  get size(): number {
    return this.collectibles.size;
  }

  public add(input: CollectibleInput): Collectible {
    if (!(input.quantity > 0)) {
      throw new RangeError(
        `Collectible quantity must be positive, got ${input.quantity}`,
      );
    }
    const id = input.id ?? RandomUtils.id("collectible");
    if (this.collectibles.has(id)) {
      throw new Error(`Collectible ${id} already registered`);
    }

    const collectible: Collectible = {
      id,
      materialType: input.materialType,
      position: { x: input.position.x, y: input.position.y },
      quantity: input.quantity,
    };
    this.collectibles.set(id, collectible);
    this.index.insert(id, collectible.position);
    return collectible;
  }

  public remove(id: string): boolean {
    this.index.remove(id);
    return this.collectibles.delete(id);
  }

  public get(id: string): Collectible | undefined {
    return this.collectibles.get(id);
  }

  public list(): Collectible[] {
    return [...this.collectibles.values()];
  }

  /**
   * Takes up to `amount` units and returns how many were taken. Depletion
   * removes the collectible and publishes `collectible:depleted`.
   */
  public collect(id: string, amount: number): number {
    const collectible = this.collectibles.get(id);
    if (!collectible || !(amount > 0)) return 0;

    const taken = Math.min(amount, collectible.quantity);
    collectible.quantity -= taken;

    if (collectible.quantity <= 0) {
      this.remove(id);
      logger.debug(`♻️ Collectible ${id} depleted`, LogCategory.WORLD);
      this.events?.publish(NavigationEventType.COLLECTIBLE_DEPLETED, {
        collectibleId: id,
        materialType: collectible.materialType,
      });
    }
    return taken;
  }

  public findNearestEligible(origin: WorldPoint, radius: number): TargetRef | null {
    const match = this.index.findNearest(origin, radius, (id) =>
      this.isAvailable(id),
    );
    if (!match) return null;
    const collectible = this.collectibles.get(match.entity);
    return collectible ? { id: collectible.id, position: collectible.position } : null;
  }

  public isStillValid(target: TargetRef): boolean {
    return this.isAvailable(target.id);
  }

  private isAvailable(id: string): boolean {
    const collectible = this.collectibles.get(id);
    return collectible !== undefined && collectible.quantity > 0;
  }
}
