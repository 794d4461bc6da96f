import type { InventoryContents } from "@/shared/types/robots";

/**
 * Capacity-limited material store carried by a robot.
 *
 * The load is the sum of all material quantities and never exceeds the
 * capacity: additions are clamped and report how much was accepted.
 */
export class RobotInventory {
  private materials = new Map<string, number>();
  private currentLoad = 0;

  constructor(public readonly capacity: number) {
    if (!(capacity > 0)) {
      throw new RangeError(`Inventory capacity must be positive, got ${capacity}`);
    }
  }

  get load(): number {
    return this.currentLoad;
  }

  get freeSpace(): number {
    return this.capacity - this.currentLoad;
  }

  public isFull(): boolean {
    return this.currentLoad >= this.capacity;
  }

  public isEmpty(): boolean {
    return this.currentLoad === 0;
  }

  /**
   * Adds up to `quantity` units of a material and returns the amount accepted.
   */
  public add(material: string, quantity: number): number {
    if (!(quantity > 0)) return 0;
    const accepted = Math.min(quantity, this.freeSpace);
    if (accepted <= 0) return 0;

    this.materials.set(material, (this.materials.get(material) ?? 0) + accepted);
    this.currentLoad += accepted;
    return accepted;
  }

  public get(material: string): number {
    return this.materials.get(material) ?? 0;
  }

  public snapshot(): InventoryContents {
    return Object.fromEntries(this.materials);
  }

  /**
   * Removes everything and returns what was carried.
   */
  public empty(): InventoryContents {
    const contents = this.snapshot();
    this.materials.clear();
    this.currentLoad = 0;
    return contents;
  }
}
