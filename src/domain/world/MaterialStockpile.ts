import type { InventoryContents, InventorySink } from "@/shared/types/robots";
import { logger, LogCategory } from "@/infrastructure/utils/logger";

/**
 * Base storage receiving robot deliveries. Totals are kept per material type.
 */
export class MaterialStockpile implements InventorySink {
  private totals = new Map<string, number>();
  private deliveries = 0;

  public deposit(inventory: InventoryContents): void {
    let delivered = 0;
    for (const [material, quantity] of Object.entries(inventory)) {
      if (!(quantity > 0)) continue;
      this.totals.set(material, (this.totals.get(material) ?? 0) + quantity);
      delivered += quantity;
    }
    this.deliveries++;
    logger.debug(`🏭 Stockpile received ${delivered}`, LogCategory.WORLD, inventory);
  }

  public getAmount(material: string): number {
    return this.totals.get(material) ?? 0;
  }

  public getTotals(): InventoryContents {
    return Object.fromEntries(this.totals);
  }

  public getTotalAmount(): number {
    let total = 0;
    for (const quantity of this.totals.values()) total += quantity;
    return total;
  }

  public getDeliveryCount(): number {
    return this.deliveries;
  }

  public clear(): void {
    this.totals.clear();
    this.deliveries = 0;
  }
}
