import { describe, it, expect } from "vitest";
import { MaterialStockpile } from "../../src/domain/world/MaterialStockpile";

describe("MaterialStockpile", () => {
  it("debe totalizar las entregas por material", () => {
    const stockpile = new MaterialStockpile();
    stockpile.deposit({ plastic: 40, metal: 10 });
    stockpile.deposit({ plastic: 5 });

    expect(stockpile.getAmount("plastic")).toBe(45);
    expect(stockpile.getAmount("glass")).toBe(0);
    expect(stockpile.getTotals()).toEqual({ plastic: 45, metal: 10 });
    expect(stockpile.getTotalAmount()).toBe(55);
    expect(stockpile.getDeliveryCount()).toBe(2);
  });

  it("debe contar entregas vacías y poder reiniciarse", () => {
    const stockpile = new MaterialStockpile();
    stockpile.deposit({});
    expect(stockpile.getDeliveryCount()).toBe(1);
    expect(stockpile.getTotalAmount()).toBe(0);

    stockpile.clear();
    expect(stockpile.getDeliveryCount()).toBe(0);
  });
});
