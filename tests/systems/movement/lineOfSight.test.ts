import { describe, it, expect } from "vitest";
import {
  bresenhamLine,
  hasLineOfSight,
} from "../../../src/domain/simulation/systems/movement/lineOfSight";
import { gridFromAscii } from "../../setup";

describe("lineOfSight", () => {
  describe("bresenhamLine", () => {
    it("debe recorrer una pendiente suave", () => {
      expect(bresenhamLine({ col: 0, row: 0 }, { col: 3, row: 1 })).toEqual([
        { col: 0, row: 0 },
        { col: 1, row: 0 },
        { col: 2, row: 1 },
        { col: 3, row: 1 },
      ]);
    });

    it("debe recorrer una línea vertical", () => {
      expect(bresenhamLine({ col: 0, row: 0 }, { col: 0, row: 3 })).toEqual([
        { col: 0, row: 0 },
        { col: 0, row: 1 },
        { col: 0, row: 2 },
        { col: 0, row: 3 },
      ]);
    });

    it("debe devolver una sola celda cuando los extremos coinciden", () => {
      expect(bresenhamLine({ col: 2, row: 2 }, { col: 2, row: 2 })).toEqual([
        { col: 2, row: 2 },
      ]);
    });
  });

  describe("hasLineOfSight", () => {
    const grid = gridFromAscii([
      ".....",
      "..#..",
      ".....",
    ]);

    it("debe ser verdadero a través de celdas abiertas", () => {
      expect(hasLineOfSight(grid, { col: 0, row: 0 }, { col: 4, row: 0 })).toBe(true);
      expect(hasLineOfSight(grid, { col: 0, row: 2 }, { col: 4, row: 2 })).toBe(true);
    });

    it("debe ser falso si una celda bloqueada está en la línea", () => {
      expect(hasLineOfSight(grid, { col: 0, row: 1 }, { col: 4, row: 1 })).toBe(false);
    });

    it("debe ser falso si un extremo está bloqueado o fuera de rango", () => {
      expect(hasLineOfSight(grid, { col: 2, row: 1 }, { col: 2, row: 1 })).toBe(false);
      expect(hasLineOfSight(grid, { col: 0, row: 0 }, { col: 5, row: 0 })).toBe(false);
    });
  });
});
