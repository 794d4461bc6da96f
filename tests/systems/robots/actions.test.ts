import { describe, it, expect } from "vitest";
import { createCollectAction } from "../../../src/domain/simulation/systems/robots/actions";
import { createRobot } from "../../../src/domain/simulation/systems/robots/createRobot";
import { CollectibleRegistry } from "../../../src/domain/world/CollectibleRegistry";
import { ActionStatus } from "../../../src/shared/constants/RobotEnums";
import { cellCenter } from "../../setup";

function setup(quantity: number, capacity: number) {
  const registry = new CollectibleRegistry({ worldWidth: 320, worldHeight: 320 });
  registry.add({ id: "c1", materialType: "metal", position: cellCenter(2, 2), quantity });
  const robot = createRobot({ id: "r1", position: cellCenter(2, 2), capacity });
  return { registry, robot, action: createCollectAction(registry) };
}

describe("createCollectAction", () => {
  it("debe tomar el recolectable entero si cabe", () => {
    const { registry, robot, action } = setup(30, 100);

    const status = action(robot, { id: "c1", position: cellCenter(2, 2) }, 0);

    expect(status).toBe(ActionStatus.COMPLETED);
    expect(robot.inventory.get("metal")).toBe(30);
    expect(registry.get("c1")).toBeUndefined();
  });

  it("debe dejar el resto cuando el inventario se llena", () => {
    const { registry, robot, action } = setup(30, 20);

    action(robot, { id: "c1", position: cellCenter(2, 2) }, 0);

    expect(robot.inventory.isFull()).toBe(true);
    expect(registry.get("c1")?.quantity).toBe(10);
  });

  it("debe completar sin efecto sobre un objetivo desaparecido", () => {
    const { robot, action } = setup(30, 100);

    const status = action(robot, { id: "gone", position: cellCenter(0, 0) }, 0);

    expect(status).toBe(ActionStatus.COMPLETED);
    expect(robot.inventory.isEmpty()).toBe(true);
  });
});
