import { describe, it, expect, beforeEach, vi } from "vitest";
import { BatchedEventEmitter } from "../../src/domain/simulation/core/BatchedEventEmitter";
import { NavigationEventType } from "../../src/shared/constants/EventEnums";
import { RobotStateType } from "../../src/shared/constants/RobotEnums";

describe("BatchedEventEmitter", () => {
  let emitter: BatchedEventEmitter;
  let listener: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    emitter = new BatchedEventEmitter();
    listener = vi.fn();
  });

  describe("publish", () => {
    it("debe encolar el evento hasta el flush", () => {
      emitter.subscribe(NavigationEventType.ROBOT_STATE_CHANGED, listener);

      emitter.publish(NavigationEventType.ROBOT_STATE_CHANGED, {
        robotId: "r1",
        from: RobotStateType.IDLE,
        to: RobotStateType.MOVING_TO_TARGET,
      });

      expect(listener).not.toHaveBeenCalled();
      expect(emitter.flushEvents()).toBe(1);
      expect(listener).toHaveBeenCalledWith({
        robotId: "r1",
        from: RobotStateType.IDLE,
        to: RobotStateType.MOVING_TO_TARGET,
      });
    });

    it("debe entregar de inmediato con el batching desactivado", () => {
      emitter.setBatchingEnabled(false);
      emitter.subscribe(NavigationEventType.ROBOT_REMOVED, listener);

      emitter.publish(NavigationEventType.ROBOT_REMOVED, { robotId: "r1" });

      expect(listener).toHaveBeenCalledWith({ robotId: "r1" });
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("debe devolver en subscribe una función para desuscribirse", () => {
      const unsubscribe = emitter.subscribe(NavigationEventType.ROBOT_REMOVED, listener);
      unsubscribe();

      emitter.publish(NavigationEventType.ROBOT_REMOVED, { robotId: "r1" });
      emitter.flushEvents();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("emit", () => {
    it("debe pasar por la cola igual que queueEvent", () => {
      emitter.on("custom", listener);

      expect(emitter.emit("custom", { data: "test" })).toBe(true);
      expect(listener).not.toHaveBeenCalled();

      emitter.flushEvents();
      expect(listener).toHaveBeenCalledWith({ data: "test" });
    });
  });

  describe("flushEvents", () => {
    it("debe entregar los eventos encolados en orden y contarlos", () => {
      const order: string[] = [];
      emitter.on("event1", () => order.push("event1"));
      emitter.on("event2", () => order.push("event2"));

      emitter.queueEvent("event2", {});
      emitter.queueEvent("event1", {});
      emitter.queueEvent("event2", {});

      expect(emitter.flushEvents()).toBe(3);
      expect(order).toEqual(["event2", "event1", "event2"]);
      expect(emitter.getFlushedCount()).toBe(3);
      expect(emitter.isBatchingEnabled()).toBe(true);
    });

    it("debe entregar de inmediato lo publicado por un listener durante el flush", () => {
      emitter.on("first", () => emitter.queueEvent("second", {}));
      emitter.on("second", listener);

      emitter.queueEvent("first", {});
      emitter.flushEvents();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("debe restaurar el batching cuando un listener lanza", () => {
      emitter.on("boom", () => {
        throw new Error("listener failed");
      });
      emitter.queueEvent("boom", {});

      expect(() => emitter.flushEvents()).toThrow("listener failed");
      expect(emitter.isBatchingEnabled()).toBe(true);
    });

    it("no debe hacer nada con la cola vacía", () => {
      expect(emitter.flushEvents()).toBe(0);
    });
  });

  describe("setBatchingEnabled", () => {
    it("debe vaciar los eventos pendientes al desactivarse", () => {
      emitter.on("test-event", listener);
      emitter.queueEvent("test-event", { data: "test" });

      emitter.setBatchingEnabled(false);

      expect(emitter.getQueueSize()).toBe(0);
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe("clearQueue", () => {
    it("debe vaciar la cola sin procesar", () => {
      emitter.on("test-event", listener);
      emitter.queueEvent("test-event", { data: "test" });

      emitter.clearQueue();

      expect(emitter.getQueueSize()).toBe(0);
      emitter.flushEvents();
      expect(listener).not.toHaveBeenCalled();
    });
  });
});
