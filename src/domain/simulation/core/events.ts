import { BatchedEventEmitter } from "./BatchedEventEmitter";
import { NavigationEventType } from "@/shared/constants/EventEnums";

/**
 * Process-wide event bus for robot and world events.
 * Systems publish during a tick; `SimulationRunner.step` flushes at its end.
 */
export const simulationEvents = new BatchedEventEmitter();

export { NavigationEventType };
