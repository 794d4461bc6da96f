import { EventEmitter } from "node:events";
import type { NavigationEventType } from "@/shared/constants/EventEnums";
import type { NavigationEventPayloads } from "@/shared/types/events";

interface QueuedEvent {
  name: string;
  payload: unknown;
}

/**
 * Buffered EventEmitter: events emitted during a tick are queued and delivered
 * together by `flushEvents()` at the end of the tick.
 *
 * `publish` / `subscribe` are the typed entry points for navigation events;
 * plain `emit` / `on` keep working for anything else.
 */
export class BatchedEventEmitter extends EventEmitter {
  private eventQueue: QueuedEvent[] = [];
  private batchingEnabled = true;
  private flushedCount = 0;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /**
   * Queues the event while batching is enabled; always reports success then.
   */
  public emit(event: string | symbol, ...args: unknown[]): boolean {
    if (this.batchingEnabled) {
      this.queueEvent(String(event), args[0]);
      return true;
    }
    return super.emit(event, ...args);
  }

  public queueEvent(name: string, payload: unknown): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }
    this.eventQueue.push({ name, payload });
  }

  public publish<K extends NavigationEventType>(
    name: K,
    payload: NavigationEventPayloads[K],
  ): void {
    this.queueEvent(name, payload);
  }

  public subscribe<K extends NavigationEventType>(
    name: K,
    listener: (payload: NavigationEventPayloads[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  /**
   * Delivers every queued event in order. Events published by listeners during
   * the flush are delivered immediately.
   */
  public flushEvents(): number {
    if (this.eventQueue.length === 0) return 0;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;
    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }

    this.flushedCount += batch.length;
    return batch.length;
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public isBatchingEnabled(): boolean {
    return this.batchingEnabled;
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }

  public getFlushedCount(): number {
    return this.flushedCount;
  }
}
