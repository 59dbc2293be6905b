import { EventEmitter } from "eventemitter3";
import type { Value, ValueObject } from "../types/values.js";

export interface WorkflowEvent {
  id: string;
  type: string;
  source: string;
  time: string;
  data: Value;
}

export function eventToValue(e: WorkflowEvent): ValueObject {
  return { id: e.id, type: e.type, source: e.source, time: e.time, data: e.data };
}

type BusEvents = { event: (e: WorkflowEvent) => void };

/** In-process event sink/source shared by emit and listen tasks of one run. */
export class EventBus {
  private readonly emitter = new EventEmitter<BusEvents>();
  private seq = 0;

  publish(e: Omit<WorkflowEvent, "id" | "time"> & Partial<Pick<WorkflowEvent, "id" | "time">>): WorkflowEvent {
    const event: WorkflowEvent = {
      id: e.id ?? `evt-${++this.seq}`,
      time: e.time ?? new Date().toISOString(),
      type: e.type,
      source: e.source,
      data: e.data
    };
    this.emitter.emit("event", event);
    return event;
  }

  /**
   * Resolves with the first published event accepted by `accept`.
   * Rejects with the signal's reason when aborted first, or with whatever
   * `accept` throws.
   */
  next(accept: (e: WorkflowEvent) => boolean, signal?: AbortSignal): Promise<WorkflowEvent> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onEvent = (e: WorkflowEvent) => {
        let hit: boolean;
        try {
          hit = accept(e);
        } catch (err) {
          cleanup();
          reject(err);
          return;
        }
        if (!hit) return;
        cleanup();
        resolve(e);
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason);
      };
      const cleanup = () => {
        this.emitter.off("event", onEvent);
        signal?.removeEventListener("abort", onAbort);
      };
      this.emitter.on("event", onEvent);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Subscribes to every event; returns the unsubscribe function. */
  subscribe(listener: (e: WorkflowEvent) => void): () => void {
    this.emitter.on("event", listener);
    return () => { this.emitter.off("event", listener); };
  }

  listenerCount(): number {
    return this.emitter.listenerCount("event");
  }
}
