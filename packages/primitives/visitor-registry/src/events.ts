import type { Logger } from "./types";

type Handler<T> = (payload: T) => void;

export class EventEmitter<TEvents extends Record<string, unknown>> {
  private listeners: { [K in keyof TEvents]?: Set<Handler<TEvents[K]>> } = {};

  constructor(private readonly logger?: Logger) {}

  on<K extends keyof TEvents>(event: K, handler: Handler<TEvents[K]>): () => void {
    const handlers = this.listeners[event] ?? new Set<Handler<TEvents[K]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;
    return () => this.off(event, handler);
  }

  off<K extends keyof TEvents>(event: K, handler: Handler<TEvents[K]>): void {
    this.listeners[event]?.delete(handler);
  }

  emit<K extends keyof TEvents>(event: K, payload: TEvents[K]): void {
    this.listeners[event]?.forEach((handler) => {
      try {
        handler(payload);
      } catch (error) {
        // A failing subscriber must not fail the write that triggered it.
        if (this.logger) {
          this.logger("event_handler_failed", { event: String(event), error: String(error) });
        } else {
          console.error(`[EventEmitter] Error in handler for event "${String(event)}":`, error);
        }
      }
    });
  }
}
