import { EventEmitter } from "node:events";
import type { Logger } from "./logger.js";
import type { EngineEventMap } from "../types/events.js";

/**
 * Typed wrapper over EventEmitter for engine notifications.
 *
 * Events are emitted after the state change they describe has committed, so a
 * listener that throws is logged and skipped; it never fails the operation or
 * stops later listeners.
 */
export class EngineEvents {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: Logger) {}

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof EngineEventMap>(
    event: K,
    listener: (payload: EngineEventMap[K]) => void
  ): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends keyof EngineEventMap>(event: K, payload: EngineEventMap[K]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(payload);
      } catch (err) {
        this.logger.error(
          { event, error: err instanceof Error ? err.message : String(err) },
          "Event listener failed"
        );
      }
    }
  }
}
