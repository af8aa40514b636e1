/**
 * Outbound engine event channel
 *
 * Delivery is fire-and-forget: emit never waits on or fails because of a subscriber.
 */

import type { EngineEvent } from "../types";
import { errorMessage } from "./errors";
import { createLogger } from "../utils/logger";

const log = createLogger("events");

export type EngineEventHandler = (event: EngineEvent) => void;

export class EngineEvents {
  private handlers = new Set<EngineEventHandler>();

  subscribe(handler: EngineEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(event: EngineEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        log.error(`Event subscriber failed on ${event.type} event: ${errorMessage(error)}`);
      }
    }
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }
}
