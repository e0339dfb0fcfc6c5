import { EventEmitter } from "node:events";
import type { BeliefEvent } from "./types.js";

type EventType = BeliefEvent["type"];
type EventOfType<T extends EventType> = Extract<BeliefEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOfType<T>) => void;

/**
 * Typed, synchronous, in-process event bus for store and ledger changes.
 * Stores emit once their write commits; delivery is synchronous.
 * Listeners are for observation only; nothing in the core waits on them.
 */
export class BeliefBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<T extends EventType>(event: EventOfType<T>): void {
    this.emitter.emit(event.type, event);
  }

  on<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.on(type, handler as (...args: unknown[]) => void);
  }

  off<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.off(type, handler as (...args: unknown[]) => void);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
