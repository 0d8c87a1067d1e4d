import { EventEmitter } from "events";
import type { AbstractConstructor } from "../../types/services/base.types";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Event handling capabilities
 */
export interface EventCapabilities {
  emit(event: string | symbol, ...args: unknown[]): boolean;
  on<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  once<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  off<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  removeAllListeners(event?: string | symbol): this;
  listenerCount(event: string | symbol): number;
  emitWithLogging(event: string, ...args: unknown[]): boolean;
  getEventStats(): Record<string, number>;
}

/**
 * Mixin that adds event handling to a service
 */
export function WithEvents<TBase extends AbstractConstructor<LoggingCapabilities>>(Base: TBase) {
  abstract class EventsMixin extends Base implements EventCapabilities {
    public readonly eventListeners = new Map<string, number>();
    public readonly eventEmitter: EventEmitter;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.eventEmitter = new EventEmitter();
      this.setupEventTracking();
    }

    emit(event: string | symbol, ...args: unknown[]): boolean {
      return this.eventEmitter.emit(event, ...args);
    }

    on<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.on(event, listener);
      if (typeof event === "string") {
        this.trackListener(event);

        if (this.listenerCount(event) > this.eventEmitter.getMaxListeners()) {
          this.logWarning(`Max listeners exceeded for event: ${event}`, "EventEmitter");
        }
      }
      return this;
    }

    once<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.once(event, listener);
      return this;
    }

    off<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.off(event, listener);
      if (typeof event === "string") {
        this.untrackListener(event);
      }
      return this;
    }

    removeAllListeners(event?: string | symbol): this {
      // An explicit undefined would name an event, so the no-argument form is kept
      if (event === undefined) {
        this.eventEmitter.removeAllListeners();
        this.eventListeners.clear();
      } else {
        this.eventEmitter.removeAllListeners(event);
        if (typeof event === "string") {
          this.eventListeners.delete(event);
        }
      }
      return this;
    }

    listenerCount(event: string | symbol): number {
      return this.eventEmitter.listenerCount(event);
    }

    emitWithLogging(event: string, ...args: unknown[]): boolean {
      this.logDebug(`Emitting event: ${event} (${this.listenerCount(event)} listeners)`);
      return this.emit(event, ...args);
    }

    getEventStats(): Record<string, number> {
      return Object.fromEntries(this.eventListeners);
    }

    public setupEventTracking(): void {
      this.eventEmitter.on("error", (error: Error) => {
        this.logError(error, "EventEmitter");
      });

      this.eventEmitter.setMaxListeners(20);
    }

    public trackListener(event: string): void {
      const current = this.eventListeners.get(event) || 0;
      this.eventListeners.set(event, current + 1);
    }

    public untrackListener(event: string): void {
      const current = this.eventListeners.get(event) || 0;
      if (current > 1) {
        this.eventListeners.set(event, current - 1);
      } else {
        this.eventListeners.delete(event);
      }
    }
  }
  return EventsMixin;
}
