import { thermostatLogger } from './ThermostatLogger';

export type EventHandler<P> = (payload: P) => void;

type HandlerTable<M> = { [E in keyof M]?: Set<EventHandler<M[E]>> };

// Type-safe event emitter keyed by an event payload map
export class TypedEventEmitter<M extends object> {
  private handlers: HandlerTable<M> = {};

  // Register event handler, returns an unsubscribe function
  on<E extends keyof M>(event: E, handler: EventHandler<M[E]>): () => void {
    const existing = this.handlers[event];
    if (existing) {
      existing.add(handler);
    } else {
      const created = new Set<EventHandler<M[E]>>();
      created.add(handler);
      this.handlers[event] = created;
    }
    return () => this.off(event, handler);
  }

  // Remove event handler
  off<E extends keyof M>(event: E, handler: EventHandler<M[E]>): void {
    const handlers = this.handlers[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  // Register one-time event handler
  once<E extends keyof M>(event: E, handler: EventHandler<M[E]>): () => void {
    const wrappedHandler: EventHandler<M[E]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    return this.on(event, wrappedHandler);
  }

  // Emit event with payload
  emit<E extends keyof M>(event: E, payload: M[E]): void {
    const handlers = this.handlers[event];
    if (!handlers) return;
    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        thermostatLogger.error(`Error in event handler for ${String(event)}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  // Remove all handlers
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  // Get listener count
  listenerCount(event: keyof M): number {
    return this.handlers[event]?.size ?? 0;
  }
}
