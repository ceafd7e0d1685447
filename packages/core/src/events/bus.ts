// ============================================
// Event Bus
// Typed run events described by zod schemas
// ============================================

import type { z } from "zod";

/**
 * A named event and the schema of its payload.
 */
export interface EventDefinition<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

/**
 * @example
 * ```typescript
 * const phaseStart = defineEvent("phase:start", z.object({
 *   phaseId: z.string(),
 *   iteration: z.number(),
 * }));
 * ```
 */
export function defineEvent<T>(name: string, schema: z.ZodType<T>): EventDefinition<T> {
  return { name, schema };
}

type Handler<T> = (payload: T) => void;

/** Sees every event; used for tracing */
export type AnyEventListener = (eventName: string, payload: unknown) => void;

export interface EventBusOptions {
  /** Validate every payload against its schema before delivery */
  debug?: boolean;
  /**
   * Receives errors thrown by handlers. Without it the first error is
   * rethrown from `emit` once every handler has run.
   */
  onHandlerError?: (error: unknown, eventName: string) => void;
}

/**
 * Synchronous, typed publish/subscribe for orchestration events.
 *
 * Handlers run in subscription order. Handlers added while an event is
 * being delivered only see later events. A throwing handler does not stop
 * the others.
 *
 * @example
 * ```typescript
 * const bus = new EventBus({ debug: true });
 *
 * const unsubscribe = bus.on(Events.phaseEnd, (payload) => {
 *   console.log(`${payload.phaseId}#${payload.iteration}: ${payload.status}`);
 * });
 *
 * await orchestrator.run(definition, { eventBus: bus });
 * unsubscribe();
 * ```
 */
export class EventBus {
  private readonly handlers = new Map<string, Set<Handler<unknown>>>();
  private readonly taps = new Set<AnyEventListener>();
  private readonly debug: boolean;
  private readonly onHandlerError?: (error: unknown, eventName: string) => void;

  constructor(options: EventBusOptions = {}) {
    this.debug = options.debug ?? false;
    this.onHandlerError = options.onHandlerError;
  }

  /**
   * @returns Unsubscribe function
   */
  on<T>(event: EventDefinition<T>, handler: Handler<T>): () => void {
    let handlers = this.handlers.get(event.name);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event.name, handlers);
    }
    handlers.add(handler as Handler<unknown>);
    return () => this.off(event, handler);
  }

  once<T>(event: EventDefinition<T>, handler: Handler<T>): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  off<T>(event: EventDefinition<T>, handler: Handler<T>): void {
    const handlers = this.handlers.get(event.name);
    if (!handlers) return;
    handlers.delete(handler as Handler<unknown>);
    if (handlers.size === 0) {
      this.handlers.delete(event.name);
    }
  }

  /**
   * Subscribes to every event, after the typed handlers of each.
   */
  onAny(listener: AnyEventListener): () => void {
    this.taps.add(listener);
    return () => {
      this.taps.delete(listener);
    };
  }

  /**
   * Delivers `payload` to the handlers of `event`, then to `onAny` listeners.
   *
   * @returns Number of listeners called
   * @throws Error in debug mode when the payload does not match the schema
   */
  emit<T>(event: EventDefinition<T>, payload: T): number {
    if (this.debug) {
      const result = event.schema.safeParse(payload);
      if (!result.success) {
        throw new Error(`Invalid payload for event "${event.name}": ${result.error.message}`);
      }
    }

    const listeners: Array<() => void> = [];
    for (const handler of this.handlers.get(event.name) ?? []) {
      listeners.push(() => handler(payload));
    }
    for (const tap of this.taps) {
      listeners.push(() => tap(event.name, payload));
    }

    let firstError: { error: unknown } | undefined;
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        if (this.onHandlerError) {
          this.onHandlerError(error, event.name);
        } else {
          firstError ??= { error };
        }
      }
    }
    if (firstError) {
      throw firstError.error;
    }

    return listeners.length;
  }

  listenerCount<T>(event: EventDefinition<T>): number {
    return this.handlers.get(event.name)?.size ?? 0;
  }

  hasListeners<T>(event: EventDefinition<T>): boolean {
    return this.listenerCount(event) > 0;
  }

  /**
   * Removes the handlers of one event, or every handler and `onAny`
   * listener when called without one.
   */
  clear<T>(event?: EventDefinition<T>): void {
    if (event) {
      this.handlers.delete(event.name);
      return;
    }
    this.handlers.clear();
    this.taps.clear();
  }
}
