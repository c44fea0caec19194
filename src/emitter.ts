// ---------------------------------------------------------------------------
// M3: Type-safe event emitter
// ---------------------------------------------------------------------------

type Handler<T> = (data: T) => void;

/** A minimal, type-safe event emitter. */
export interface Emitter<Events extends object> {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): () => void;

  /** Unsubscribe a handler from an event. */
  off<K extends keyof Events>(event: K, handler: Handler<Events[K]>): void;

  /**
   * Call every handler of `event` synchronously, in subscription order.
   * If any handler throws, the rest still run and the first error is rethrown.
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): void;

  /** Remove all listeners (optionally for a specific event). */
  clear(event?: keyof Events): void;

  /** Whether anything is listening to `event`. */
  has(event: keyof Events): boolean;
}

/**
 * Create an emitter keyed by the properties of `Events`.
 *
 * ```ts
 * const emitter = createEmitter<{ tick: number }>();
 * const unsub = emitter.on("tick", (n) => console.log(n));
 * emitter.emit("tick", 1);
 * unsub();
 * ```
 */
export function createEmitter<Events extends object>(): Emitter<Events> {
  const listeners: { [K in keyof Events]?: Set<Handler<Events[K]>> } = {};

  function off<K extends keyof Events>(event: K, handler: Handler<Events[K]>): void {
    const set = listeners[event];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) delete listeners[event];
  }

  return {
    on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): () => void {
      const set = listeners[event] ?? new Set<Handler<Events[K]>>();
      set.add(handler);
      listeners[event] = set;
      return () => off(event, handler);
    },

    off,

    emit<K extends keyof Events>(event: K, data: Events[K]): void {
      const set = listeners[event];
      if (!set) return;
      // Copy so handlers may unsubscribe while being called.
      let failure: { error: unknown } | null = null;
      for (const handler of [...set]) {
        try {
          handler(data);
        } catch (error) {
          // Every handler still runs; the first error is rethrown afterwards.
          failure ??= { error };
        }
      }
      if (failure !== null) throw failure.error;
    },

    clear(event?: keyof Events): void {
      if (event !== undefined) {
        delete listeners[event];
        return;
      }
      for (const key of Object.keys(listeners)) {
        Reflect.deleteProperty(listeners, key);
      }
    },

    has(event: keyof Events): boolean {
      return listeners[event] !== undefined;
    },
  };
}
