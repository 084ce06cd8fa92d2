/**
 * Event emitter interface for pub/sub pattern.
 *
 * @template TArgs - Arguments passed to listeners (none by default)
 */
export interface Emitter<TArgs extends unknown[] = []> {
  /**
   * @returns Unsubscribe function (idempotent - safe to call multiple times)
   */
  on(listener: (...args: TArgs) => void): VoidFunction;

  /** Remove a listener by reference. No-op if it was never added. */
  off(listener: (...args: TArgs) => void): void;

  /** Call every registered listener with exactly `args`. */
  emit(...args: TArgs): void;

  clear(): void;

  readonly size: number;
}

/**
 * Creates an event emitter for managing and notifying listeners.
 *
 * Data handlers use it to fan out change notifications. Adding the same
 * listener twice registers it once.
 *
 * @example
 * ```ts
 * const changed = emitter();
 *
 * const unsubscribe = changed.on(() => {
 *   console.log("changed");
 * });
 *
 * changed.emit(); // Logs: "changed"
 * unsubscribe();
 * ```
 */
export function emitter<TArgs extends unknown[] = []>(): Emitter<TArgs> {
  const listeners = new Set<(...args: TArgs) => void>();

  return {
    get size() {
      return listeners.size;
    },
    on(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    off(listener) {
      listeners.delete(listener);
    },
    // listeners added or removed during emission only affect the next emit
    emit(...args) {
      const copy = Array.from(listeners);
      const len = copy.length;
      for (let i = 0; i < len; i++) {
        copy[i](...args);
      }
    },
    clear() {
      listeners.clear();
    },
  };
}
