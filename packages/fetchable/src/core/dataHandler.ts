/**
 * DataHandler - observable state of an async data fetch.
 *
 * A handler is always in exactly one of four states:
 * - `loading`: a fetch is in flight
 * - `success`: `data` holds the payload
 * - `error`: `errorMessage` holds the failure text
 * - `empty`: `errorMessage` holds the explanatory text (may be blank)
 *
 * Mutators compare the next state with the current one and only notify
 * subscribers when something actually changed, so a UI layer can redraw
 * on real transitions only. `reset()` is the one exception: it always
 * notifies.
 *
 * @example
 * ```ts
 * const posts = new DataHandler<Post[]>();
 *
 * posts.subscribe(() => render());
 *
 * await posts.refresh(() => api.getPosts());
 * posts.hasSuccess; // true
 * ```
 */

import type {
  DataHandlerOptions,
  DataSnapshot,
  DataSource,
  DataState,
  Fetcher,
  Listener,
  StaleRefreshPolicy,
} from "../types";
import { emitter } from "../emitter";
import { resolveEquality } from "./equality";
import { formatError } from "../utils/formatError";
import { hasPayload } from "../utils/hasPayload";
import { NotificationLoopError } from "../errors";
import { dev } from "../dev";

export const DEFAULT_EMPTY_MESSAGE = "No data available";

/** Max re-entrant notification depth before a loop is assumed */
export const MAX_NOTIFY_DEPTH = 100;

export class DataHandler<T> implements DataSource<T> {
  readonly name: string;

  private _state: DataState;
  private _data: T | undefined;
  private _message = "";
  private _version = 0;
  private _snapshot: DataSnapshot<T> | undefined;
  private _disposed = false;

  /** Incremented by each refresh(); used by the "discard" policy */
  private _generation = 0;
  private _notifyDepth = 0;

  private readonly _changed = emitter();
  private readonly _equal: (a: T, b: T) => boolean;
  private readonly _formatError: (error: unknown) => string;
  private readonly _staleRefresh: StaleRefreshPolicy;

  constructor(initial?: T, options: DataHandlerOptions<T> = {}) {
    this.name = options.name ?? "dataHandler";
    this._equal = resolveEquality(options.equality);
    this._formatError = options.formatError ?? formatError;
    this._staleRefresh = options.staleRefresh ?? "keep";

    if (hasPayload(initial)) {
      this._state = "success";
      this._data = initial;
    } else {
      this._state = "empty";
      this._data = undefined;
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get state(): DataState {
    return this._state;
  }

  /** Payload, present only in the success state */
  get data(): T | undefined {
    return this._data;
  }

  /** Error text, or the empty-state text. Blank in loading/success. */
  get errorMessage(): string {
    return this._message;
  }

  get isLoading(): boolean {
    return this._state === "loading";
  }

  get hasError(): boolean {
    return this._state === "error";
  }

  get hasSuccess(): boolean {
    return this._state === "success" && hasPayload(this._data);
  }

  get isEmpty(): boolean {
    return this._state === "empty";
  }

  /** Incremented on every accepted mutation */
  get version(): number {
    return this._version;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /**
   * Frozen record of the current state, cached until the next change.
   * Stable identity makes it usable as an external store snapshot.
   */
  snapshot = (): DataSnapshot<T> => {
    if (!this._snapshot) {
      this._snapshot = Object.freeze({
        state: this._state,
        data: this._data,
        message: this._message,
        version: this._version,
      });
    }
    return this._snapshot;
  };

  // ===========================================================================
  // Mutators
  // ===========================================================================

  startLoading = (): void => {
    if (this._rejectDisposed("startLoading")) return;
    if (this._state === "loading") return;
    this._commit("loading", undefined, "");
  };

  succeed = (value: T): void => {
    if (this._rejectDisposed("succeed")) return;
    if (this._state === "success" && this._sameData(value)) return;
    this._commit("success", hasPayload(value) ? value : undefined, "");
  };

  fail = (message: string): void => {
    if (this._rejectDisposed("fail")) return;
    if (this._state === "error" && this._message === message) return;
    this._commit("error", undefined, message);
  };

  setEmpty = (message: string = DEFAULT_EMPTY_MESSAGE): void => {
    if (this._rejectDisposed("setEmpty")) return;
    if (this._state === "empty" && this._message === message) return;
    this._commit("empty", undefined, message);
  };

  /**
   * Replace the payload. Unlike `succeed()`, only the payload is compared:
   * an equal payload is ignored even when the handler is not in success.
   */
  setPayload = (value: T): void => {
    if (this._rejectDisposed("setPayload")) return;
    if (this._sameData(value)) return;
    this._commit("success", hasPayload(value) ? value : undefined, "");
  };

  /**
   * Back to an empty state with no message. Always notifies.
   */
  reset = (): void => {
    if (this._rejectDisposed("reset")) return;
    this._commit("empty", undefined, "");
  };

  /**
   * Run `fetch` and mirror its outcome.
   *
   * Enters loading, then succeeds with the resolved value or fails with the
   * formatted rejection. Never rejects: listener errors raised while
   * refresh notifies are reported through `dev.error`.
   *
   * Overlapping calls follow the `staleRefresh` option: with `"keep"` the
   * last one to settle wins, with `"discard"` only the latest call applies.
   */
  refresh = async (fetch: Fetcher<T>): Promise<void> => {
    const generation = ++this._generation;

    if (this._disposed) return;
    this._notifyFromRefresh("startLoading", () => this.startLoading());

    let result: T;
    try {
      result = await fetch();
    } catch (error) {
      if (this._accepts(generation)) {
        this._notifyFromRefresh("fail", () =>
          this.fail(this._formatError(error))
        );
      }
      return;
    }

    if (this._accepts(generation)) {
      const value = result;
      this._notifyFromRefresh("succeed", () => this.succeed(value));
    }
  };

  // ===========================================================================
  // Subscription
  // ===========================================================================

  /**
   * Subscribe to changes. Listeners receive no arguments.
   *
   * @returns Unsubscribe function (idempotent)
   */
  subscribe = (listener: Listener): VoidFunction => {
    if (this._disposed) {
      dev.warn(`${this.name}: subscribe() called on a disposed handler`);
      return () => {};
    }
    return this._changed.on(listener);
  };

  unsubscribe = (listener: Listener): void => {
    this._changed.off(listener);
  };

  /** Number of active subscribers */
  get listenerCount(): number {
    return this._changed.size;
  }

  /**
   * Release all subscribers. Further mutations are ignored and pending
   * refreshes settle without touching the state.
   */
  dispose = (): void => {
    if (this._disposed) return;
    this._disposed = true;
    this._changed.clear();
  };

  // ===========================================================================
  // Internals
  // ===========================================================================

  private _sameData(value: T): boolean {
    const current = this._data;
    if (!hasPayload(current)) return !hasPayload(value);
    if (!hasPayload(value)) return false;
    return this._equal(current, value);
  }

  private _notifyFromRefresh(operation: string, mutate: () => void) {
    try {
      mutate();
    } catch (error) {
      dev.error(
        `${this.name}: a listener threw during refresh ${operation}()`,
        error
      );
    }
  }

  private _accepts(generation: number): boolean {
    if (this._disposed) return false;
    if (this._staleRefresh === "discard" && generation !== this._generation) {
      dev.log(`${this.name}: discarded result of a superseded refresh`);
      return false;
    }
    return true;
  }

  private _rejectDisposed(operation: string): boolean {
    if (!this._disposed) return false;
    dev.warn(`${this.name}: ${operation}() called on a disposed handler`);
    return true;
  }

  private _commit(state: DataState, data: T | undefined, message: string) {
    this._state = state;
    this._data = data;
    this._message = message;
    this._version++;
    this._snapshot = undefined;

    if (this._notifyDepth >= MAX_NOTIFY_DEPTH) {
      throw new NotificationLoopError(this.name, this._notifyDepth);
    }

    this._notifyDepth++;
    try {
      this._changed.emit();
    } finally {
      this._notifyDepth--;
    }
  }
}
