/**
 * useLocalDataHandler - Creates a component-scoped data handler.
 *
 * The handler is:
 * - Created once per component instance
 * - Disposed when the component unmounts, releasing its subscribers
 *
 * Works correctly with React StrictMode which:
 * - Renders twice in development
 * - Runs effect → cleanup → effect again
 *
 * The controller pattern handles this by:
 * - Using commit/uncommit to track if the effect is active
 * - Deferring disposal via microtask to survive StrictMode's cleanup-then-rerun
 */

import { useLayoutEffect, useReducer, useRef } from "react";
import { DataHandler } from "../core/dataHandler";
import type { DataHandlerOptions } from "../types";

/**
 * Create a component-local data handler.
 *
 * `initial` and `options` are read on first render only.
 *
 * @example
 * ```tsx
 * function Posts() {
 *   const posts = useLocalDataHandler<Post[]>();
 *
 *   useEffect(() => {
 *     void posts.refresh(fetchPosts);
 *   }, [posts]);
 *
 *   return <DataListView handler={posts} onSuccess={renderPosts} />;
 * }
 * ```
 */
export function useLocalDataHandler<T>(
  initial?: T,
  options?: DataHandlerOptions<T>
): DataHandler<T> {
  const [, forceUpdate] = useReducer((x: number) => x + 1, 0);

  const controllerRef = useRef<LocalHandlerController<T> | null>(null);
  if (!controllerRef.current) {
    controllerRef.current = new LocalHandlerController(
      () => new DataHandler(initial, options)
    );
  }
  const controller = controllerRef.current;

  const handler = controller.getHandler();
  const renderedVersion = handler.version;

  useLayoutEffect(() => {
    // Mark as committed - prevents disposal during StrictMode remount
    controller.commit();

    const unsubscribe = handler.subscribe(() => forceUpdate());
    if (handler.version !== renderedVersion) {
      forceUpdate();
    }

    return () => {
      unsubscribe();
      // Schedules a deferred disposal check
      controller.uncommit();
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [controller, handler]);

  return handler;
}

/**
 * Controller manages handler lifecycle with StrictMode support.
 *
 * - Handler survives StrictMode's cleanup-then-rerun cycle
 * - Handler is disposed on actual unmount
 * - Render-only instances (no effect commit) are cleaned up
 */
class LocalHandlerController<T> {
  /** Whether the effect has committed (is active) */
  private _committed = false;

  private _handler: DataHandler<T> | undefined;

  constructor(private readonly _create: () => DataHandler<T>) {}

  dispose = () => {
    this._handler?.dispose();
  };

  /**
   * The microtask runs after StrictMode's synchronous re-commit, so the
   * handler survives; on real unmount nothing re-commits and it is disposed.
   */
  private _disposeIfUnused = () => {
    if (this._committed || this._handler?.disposed) return;

    void Promise.resolve().then(() => {
      if (!this._committed) {
        this.dispose();
      }
    });
  };

  getHandler = (): DataHandler<T> => {
    if (this._handler) return this._handler;

    this._handler = this._create();

    // Schedule cleanup if the effect never commits (render-only)
    this._disposeIfUnused();

    return this._handler;
  };

  commit = () => {
    this._committed = true;
  };

  uncommit = () => {
    this._committed = false;
    this._disposeIfUnused();
  };
}
