/**
 * useDataHandler - re-render a component whenever a handler changes.
 */

import { useLayoutEffect, useReducer } from "react";
import type { DataHandler } from "../core/dataHandler";

/**
 * Subscribe the calling component to `handler`.
 *
 * The subscription is made in a layout effect and released on unmount or
 * when `handler` changes. A change that lands between render and
 * subscription triggers an immediate re-render.
 *
 * @example
 * ```tsx
 * function PostCount({ posts }: { posts: DataHandler<Post[]> }) {
 *   useDataHandler(posts);
 *   return <span>{posts.data?.length ?? 0}</span>;
 * }
 * ```
 */
export function useDataHandler<T>(handler: DataHandler<T>): DataHandler<T> {
  const [, forceUpdate] = useReducer((x: number) => x + 1, 0);
  const renderedVersion = handler.version;

  useLayoutEffect(() => {
    const unsubscribe = handler.subscribe(() => forceUpdate());

    if (handler.version !== renderedVersion) {
      forceUpdate();
    }

    return unsubscribe;
    // renderedVersion is only read once per subscription
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [handler]);

  return handler;
}
