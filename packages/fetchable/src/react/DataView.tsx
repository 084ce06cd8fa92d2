/**
 * Component forms of the dispatch helpers.
 *
 * Each view subscribes to its handler and renders the branch selected by
 * the dispatcher in scope (React target + injected or global renderers).
 */

import { Fragment, type ReactNode } from "react";
import type {
  Branches,
  ListBranches,
  ResolveOptions,
  SequenceBranches,
} from "../types";
import type { DataHandler } from "../core/dataHandler";
import { hasPayload } from "../utils/hasPayload";
import { useDataHandler } from "./useDataHandler";
import { useDispatcher } from "./context";

export interface DataViewProps<T> extends Branches<T, ReactNode>, ResolveOptions {
  handler: DataHandler<T>;
}

/**
 * @example
 * ```tsx
 * <DataView
 *   handler={profile}
 *   onSuccess={(user) => <ProfileCard user={user} />}
 *   onError={(message) => <Retry message={message} />}
 * />
 * ```
 */
export function DataView<T>({
  handler,
  enabled,
  useGlobalFallback,
  onSuccess,
  onLoading,
  onError,
  onEmpty,
}: DataViewProps<T>) {
  useDataHandler(handler);
  const dispatcher = useDispatcher();

  return (
    <>
      {dispatcher.resolve(
        handler,
        { onSuccess, onLoading, onError, onEmpty },
        { enabled, useGlobalFallback }
      )}
    </>
  );
}

export interface DataListViewProps<T extends readonly unknown[]>
  extends ListBranches<T, ReactNode>,
    ResolveOptions {
  handler: DataHandler<T>;
}

/**
 * Like DataView, but an empty list payload renders as the empty state.
 */
export function DataListView<T extends readonly unknown[]>({
  handler,
  enabled,
  useGlobalFallback,
  onSuccess,
  onLoading,
  onError,
  onEmpty,
  onEmptyList,
  emptyListMessage,
}: DataListViewProps<T>) {
  useDataHandler(handler);
  const dispatcher = useDispatcher();

  return (
    <>
      {dispatcher.resolveList(
        handler,
        {
          onSuccess,
          onLoading,
          onError,
          onEmpty,
          onEmptyList,
          emptyListMessage,
        },
        { enabled, useGlobalFallback }
      )}
    </>
  );
}

export interface DataSequenceViewProps<T>
  extends SequenceBranches<T, ReactNode>,
    ResolveOptions {
  handler: DataHandler<T>;
  /** Number of leading items to render; renders all when omitted */
  limit?: number;
  /** Key for the item at `index` (defaults to the index) */
  itemKey?: (data: T, index: number) => string | number;
}

/**
 * Renders items of the payload one by one. Only the first `limit` items
 * are built, which lets incremental lists grow the window as they scroll.
 */
export function DataSequenceView<T>({
  handler,
  enabled,
  useGlobalFallback,
  limit,
  itemKey,
  itemCount,
  itemBuilder,
  onLoading,
  onError,
  onEmpty,
}: DataSequenceViewProps<T>) {
  useDataHandler(handler);
  const dispatcher = useDispatcher();

  const sequence = dispatcher.resolveSequence(
    handler,
    { itemCount, itemBuilder, onLoading, onError, onEmpty },
    { enabled, useGlobalFallback }
  );
  const count =
    limit === undefined ? sequence.length : Math.min(limit, sequence.length);
  const data = handler.data;
  const isItems =
    hasPayload(data) && (enabled === false || handler.state === "success");

  const items: ReactNode[] = [];
  for (let i = 0; i < count; i++) {
    const key = itemKey && isItems ? itemKey(data, i) : i;
    items.push(<Fragment key={key}>{sequence.at(i)}</Fragment>);
  }

  return <>{items}</>;
}
