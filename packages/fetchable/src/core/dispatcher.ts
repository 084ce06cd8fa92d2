/**
 * createDispatcher - selects what to render for the current data state.
 *
 * Branch resolution order for loading/error/empty:
 * 1. The per-call branch (`onLoading`, `onError`, `onEmpty`)
 * 2. The registry renderer, when `useGlobalFallback` is true
 * 3. The render target's built-in default
 *
 * The dispatcher never mutates the data source; it only reads it.
 *
 * @example
 * ```ts
 * const dispatcher = createDispatcher({ target: textTarget, renderers });
 *
 * dispatcher.resolve(posts, {
 *   onSuccess: (items) => `${items.length} posts`,
 *   onError: (message) => `Failed: ${message}`,
 * });
 * ```
 */

import type {
  Branches,
  DataSource,
  Dispatcher,
  DispatcherConfig,
  ListBranches,
  ManyBranches,
  RenderSequence,
  ResolveOptions,
  SequenceBranches,
} from "../types";
import { DEFAULT_EMPTY_MESSAGE } from "./dataHandler";
import { InvalidItemCountError, SequenceIndexError } from "../errors";
import { hasPayload } from "../utils/hasPayload";

/**
 * Create a lazy sequence whose items are built on access.
 */
export function lazySequence<R>(
  length: number,
  build: (index: number) => R
): RenderSequence<R> {
  return {
    length,
    at(index: number): R {
      if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw new SequenceIndexError(index, length);
      }
      return build(index);
    },
    *[Symbol.iterator]() {
      for (let i = 0; i < length; i++) {
        yield build(i);
      }
    },
  };
}

export function createDispatcher<R>(
  config: DispatcherConfig<R>
): Dispatcher<R> {
  const { target, renderers } = config;

  const renderLoading = (
    onLoading: (() => R) | undefined,
    useGlobalFallback: boolean
  ): R => {
    if (onLoading) return onLoading();
    const fallback = useGlobalFallback ? renderers?.loading : undefined;
    return fallback ? fallback() : target.loading();
  };

  const renderError = (
    onError: ((message: string) => R) | undefined,
    message: string,
    useGlobalFallback: boolean
  ): R => {
    if (onError) return onError(message);
    const fallback = useGlobalFallback ? renderers?.error : undefined;
    return fallback ? fallback(message) : target.error(message);
  };

  const renderEmpty = (
    onEmpty: ((message: string) => R) | undefined,
    message: string,
    useGlobalFallback: boolean
  ): R => {
    if (onEmpty) return onEmpty(message);
    const fallback = useGlobalFallback ? renderers?.empty : undefined;
    if (fallback) return fallback(message);
    return target.empty(message.trim() ? message : DEFAULT_EMPTY_MESSAGE);
  };

  const resolve = <T>(
    source: DataSource<T>,
    branches: Branches<T, R>,
    options: ResolveOptions = {}
  ): R => {
    const { enabled = true, useGlobalFallback = true } = options;
    const data = source.data;

    // escape hatch: bypass the state machine
    if (!enabled && hasPayload(data)) {
      return branches.onSuccess ? branches.onSuccess(data) : target.nothing();
    }

    switch (source.state) {
      case "loading":
        return renderLoading(branches.onLoading, useGlobalFallback);
      case "success":
        // never call onSuccess without a payload
        return hasPayload(data) && branches.onSuccess
          ? branches.onSuccess(data)
          : target.nothing();
      case "error":
        return renderError(
          branches.onError,
          source.errorMessage,
          useGlobalFallback
        );
      case "empty":
        return renderEmpty(
          branches.onEmpty,
          source.errorMessage,
          useGlobalFallback
        );
    }
  };

  const resolveList = <T extends readonly unknown[]>(
    source: DataSource<T>,
    branches: ListBranches<T, R>,
    options: ResolveOptions = {}
  ): R => {
    const { enabled = true, useGlobalFallback = true } = options;
    const data = source.data;

    if (
      enabled &&
      source.state === "success" &&
      hasPayload(data) &&
      data.length === 0
    ) {
      const message = branches.emptyListMessage ?? source.errorMessage;
      if (branches.onEmptyList) return branches.onEmptyList(message);
      return renderEmpty(branches.onEmpty, message, useGlobalFallback);
    }

    return resolve(source, branches, options);
  };

  const resolveSequence = <T>(
    source: DataSource<T>,
    branches: SequenceBranches<T, R>,
    options: ResolveOptions = {}
  ): RenderSequence<R> => {
    const { enabled = true } = options;
    const data = source.data;

    if (hasPayload(data) && (!enabled || source.state === "success")) {
      const { itemCount, itemBuilder } = branches;
      const count =
        typeof itemCount === "function"
          ? itemCount(data)
          : itemCount ?? (Array.isArray(data) ? data.length : 1);

      if (!Number.isInteger(count) || count < 0) {
        throw new InvalidItemCountError(count);
      }

      return lazySequence(count, (index) => itemBuilder(data, index));
    }

    if (source.state === "success") {
      return lazySequence(0, () => target.nothing());
    }

    return lazySequence(1, () =>
      resolve(
        source,
        {
          onLoading: branches.onLoading,
          onError: branches.onError,
          onEmpty: branches.onEmpty,
        },
        options
      )
    );
  };

  const resolveMany = <T>(
    source: DataSource<T>,
    branches: ManyBranches<T, R>,
    options: ResolveOptions = {}
  ): R[] => {
    const { enabled = true } = options;
    const data = source.data;

    if (hasPayload(data) && (!enabled || source.state === "success")) {
      return branches.onSuccess ? branches.onSuccess(data) : [];
    }

    if (source.state === "success") return [];

    return [
      resolve(
        source,
        {
          onLoading: branches.onLoading,
          onError: branches.onError,
          onEmpty: branches.onEmpty,
        },
        options
      ),
    ];
  };

  return {
    target,
    renderers,
    resolve,
    resolveList,
    resolveSequence,
    resolveMany,
  };
}
