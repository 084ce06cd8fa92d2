/**
 * Renderer registry - app-wide default renderers for loading, error and
 * empty states. Written rarely (usually once at bootstrap), read by the
 * dispatcher on every render that has no per-call branch.
 */

import type {
  LoadingRenderer,
  MessageRenderer,
  RendererRegistry,
  Renderers,
} from "../types";

/**
 * Create a renderer registry.
 *
 * @example
 * ```ts
 * const renderers = rendererRegistry<string>({
 *   loading: () => "Please wait...",
 * });
 *
 * renderers.setAll({ error: (message) => `Oops: ${message}` });
 * renderers.reset(); // all cleared
 * ```
 */
export function rendererRegistry<R>(
  initial?: Renderers<R>
): RendererRegistry<R> {
  let loading: LoadingRenderer<R> | undefined = initial?.loading;
  let error: MessageRenderer<R> | undefined = initial?.error;
  let empty: MessageRenderer<R> | undefined = initial?.empty;

  return {
    get loading() {
      return loading;
    },
    get error() {
      return error;
    },
    get empty() {
      return empty;
    },
    setLoading(renderer) {
      loading = renderer;
    },
    setError(renderer) {
      error = renderer;
    },
    setEmpty(renderer) {
      empty = renderer;
    },
    setAll(renderers) {
      if (renderers.loading) loading = renderers.loading;
      if (renderers.error) error = renderers.error;
      if (renderers.empty) empty = renderers.empty;
    },
    reset() {
      loading = undefined;
      error = undefined;
      empty = undefined;
    },
  };
}
