/**
 * Fetchable - Observable async data state with declarative rendering
 *
 * Core type definitions for the library.
 */

// =============================================================================
// Listeners
// =============================================================================

/** Change listener. Called with no arguments. */
export type Listener = () => void;

// =============================================================================
// Equality
// =============================================================================

export type EqualityShorthand =
  | "strict" // Object.is
  | "shallow" // 1 level: compare keys/length, Object.is per item
  | "deep";

/**
 * Equality strategies for payload change detection.
 */
export type Equality<T = unknown> =
  | EqualityShorthand
  | ((a: T, b: T) => boolean);

// =============================================================================
// Data State
// =============================================================================

/**
 * Lifecycle phase of a data fetch. Exactly one holds at a time.
 */
export type DataState = "loading" | "success" | "error" | "empty";

/**
 * Read-only view of a data handler, consumed by the dispatch helpers.
 */
export interface DataSource<T> {
  readonly state: DataState;
  readonly data: T | undefined;
  readonly errorMessage: string;
}

/**
 * Immutable record of a handler at a given version.
 */
export interface DataSnapshot<T> {
  readonly state: DataState;
  readonly data: T | undefined;
  readonly message: string;
  readonly version: number;
}

/**
 * How overlapping `refresh()` calls settle.
 *
 * - `"keep"`: every completion is applied, the last one to settle wins
 * - `"discard"`: completions of superseded refreshes are dropped
 */
export type StaleRefreshPolicy = "keep" | "discard";

export interface DataHandlerOptions<T> {
  /** Label used in development log messages */
  name?: string;

  /** Payload comparison for `succeed()` and `setPayload()` (default: "strict") */
  equality?: Equality<T>;

  /** Converts a rejected fetch into the error message */
  formatError?: (error: unknown) => string;

  /** @default "keep" */
  staleRefresh?: StaleRefreshPolicy;
}

/**
 * Async producer passed to `refresh()`.
 */
export type Fetcher<T> = () => PromiseLike<T>;

// =============================================================================
// Rendering
// =============================================================================

export type LoadingRenderer<R> = () => R;

export type MessageRenderer<R> = (message: string) => R;

/**
 * Built-in defaults of a render target. Each UI target (React, terminal,
 * web component) supplies its own concrete renderable type `R`.
 */
export interface RenderTarget<R> {
  loading(): R;
  error(message: string): R;
  empty(message: string): R;
  /** Render nothing (success without payload, missing success branch) */
  nothing(): R;
}

/**
 * App-wide default renderers, consulted when a branch is not supplied.
 */
export interface Renderers<R> {
  loading?: LoadingRenderer<R>;
  error?: MessageRenderer<R>;
  empty?: MessageRenderer<R>;
}

export interface RendererRegistry<R> {
  readonly loading: LoadingRenderer<R> | undefined;
  readonly error: MessageRenderer<R> | undefined;
  readonly empty: MessageRenderer<R> | undefined;

  setLoading(renderer: LoadingRenderer<R> | undefined): void;
  setError(renderer: MessageRenderer<R> | undefined): void;
  setEmpty(renderer: MessageRenderer<R> | undefined): void;

  /** Set only the provided, non-undefined renderers */
  setAll(renderers: Renderers<R>): void;

  /** Clear all renderers */
  reset(): void;
}

export interface ResolveOptions {
  /**
   * When false and a payload is present, always render the success branch.
   * @default true
   */
  enabled?: boolean;

  /**
   * Consult the renderer registry before the target's built-in defaults.
   * @default true
   */
  useGlobalFallback?: boolean;
}

export interface Branches<T, R> {
  onSuccess?: (data: T) => R;
  onLoading?: () => R;
  onError?: (message: string) => R;
  onEmpty?: (message: string) => R;
}

export interface ListBranches<T extends readonly unknown[], R>
  extends Branches<T, R> {
  /** Rendered when the payload is an empty list; wins over `onEmpty` */
  onEmptyList?: (message: string) => R;
  /** Message for the empty-list case; wins over the handler's message */
  emptyListMessage?: string;
}

export interface SequenceBranches<T, R> extends Omit<Branches<T, R>, "onSuccess"> {
  /**
   * Number of items, or a function of the payload.
   * Defaults to the payload length for arrays and 1 otherwise.
   */
  itemCount?: number | ((data: T) => number);
  itemBuilder: (data: T, index: number) => R;
}

export interface ManyBranches<T, R> extends Omit<Branches<T, R>, "onSuccess"> {
  onSuccess?: (data: T) => R[];
}

/**
 * Lazily rendered, finite, position-indexed sequence of renderables.
 * Items are built on access, never ahead of time.
 */
export interface RenderSequence<R> extends Iterable<R> {
  readonly length: number;
  at(index: number): R;
}

export interface DispatcherConfig<R> {
  target: RenderTarget<R>;
  renderers?: RendererRegistry<R>;
}

export interface Dispatcher<R> {
  readonly target: RenderTarget<R>;
  readonly renderers: RendererRegistry<R> | undefined;

  resolve<T>(
    source: DataSource<T>,
    branches: Branches<T, R>,
    options?: ResolveOptions
  ): R;

  resolveList<T extends readonly unknown[]>(
    source: DataSource<T>,
    branches: ListBranches<T, R>,
    options?: ResolveOptions
  ): R;

  resolveSequence<T>(
    source: DataSource<T>,
    branches: SequenceBranches<T, R>,
    options?: ResolveOptions
  ): RenderSequence<R>;

  resolveMany<T>(
    source: DataSource<T>,
    branches: ManyBranches<T, R>,
    options?: ResolveOptions
  ): R[];
}
