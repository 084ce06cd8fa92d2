/**
 * Fetchable - Observable async data state with declarative rendering
 *
 * @packageDocumentation
 */

// Data handler
export {
  DataHandler,
  DEFAULT_EMPTY_MESSAGE,
  MAX_NOTIFY_DEPTH,
} from "./core/dataHandler";

// Dispatching
export { createDispatcher, lazySequence } from "./core/dispatcher";
export { rendererRegistry } from "./core/renderers";
export { textTarget, LOADING_TEXT } from "./core/textTarget";

// Equality
export {
  strictEqual,
  shallowEqual,
  deepEqual,
  resolveEquality,
} from "./core/equality";

// Events
export { emitter, type Emitter } from "./emitter";

// Utilities
export { formatError, UNKNOWN_ERROR_MESSAGE } from "./utils/formatError";
export { dev, isDev } from "./dev";

// Errors
export {
  FetchableError,
  NotificationLoopError,
  InvalidItemCountError,
  SequenceIndexError,
} from "./errors";

// Types
export type {
  Listener,
  EqualityShorthand,
  Equality,
  DataState,
  DataSource,
  DataSnapshot,
  StaleRefreshPolicy,
  DataHandlerOptions,
  Fetcher,
  LoadingRenderer,
  MessageRenderer,
  RenderTarget,
  Renderers,
  RendererRegistry,
  ResolveOptions,
  Branches,
  ListBranches,
  SequenceBranches,
  ManyBranches,
  RenderSequence,
  DispatcherConfig,
  Dispatcher,
} from "./types";
