/**
 * Fetchable React Integration
 *
 * Provides hooks and components for rendering data handlers.
 */

// Target
export { reactTarget } from "./target";

// Context and Provider
export {
  globalRenderers,
  RenderersProvider,
  useRenderers,
  useDispatcher,
  type RenderersProviderProps,
} from "./context";

// Hooks
export { useDataHandler } from "./useDataHandler";
export { useLocalDataHandler } from "./useLocalDataHandler";

// Components
export {
  DataView,
  DataListView,
  DataSequenceView,
  type DataViewProps,
  type DataListViewProps,
  type DataSequenceViewProps,
} from "./DataView";

// Re-export core for convenience
export * from "../index";
