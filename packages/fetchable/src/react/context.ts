/**
 * React Context for renderer registries
 */

import {
  createContext,
  useContext,
  createElement,
  type ReactNode,
  type FC,
  useMemo,
  memo,
  useRef,
} from "react";

import type { Dispatcher, RendererRegistry } from "../types";
import { rendererRegistry } from "../core/renderers";
import { createDispatcher } from "../core/dispatcher";
import { reactTarget } from "./target";

// =============================================================================
// Global Registry
// =============================================================================

/**
 * Process-wide default renderers, used when no RenderersProvider is above.
 * Usually configured once at bootstrap with `globalRenderers.setAll(...)`.
 */
export const globalRenderers: RendererRegistry<ReactNode> =
  rendererRegistry<ReactNode>();

// =============================================================================
// Context
// =============================================================================

const RenderersContext = createContext<RendererRegistry<ReactNode> | null>(
  null
);

/**
 * Provider component for a renderer registry.
 * Without `renderers`, the subtree gets its own empty registry.
 */
export interface RenderersProviderProps {
  renderers?: RendererRegistry<ReactNode>;
  children: ReactNode;
}

export const RenderersProvider: FC<RenderersProviderProps> = memo(
  ({ renderers: value, children }: RenderersProviderProps) => {
    const defaultRegistryRef = useRef<RendererRegistry<ReactNode> | null>(
      null
    );
    const valueOrDefault = useMemo(() => {
      if (value) {
        return value;
      }

      if (!defaultRegistryRef.current) {
        defaultRegistryRef.current = rendererRegistry<ReactNode>();
      }

      return defaultRegistryRef.current;
    }, [value]);
    return createElement(
      RenderersContext.Provider,
      { value: valueOrDefault },
      children
    );
  }
);

/**
 * Hook to get the renderer registry in scope.
 * Falls back to `globalRenderers` outside of a provider.
 */
export function useRenderers(): RendererRegistry<ReactNode> {
  return useContext(RenderersContext) ?? globalRenderers;
}

/**
 * Hook to get a dispatcher bound to the React target and the registry in scope.
 */
export function useDispatcher(): Dispatcher<ReactNode> {
  const renderers = useRenderers();
  return useMemo(
    () => createDispatcher({ target: reactTarget, renderers }),
    [renderers]
  );
}
