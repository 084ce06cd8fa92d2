import type { RenderTarget } from "../types";

export const LOADING_TEXT = "Loading...";

/**
 * Plain-text render target, for terminal UIs and logs.
 */
export const textTarget: RenderTarget<string> = {
  loading: () => LOADING_TEXT,
  error: (message) => message,
  empty: (message) => message,
  nothing: () => "",
};
