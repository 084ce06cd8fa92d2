import { createElement, type ReactNode } from "react";
import type { RenderTarget } from "../types";
import { LOADING_TEXT } from "../core/textTarget";

/**
 * React render target. Built-in defaults used when neither a per-call
 * branch nor a registry renderer is available.
 */
export const reactTarget: RenderTarget<ReactNode> = {
  loading: () =>
    createElement(
      "div",
      { role: "status", "aria-busy": true, className: "fetchable-loading" },
      LOADING_TEXT
    ),
  error: (message) =>
    createElement("div", { role: "alert", className: "fetchable-error" }, message),
  empty: (message) =>
    createElement("div", { className: "fetchable-empty" }, message),
  nothing: () => null,
};
