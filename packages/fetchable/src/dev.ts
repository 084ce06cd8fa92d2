// Only the type of `process.env.NODE_ENV` is needed: bundlers inline the
// value, and the `!== "production"` branches below drop out of builds.
declare const process: {
  env: {
    NODE_ENV?: string;
  };
};

const PREFIX = "[fetchable]";

export function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Runs `fn` outside production builds and reports whether it did.
 *
 * The namespace below carries the prefixed console helpers that handlers
 * use to report misuse (mutations after `dispose()`, dropped refresh
 * results, listener failures during `refresh`).
 *
 * @example
 * ```ts
 * dev(() => checkListenerLeaks(handler));
 * dev.warn(`${handler.name}: succeed() called on a disposed handler`);
 * ```
 */
export function dev(fn?: () => void): boolean {
  if (process.env.NODE_ENV === "production") return false;
  fn?.();
  return true;
}

export namespace dev {
  export function log(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.log(`${PREFIX} ${message}`, ...args);
    }
  }

  export function warn(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.warn(`${PREFIX} ${message}`, ...args);
    }
  }

  export function error(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.error(`${PREFIX} ${message}`, ...args);
    }
  }

  /** Throws when `condition` is false; a no-op in production. */
  export function assert(condition: boolean, message: string): void {
    if (process.env.NODE_ENV !== "production" && !condition) {
      throw new Error(`${PREFIX} Assertion failed: ${message}`);
    }
  }
}
