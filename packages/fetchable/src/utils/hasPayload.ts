/**
 * Type guard for a present payload.
 *
 * Both `undefined` and `null` mean "no payload": a handler never treats
 * them as data to render, so the success branch is only called with
 * something it can use.
 *
 * @example
 * ```ts
 * const data = handler.data;
 * if (hasPayload(data)) {
 *   render(data);
 * }
 * ```
 */
export function hasPayload<T>(value: T): value is NonNullable<T> {
  return value !== undefined && value !== null;
}
