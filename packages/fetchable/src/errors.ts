/**
 * Custom error classes for Fetchable.
 * Named error classes help with error identification and handling.
 */

/**
 * Base class for all Fetchable errors.
 */
export class FetchableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchableError";
  }
}

// =============================================================================
// Notification Errors
// =============================================================================

/**
 * Thrown when listeners keep mutating the handler they are notified by.
 */
export class NotificationLoopError extends FetchableError {
  constructor(handlerName: string, depth: number) {
    super(
      `Notification loop detected in "${handlerName}": listeners re-entered ` +
        `notification ${depth} times. Do not mutate a handler synchronously ` +
        `from its own listener without a termination condition.`
    );
    this.name = "NotificationLoopError";
  }
}

// =============================================================================
// Sequence Errors
// =============================================================================

/**
 * Thrown when a sequence item count is negative or not an integer.
 */
export class InvalidItemCountError extends FetchableError {
  constructor(count: number) {
    super(`itemCount must be a non-negative integer, got ${count}`);
    this.name = "InvalidItemCountError";
  }
}

/**
 * Thrown when a sequence is read outside its bounds.
 */
export class SequenceIndexError extends FetchableError {
  constructor(index: number, length: number) {
    super(`Index ${index} is out of range for a sequence of length ${length}`);
    this.name = "SequenceIndexError";
  }
}
