export const UNKNOWN_ERROR_MESSAGE = "Unknown error";

/**
 * Convert whatever a fetch rejected with into a human-readable message.
 */
export function formatError(error: unknown): string {
  if (typeof error === "string") return error;
  if (error === null || error === undefined) return UNKNOWN_ERROR_MESSAGE;

  if (error instanceof Error) {
    return error.message || error.name || UNKNOWN_ERROR_MESSAGE;
  }

  try {
    return String(error);
  } catch {
    // objects with a throwing toString, or Object.create(null)
    return UNKNOWN_ERROR_MESSAGE;
  }
}
