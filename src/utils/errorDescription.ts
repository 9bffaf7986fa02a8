/**
 * Human-readable error descriptions for log lines
 */

function errorClassName(error: Error): string {
  return error.constructor.name || error.name;
}

/**
 * One-line description: name, message, class and immediate cause
 *
 * @example
 * describeError(new NetworkError("socket hang up"))
 * // "NetworkError: socket hang up (class: NetworkError), cause: none"
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `non-error value: ${String(error)}`;
  }
  const cause = error.cause === undefined ? "none" : summarize(error.cause);
  return `${error.name}: ${error.message} (class: ${errorClassName(error)}), cause: ${cause}`;
}

function summarize(value: unknown): string {
  return value instanceof Error ? `${value.name}: ${value.message}` : String(value);
}

/**
 * Stack of every error in the cause chain, outermost first
 */
export function describeErrorDetailed(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.stack ?? `${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }

  return parts.join("\nCaused by: ");
}
