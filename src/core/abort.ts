/**
 * AbortSignal Utilities
 *
 * Each page fetch owns an AbortController. Its signal is aborted when a newer
 * fetch supersedes it or the controller is disposed, and may be composed with
 * a deadline from the fetch timeout setting.
 */

/**
 * Composes an optional parent AbortSignal with a timeout deadline.
 *
 * A timeout of 0 means no deadline: the parent is returned as is.
 *
 * @example
 * ```ts
 * const controller = new AbortController();
 * const signal = composeWithTimeout(controller.signal, 5000);
 * // Aborts if controller aborts OR after 5 seconds
 * ```
 */
export function composeWithTimeout(
  parent: AbortSignal,
  timeoutMs: number
): AbortSignal {
  if (timeoutMs <= 0) {
    return parent;
  }

  return AbortSignal.any([parent, AbortSignal.timeout(timeoutMs)]);
}

/**
 * Checks if an abort reason indicates a timeout (deadline exceeded)
 * rather than external cancellation.
 *
 * AbortSignal.timeout() aborts with a DOMException named "TimeoutError".
 */
export function isTimeoutAbortReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  );
}

/**
 * Creates an abort listener that removes itself after firing once.
 *
 * @returns Function that removes the listener if the signal has not fired yet
 */
export function onceAborted(
  signal: AbortSignal,
  callback: () => void
): () => void {
  const listener = () => callback();

  signal.addEventListener('abort', listener, { once: true });

  return () => {
    signal.removeEventListener('abort', listener);
  };
}
