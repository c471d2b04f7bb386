/**
 * True for the error raised by an aborted `AbortSignal`. Cancellation is never
 * mapped into a domain error; callers rethrow it as is.
 */
export function isCancellation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
