/**
 * Provider error classification.
 *
 * Maps whatever an SDK throws onto the failure classes the pipeline acts on.
 * The caller owns the abort signals, so aborts are recognized from the
 * signal rather than from the SDK's error type.
 */

export type ProviderFailure = 'aborted' | 'unavailable' | 'fatal';

/** HTTP statuses worth retrying: timeouts, conflicts, rate limits, server errors. */
const RETRYABLE_STATUSES = new Set([408, 409, 429]);

/**
 * Read an HTTP status off an SDK error, if it carries one.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

/**
 * Classify a provider error.
 *
 * Errors without a status are connection-level failures (DNS, reset,
 * socket timeout) and count as the service being unavailable.
 */
export function classifyProviderError(error: unknown, signal?: AbortSignal): ProviderFailure {
  if (signal?.aborted) {
    return 'aborted';
  }

  const status = getErrorStatus(error);
  if (status === undefined) {
    return 'unavailable';
  }

  return isRetryableStatus(status) ? 'unavailable' : 'fatal';
}
