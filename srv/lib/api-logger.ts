import cds from "@sap/cds";

const LOG = cds.log("api-logger");

export interface ApiCallEntry {
  operation: string;
  endpoint: string;
  success: boolean;
  responseTimeMs: number;
  errorMessage?: string;
}

/** Consecutive failure tracking per endpoint. */
interface FailureState {
  count: number;
  lastSuccessAt: string | null;
}

const FAILURE_THRESHOLD = 3;
const failureCounters = new Map<string, FailureState>();

export function getFailureState(endpoint: string): FailureState | undefined {
  return failureCounters.get(endpoint);
}

/**
 * Reset all failure counters (for testing).
 */
export function resetFailureCounters(): void {
  failureCounters.clear();
}

/**
 * Track consecutive failures and warn once when the threshold is reached.
 */
function trackFailure(entry: ApiCallEntry): void {
  const state = failureCounters.get(entry.endpoint) || {
    count: 0,
    lastSuccessAt: null,
  };

  if (entry.success) {
    state.count = 0;
    state.lastSuccessAt = new Date().toISOString();
  } else {
    state.count++;
    if (state.count === FAILURE_THRESHOLD) {
      LOG.warn(
        `Endpoint "${entry.endpoint}" has ${state.count} consecutive failures. Last success: ${state.lastSuccessAt || "never"}`,
      );
    }
  }
  failureCounters.set(entry.endpoint, state);
}

export function logApiCall(entry: ApiCallEntry): void {
  if (entry.success) {
    LOG.info(`${entry.operation} ok (${entry.responseTimeMs}ms)`);
  } else {
    LOG.error(`${entry.operation} failed (${entry.responseTimeMs}ms): ${entry.errorMessage}`);
  }
  trackFailure(entry);
}

/**
 * Wraps an async function to log its duration and outcome.
 * Errors are rethrown unchanged.
 */
export function withApiLogging<TArgs extends unknown[], TResult>(
  operation: string,
  endpoint: string,
  fn: (...args: TArgs) => Promise<TResult>,
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    const start = Date.now();
    let success = true;
    let errorMessage: string | undefined;

    try {
      return await fn(...args);
    } catch (err) {
      success = false;
      errorMessage = err instanceof Error ? err.message : String(err);
      throw err;
    } finally {
      logApiCall({
        operation,
        endpoint,
        success,
        responseTimeMs: Date.now() - start,
        errorMessage,
      });
    }
  };
}
