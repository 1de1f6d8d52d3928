import { getLog } from "./Logger";

const log = getLog(import.meta);

export interface RetryOptions {
	/** Total attempts including the first (default: 3) */
	maxAttempts?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	/** Adds 0-100% random jitter to each delay (default: true) */
	jitter?: boolean;
	/** Errors for which this returns false are rethrown immediately. */
	isRetryable?: (error: unknown) => boolean;
	label?: string;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Exponential backoff delay for a 1-based attempt number, capped at maxDelayMs.
 */
export function calculateBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

function defaultSleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs an async operation, retrying failures with exponential backoff.
 * The last error is rethrown once attempts are exhausted.
 *
 * @example
 * ```typescript
 * await withRetry(() => sequelize.authenticate(), {
 *   label: "DB connect",
 *   maxAttempts: 5,
 *   isRetryable: isRetryableConnectionError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const {
		maxAttempts = 3,
		baseDelayMs = 1000,
		maxDelayMs = 30000,
		jitter = true,
		isRetryable,
		label = "operation",
		sleep = defaultSleep,
	} = options;

	let attempt = 1;
	while (true) {
		try {
			return await operation();
		} catch (error) {
			if (attempt >= maxAttempts || (isRetryable && !isRetryable(error))) {
				throw error;
			}
			const delay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);
			const delayMs = jitter ? delay + Math.floor(delay * Math.random()) : delay;
			const message = error instanceof Error ? error.message : String(error);
			log.warn(
				{ attempt, maxAttempts, delayMs, error: message },
				"Retrying %s after error (attempt %d/%d, retry in %dms)",
				label,
				attempt,
				maxAttempts,
				delayMs,
			);
			await sleep(delayMs);
			attempt++;
		}
	}
}
