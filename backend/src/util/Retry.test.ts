import { calculateBackoffDelay, withRetry } from "./Retry";
import { describe, expect, it, vi } from "vitest";

describe("Retry", () => {
	describe("calculateBackoffDelay", () => {
		it("doubles the delay for each attempt", () => {
			expect(calculateBackoffDelay(1, 1000, 30000)).toBe(1000);
			expect(calculateBackoffDelay(2, 1000, 30000)).toBe(2000);
			expect(calculateBackoffDelay(4, 1000, 30000)).toBe(8000);
		});

		it("caps the delay", () => {
			expect(calculateBackoffDelay(10, 1000, 30000)).toBe(30000);
		});
	});

	describe("withRetry", () => {
		it("returns the first successful result", async () => {
			const operation = vi.fn().mockRejectedValueOnce(new Error("ECONNREFUSED")).mockResolvedValue("ok");
			const sleep = vi.fn().mockResolvedValue(undefined);

			const result = await withRetry(operation, { jitter: false, baseDelayMs: 10, sleep });

			expect(result).toBe("ok");
			expect(operation).toHaveBeenCalledTimes(2);
			expect(sleep).toHaveBeenCalledWith(10);
		});

		it("rethrows the last error after the final attempt", async () => {
			const operation = vi.fn().mockRejectedValue(new Error("still down"));
			const sleep = vi.fn().mockResolvedValue(undefined);

			await expect(
				withRetry(operation, { maxAttempts: 3, jitter: false, baseDelayMs: 10, sleep }),
			).rejects.toThrow("still down");
			expect(operation).toHaveBeenCalledTimes(3);
			expect(sleep.mock.calls).toEqual([[10], [20]]);
		});

		it("does not retry errors rejected by isRetryable", async () => {
			const operation = vi.fn().mockRejectedValue(new Error("bad password"));
			const sleep = vi.fn().mockResolvedValue(undefined);

			await expect(withRetry(operation, { isRetryable: () => false, sleep })).rejects.toThrow("bad password");
			expect(operation).toHaveBeenCalledTimes(1);
			expect(sleep).not.toHaveBeenCalled();
		});

		it("keeps jittered delays within twice the base delay", async () => {
			const operation = vi.fn().mockRejectedValueOnce(new Error("timeout")).mockResolvedValue(1);
			const sleep = vi.fn().mockResolvedValue(undefined);

			await withRetry(operation, { baseDelayMs: 100, sleep });

			const delay = sleep.mock.calls[0][0];
			expect(delay).toBeGreaterThanOrEqual(100);
			expect(delay).toBeLessThan(200);
		});
	});
});
