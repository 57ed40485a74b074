// src/termoweb/backoff.ts

export interface BackoffOptions {
	baseMs: number;
	capMs: number;
	/** Multiplicative jitter range, e.g. [0.8, 1.2]. */
	jitter?: readonly [number, number];
}

/**
 * Exponential delay for the given 1-based attempt: base, 2x base, 4x base,
 * up to the cap, then scaled by a random factor inside the jitter range.
 */
export function computeBackoffMs(
	attempt: number,
	options: BackoffOptions,
	random: () => number = Math.random,
): number {
	const exponent = Math.max(0, attempt - 1);
	const delay = Math.min(options.capMs, options.baseMs * Math.pow(2, exponent));
	if (!options.jitter) {
		return delay;
	}
	const [low, high] = options.jitter;
	return Math.round(delay * (low + (high - low) * random()));
}
