// src/termoweb/errors.ts

/**
 * Base class for every error raised by the TermoWeb cloud layer.
 */
export class TermoWebError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TermoWebError';
	}
}

/**
 * Bad credentials, or a token refresh that failed. Never retried beyond the
 * single refresh-and-retry a REST call performs.
 */
export class AuthError extends TermoWebError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'AuthError';
	}
}

/**
 * A REST request failed at the network layer or returned a non-auth error
 * status. `status` is 0 when no response was received.
 */
export class TransportError extends TermoWebError {
	public readonly status: number;

	constructor(message: string, status = 0, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TransportError';
		this.status = status;
	}

	public get rateLimited(): boolean {
		return this.status === 429;
	}
}

/**
 * Handshake or streaming failure on the realtime socket.
 */
export class RealtimeError extends TermoWebError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'RealtimeError';
	}
}

/**
 * Malformed command input, rejected before any network call.
 */
export class ValidationError extends TermoWebError {
	constructor(message: string) {
		super(message);
		this.name = 'ValidationError';
	}
}

/**
 * Raised to waiters that were still pending when the integration stopped.
 */
export class CancelledError extends TermoWebError {
	constructor(message = 'Operation cancelled') {
		super(message);
		this.name = 'CancelledError';
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return String(err);
}

/**
 * True for failures worth retrying later: network errors and error statuses,
 * including a token request that failed for one of those reasons.
 */
export function isTransientError(err: unknown): boolean {
	if (err instanceof TransportError) {
		return true;
	}
	return err instanceof TermoWebError && err.cause instanceof TransportError;
}
