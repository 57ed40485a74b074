// src/termoweb/http.ts
// Minimal fetch/response typing so the cloud clients can take an injected
// fetch in tests and the global one in production.

import { TransportError } from './errors.js';
import { redactToken } from './logger.js';

export const USER_AGENT = 'homebridge-termoweb';
export const ACCEPT_LANGUAGE = 'en-US,en;q=0.8';
export const DEFAULT_BASE_URL = 'https://control.termoweb.net';

export interface HttpRequestInit {
	method: 'GET' | 'POST';
	headers: Record<string, string>;
	body?: string;
	signal?: AbortSignal;
}

export interface HttpResponse {
	ok: boolean;
	status: number;
	statusText: string;
	text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export interface RawResponse {
	status: number;
	ok: boolean;
	body: string;
}

/**
 * Perform one request with a bounded timeout. Network failures and timeouts
 * become TransportError; HTTP error statuses are returned for the caller to
 * classify.
 */
export async function sendRequest(
	fetchImpl: FetchLike,
	url: string,
	init: HttpRequestInit,
	timeoutMs: number,
): Promise<RawResponse> {
	let res: HttpResponse;
	try {
		res = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
	} catch (err) {
		const reason = err instanceof Error && err.name === 'TimeoutError'
			? `timed out after ${timeoutMs}ms`
			: err instanceof Error ? err.message : String(err);
		throw new TransportError(
			`${init.method} ${redactToken(url)} failed: ${reason}`,
			0,
			{ cause: err },
		);
	}

	const body = await res.text().catch(() => '');
	return { status: res.status, ok: res.ok, body };
}

/**
 * Parse a response body as JSON, tolerating the vendor's habit of sending
 * JSON with a text/html content type.
 */
export function parseJsonBody(body: string, what: string): unknown {
	if (body.trim() === '') {
		return null;
	}
	try {
		const parsed: unknown = JSON.parse(body);
		return parsed;
	} catch (err) {
		throw new TransportError(`${what} returned non-JSON payload: ${body.slice(0, 120)}`, 0, { cause: err });
	}
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
