// src/config.ts
import { ValidationError } from './termoweb/errors.js';
import { DEFAULT_BASE_URL } from './termoweb/http.js';

export const MIN_POLL_INTERVAL_S = 30;
export const MAX_POLL_INTERVAL_S = 3600;
export const DEFAULT_POLL_INTERVAL_S = 120;
export const DEFAULT_FREEZE_WINDOW_S = 30;
export const DEFAULT_REQUEST_TIMEOUT_S = 25;

export interface TermoWebPlatformConfig {
	name: string;
	username: string;
	password: string;
	/** Base64 `client_id:client_secret` for the token endpoint. */
	clientAuth: string;
	baseUrl: string;
	pollInterval: number;
	realtime: boolean;
	freezeWindow: number;
	requestTimeout: number;
}

function readString(raw: Record<string, unknown>, key: string): string {
	const value = raw[key];
	return typeof value === 'string' ? value.trim() : '';
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
	const value = raw[key];
	if (value === undefined || value === null || value === '') {
		return fallback;
	}
	const n = typeof value === 'number' ? value : Number(value);
	if (!Number.isFinite(n)) {
		throw new ValidationError(`${key} must be a number; got ${String(value)}`);
	}
	return n;
}

/**
 * Validate the platform block from config.json. Missing credentials throw;
 * intervals out of range are clamped.
 */
export function parsePlatformConfig(raw: Record<string, unknown>): TermoWebPlatformConfig {
	const username = readString(raw, 'username');
	const password = typeof raw.password === 'string' ? raw.password : '';
	const clientAuth = readString(raw, 'clientAuth');

	const missing = [
		username ? null : 'username',
		password ? null : 'password',
		clientAuth ? null : 'clientAuth',
	].filter((key): key is string => key !== null);
	if (missing.length > 0) {
		throw new ValidationError(`missing required setting(s): ${missing.join(', ')}`);
	}

	const baseUrl = (readString(raw, 'baseUrl') || DEFAULT_BASE_URL).replace(/\/+$/, '');
	if (!/^https?:\/\//i.test(baseUrl)) {
		throw new ValidationError(`baseUrl must start with http:// or https://; got ${baseUrl}`);
	}

	const pollInterval = Math.min(
		MAX_POLL_INTERVAL_S,
		Math.max(MIN_POLL_INTERVAL_S, readNumber(raw, 'pollInterval', DEFAULT_POLL_INTERVAL_S)),
	);

	const freezeWindow = readNumber(raw, 'freezeWindow', DEFAULT_FREEZE_WINDOW_S);
	if (freezeWindow < 0) {
		throw new ValidationError('freezeWindow must not be negative');
	}

	const requestTimeout = readNumber(raw, 'requestTimeout', DEFAULT_REQUEST_TIMEOUT_S);
	if (requestTimeout <= 0) {
		throw new ValidationError('requestTimeout must be greater than zero');
	}

	return {
		name: readString(raw, 'name') || 'TermoWeb',
		username,
		password,
		clientAuth,
		baseUrl,
		pollInterval,
		realtime: raw.realtime !== false,
		freezeWindow,
		requestTimeout,
	};
}
