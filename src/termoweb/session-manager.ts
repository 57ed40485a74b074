// src/termoweb/session-manager.ts
// TermoWeb password-grant session. Owns the bearer credential and makes sure
// only one token request is ever in flight.

import { AuthError, CancelledError, describeError } from './errors.js';
import {
	ACCEPT_LANGUAGE,
	DEFAULT_BASE_URL,
	USER_AGENT,
	defaultFetch,
	isRecord,
	parseJsonBody,
	sendRequest,
	type FetchLike,
} from './http.js';
import { createDefaultLogger, type TermoWebLogger } from './logger.js';
import type { TokenStore } from './token-store.js';

export const TOKEN_PATH = '/client/token';

// Refresh a little before the server-side expiry so in-flight calls don't race it.
const EXPIRY_SKEW_MS = 60_000;

export interface Credential {
	readonly accessToken: string;
	readonly tokenType: string;
	/** Epoch ms; undefined when the server did not say. */
	readonly expiresAt?: number;
	readonly refreshToken?: string;
	/** Set once a caller saw a 401 with this token, or a refresh failed. */
	readonly invalid: boolean;
}

export interface SessionManagerOptions {
	/** Base64 `client_id:client_secret` sent as the Basic header on token requests. */
	clientAuth: string;
	baseUrl?: string;
	fetch?: FetchLike;
	requestTimeoutMs?: number;
	tokenStore?: TokenStore;
	logger?: TermoWebLogger;
	now?: () => number;
}

export class SessionManager {
	private readonly log: TermoWebLogger;
	private readonly fetchImpl: FetchLike;
	private readonly tokenUrl: string;
	private readonly clientAuth: string;
	private readonly requestTimeoutMs: number;
	private readonly tokenStore?: TokenStore;
	private readonly now: () => number;

	private credential: Credential | null = null;
	private username: string | null = null;
	private password: string | null = null;
	private inflight: Promise<Credential> | null = null;
	// Bumped when the account changes; token responses from an older account are not kept.
	private generation = 0;
	private readonly waiters = new Set<(err: Error) => void>();
	private closed = false;

	constructor(options: SessionManagerOptions) {
		this.log = options.logger ?? createDefaultLogger('termoweb-session');
		this.fetchImpl = options.fetch ?? defaultFetch;
		this.tokenUrl = `${(options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}${TOKEN_PATH}`;
		this.clientAuth = options.clientAuth.trim();
		this.requestTimeoutMs = options.requestTimeoutMs ?? 25_000;
		this.tokenStore = options.tokenStore;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Log in with the password grant. The username and password are kept so
	 * later refreshes can fall back to them.
	 */
	public async authenticate(username: string, password: string): Promise<Credential> {
		const nextUsername = username.trim();
		if (nextUsername !== this.username || password !== this.password) {
			this.generation++;
			this.inflight = null;
		}
		this.username = nextUsername;
		this.password = password;
		return this.singleFlight(() => this.passwordGrant());
	}

	/**
	 * Restore a still-valid credential from the token store, if there is one.
	 * Credentials are still needed for later refreshes.
	 */
	public async restore(username: string, password: string): Promise<boolean> {
		this.username = username.trim();
		this.password = password;
		if (!this.tokenStore) {
			return false;
		}

		const stored = await this.tokenStore.load(this.now());
		if (!stored || !this.isUsable(stored)) {
			return false;
		}

		this.credential = stored;
		this.log.info(
			'TermoWeb: using stored token (expiresAt=%s)',
			stored.expiresAt ? new Date(stored.expiresAt).toISOString() : 'unknown',
		);
		return true;
	}

	/**
	 * Current credential, refreshed first when it is missing, invalidated, or
	 * about to expire. Concurrent callers share one refresh.
	 */
	public async getValidCredential(): Promise<Credential> {
		if (this.closed) {
			throw new CancelledError('Session closed');
		}

		const current = this.credential;
		if (current && this.isUsable(current)) {
			return current;
		}
		return this.singleFlight(() => this.performRefresh());
	}

	/**
	 * Mark a token as rejected by the server. A newer token that replaced it
	 * in the meantime is left alone.
	 */
	public invalidate(accessToken: string): void {
		const current = this.credential;
		if (current && current.accessToken === accessToken && !current.invalid) {
			this.log.debug('TermoWeb: access token rejected; marking invalid.');
			this.credential = { ...current, invalid: true };
		}
	}

	public isRefreshing(): boolean {
		return this.inflight !== null;
	}

	public getCredentialSnapshot(): Credential | null {
		return this.credential;
	}

	/** Reject anyone still waiting on a refresh. */
	public close(): void {
		this.closed = true;
		const pending = [...this.waiters];
		this.waiters.clear();
		for (const reject of pending) {
			reject(new CancelledError('Session closed'));
		}
	}

	private isUsable(credential: Credential): boolean {
		if (credential.invalid) {
			return false;
		}
		return credential.expiresAt === undefined || this.now() < credential.expiresAt - EXPIRY_SKEW_MS;
	}

	private singleFlight(run: () => Promise<Credential>): Promise<Credential> {
		let current = this.inflight;
		if (!current) {
			const started: Promise<Credential> = run().finally(() => {
				if (this.inflight === started) {
					this.inflight = null;
				}
			});
			this.inflight = started;
			current = started;
		}
		return this.awaitCancellable(current);
	}

	private awaitCancellable(promise: Promise<Credential>): Promise<Credential> {
		return new Promise<Credential>((resolve, reject) => {
			this.waiters.add(reject);
			promise.then(
				(credential) => {
					this.waiters.delete(reject);
					resolve(credential);
				},
				(err: unknown) => {
					this.waiters.delete(reject);
					reject(err instanceof Error ? err : new AuthError(String(err)));
				},
			);
		});
	}

	private async performRefresh(): Promise<Credential> {
		const refreshToken = this.credential?.refreshToken;
		if (refreshToken) {
			try {
				return await this.requestToken({ grant_type: 'refresh_token', refresh_token: refreshToken });
			} catch (err) {
				this.log.debug('TermoWeb: refresh_token grant failed (%s); retrying password grant.', describeError(err));
			}
		}
		return this.passwordGrant();
	}

	private async passwordGrant(): Promise<Credential> {
		if (!this.username || !this.password) {
			this.markInvalid();
			throw new AuthError('No username/password available; call authenticate() first.');
		}
		return this.requestToken({
			username: this.username,
			password: this.password,
			grant_type: 'password',
		});
	}

	private async requestToken(form: Record<string, string>): Promise<Credential> {
		if (!this.clientAuth) {
			this.markInvalid();
			throw new AuthError('Missing Basic client authorization for the token endpoint.');
		}

		const userDomain = this.username && this.username.includes('@')
			? this.username.split('@').pop()
			: '<no-domain>';
		this.log.debug('TermoWeb: token POST grant=%s user domain=%s', form.grant_type, userDomain);
		const generation = this.generation;

		try {
			const res = await sendRequest(
				this.fetchImpl,
				this.tokenUrl,
				{
					method: 'POST',
					headers: {
						'Authorization': `Basic ${this.clientAuth}`,
						'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
						'Accept': 'application/json',
						'User-Agent': USER_AGENT,
						'Accept-Language': ACCEPT_LANGUAGE,
					},
					body: new URLSearchParams(form).toString(),
				},
				this.requestTimeoutMs,
			);

			if (res.status === 400 || res.status === 401) {
				throw new AuthError(`Invalid credentials or client auth failed (status ${res.status})`);
			}
			if (!res.ok) {
				throw new AuthError(`Token request failed with status ${res.status}`);
			}

			const credential = this.parseTokenResponse(parseJsonBody(res.body, 'Token endpoint'));
			if (generation !== this.generation) {
				this.log.debug('TermoWeb: account changed during token request; discarding its token.');
				return credential;
			}
			this.credential = credential;
			await this.persist(credential);

			this.log.info(
				'TermoWeb: obtained access token; expiresAt=%s',
				credential.expiresAt ? new Date(credential.expiresAt).toISOString() : 'unknown',
			);
			return credential;
		} catch (err) {
			if (generation === this.generation) {
				this.markInvalid();
			}
			if (err instanceof AuthError) {
				throw err;
			}
			throw new AuthError(`Token request failed: ${describeError(err)}`, { cause: err });
		}
	}

	private parseTokenResponse(json: unknown): Credential {
		if (!isRecord(json) || typeof json.access_token !== 'string' || json.access_token === '') {
			throw new AuthError('No access_token in token response');
		}

		const expiresIn = Number(json.expires_in);
		const expiresAt = Number.isFinite(expiresIn) && expiresIn > 0
			? this.now() + expiresIn * 1000
			: undefined;

		return {
			accessToken: json.access_token,
			tokenType: typeof json.token_type === 'string' ? json.token_type : 'Bearer',
			expiresAt,
			refreshToken: typeof json.refresh_token === 'string' && json.refresh_token !== ''
				? json.refresh_token
				: this.credential?.refreshToken,
			invalid: false,
		};
	}

	private markInvalid(): void {
		if (this.credential && !this.credential.invalid) {
			this.credential = { ...this.credential, invalid: true };
		}
	}

	private async persist(credential: Credential): Promise<void> {
		if (!this.tokenStore) {
			return;
		}
		try {
			await this.tokenStore.save(credential);
		} catch (err) {
			this.log.warn('TermoWeb: could not persist token: %s', describeError(err));
		}
	}
}
