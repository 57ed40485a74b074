import { describe, expect, it, vi } from 'vitest';

import { AuthError, CancelledError } from './errors.js';
import type { FetchLike, HttpResponse } from './http.js';
import type { TermoWebLogger } from './logger.js';
import { SessionManager } from './session-manager.js';

function response(status: number, body: unknown): HttpResponse {
	return {
		ok: status >= 200 && status < 300,
		status,
		statusText: '',
		text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
	};
}

function silentLogger(): TermoWebLogger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function tokenResponse(accessToken: string, extra: Record<string, unknown> = {}): HttpResponse {
	return response(200, { access_token: accessToken, token_type: 'Bearer', expires_in: 3600, ...extra });
}

function createSession(fetchImpl: FetchLike, now: () => number = () => 1_000_000): SessionManager {
	return new SessionManager({
		clientAuth: 'dGVzdC1jbGllbnQ6dGVzdC1zZWNyZXQ=',
		baseUrl: 'https://example.test/',
		fetch: fetchImpl,
		logger: silentLogger(),
		now,
	});
}

describe('SessionManager', () => {
	it('should log in with the password grant', async () => {
		const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(tokenResponse('token-1'));
		const session = createSession(fetchImpl);

		const credential = await session.authenticate(' user@example.com ', 'test-secret');

		expect(credential).toEqual({
			accessToken: 'token-1',
			tokenType: 'Bearer',
			expiresAt: 1_000_000 + 3_600_000,
			refreshToken: undefined,
			invalid: false,
		});

		const [url, init] = fetchImpl.mock.calls[0];
		expect(url).toBe('https://example.test/client/token');
		expect(init.method).toBe('POST');
		expect(init.headers.Authorization).toBe('Basic dGVzdC1jbGllbnQ6dGVzdC1zZWNyZXQ=');
		expect(init.headers['Content-Type']).toBe('application/x-www-form-urlencoded; charset=UTF-8');
		expect(init.body).toBe('username=user%40example.com&password=test-secret&grant_type=password');
	});

	it('should reject bad credentials with an AuthError', async () => {
		const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(response(401, ''));
		const session = createSession(fetchImpl);

		const err = await session.authenticate('user@example.com', 'wrong').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(AuthError);
		expect(err).toHaveProperty('message', 'Invalid credentials or client auth failed (status 401)');
	});

	it('should reject a token response without an access token', async () => {
		const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(response(200, { token_type: 'Bearer' }));
		const session = createSession(fetchImpl);

		await expect(session.authenticate('user@example.com', 'test-secret'))
			.rejects.toThrow('No access_token in token response');
	});

	it('should share one token request between concurrent callers', async () => {
		let release: (res: HttpResponse) => void = () => undefined;
		const fetchImpl = vi.fn<FetchLike>().mockImplementation(
			() => new Promise<HttpResponse>((resolve) => {
				release = resolve;
			}),
		);
		const session = createSession(fetchImpl);
		await session.restore('user@example.com', 'test-secret');

		const first = session.getValidCredential();
		const second = session.getValidCredential();
		expect(session.isRefreshing()).toBe(true);

		await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));
		release(tokenResponse('token-1'));

		const [a, b] = await Promise.all([first, second]);
		expect(a.accessToken).toBe('token-1');
		expect(b.accessToken).toBe('token-1');
		expect(fetchImpl).toHaveBeenCalledTimes(1);
		expect(session.isRefreshing()).toBe(false);
	});

	it('should start a new token request when the account changes during a refresh', async () => {
		let releaseOld: (res: HttpResponse) => void = () => undefined;
		const fetchImpl = vi.fn<FetchLike>()
			.mockImplementationOnce(() => new Promise<HttpResponse>((resolve) => {
				releaseOld = resolve;
			}))
			.mockResolvedValueOnce(tokenResponse('token-new'));
		const session = createSession(fetchImpl);
		await session.restore('old@example.com', 'test-secret');

		const stale = session.getValidCredential();
		await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));

		const fresh = await session.authenticate('new@example.com', 'test-secret-2');
		expect(fresh.accessToken).toBe('token-new');
		expect(fetchImpl.mock.calls[1][1].body).toBe('username=new%40example.com&password=test-secret-2&grant_type=password');

		releaseOld(tokenResponse('token-old'));
		await stale;

		expect(session.getCredentialSnapshot()?.accessToken).toBe('token-new');
		expect(session.isRefreshing()).toBe(false);
	});

	it('should reuse the token until shortly before expiry', async () => {
		let now = 1_000_000;
		const fetchImpl = vi.fn<FetchLike>()
			.mockResolvedValueOnce(tokenResponse('token-1'))
			.mockResolvedValueOnce(tokenResponse('token-2'));
		const session = createSession(fetchImpl, () => now);
		await session.authenticate('user@example.com', 'test-secret');

		now = 4_539_999;
		expect((await session.getValidCredential()).accessToken).toBe('token-1');

		now = 4_540_000;
		expect((await session.getValidCredential()).accessToken).toBe('token-2');
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it('should refresh with the refresh token after invalidation', async () => {
		const fetchImpl = vi.fn<FetchLike>()
			.mockResolvedValueOnce(tokenResponse('token-1', { refresh_token: 'refresh-1' }))
			.mockResolvedValueOnce(tokenResponse('token-2'));
		const session = createSession(fetchImpl);
		await session.authenticate('user@example.com', 'test-secret');

		session.invalidate('token-1');
		const credential = await session.getValidCredential();

		expect(credential.accessToken).toBe('token-2');
		expect(credential.refreshToken).toBe('refresh-1');
		expect(fetchImpl.mock.calls[1][1].body).toBe('grant_type=refresh_token&refresh_token=refresh-1');
	});

	it('should fall back to the password grant when the refresh grant fails', async () => {
		const fetchImpl = vi.fn<FetchLike>()
			.mockResolvedValueOnce(tokenResponse('token-1', { refresh_token: 'refresh-1' }))
			.mockResolvedValueOnce(response(400, { error: 'invalid_grant' }))
			.mockResolvedValueOnce(tokenResponse('token-3'));
		const session = createSession(fetchImpl);
		await session.authenticate('user@example.com', 'test-secret');

		session.invalidate('token-1');
		const credential = await session.getValidCredential();

		expect(credential.accessToken).toBe('token-3');
		expect(fetchImpl.mock.calls[2][1].body).toBe('username=user%40example.com&password=test-secret&grant_type=password');
	});

	it('should ignore invalidation of a token that was already replaced', async () => {
		const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(tokenResponse('token-2'));
		const session = createSession(fetchImpl);
		await session.authenticate('user@example.com', 'test-secret');

		session.invalidate('token-1');

		expect(session.getCredentialSnapshot()?.invalid).toBe(false);
	});

	it('should cancel waiters on close', async () => {
		const fetchImpl = vi.fn<FetchLike>().mockImplementation(() => new Promise<HttpResponse>(() => undefined));
		const session = createSession(fetchImpl);
		await session.restore('user@example.com', 'test-secret');

		const pending = session.getValidCredential();
		session.close();

		await expect(pending).rejects.toBeInstanceOf(CancelledError);
		await expect(session.getValidCredential()).rejects.toThrow('Session closed');
	});
});
