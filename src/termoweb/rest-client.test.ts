import { describe, expect, it, vi } from 'vitest';

import { AuthError, TransportError } from './errors.js';
import type { FetchLike, HttpRequestInit, HttpResponse } from './http.js';
import type { TermoWebLogger } from './logger.js';
import { RestClient, normalizeDevices, normalizeNodes } from './rest-client.js';
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

type ApiHandler = (url: string, init: HttpRequestInit) => HttpResponse;

/** Token endpoint hands out token-1, token-2, ...; everything else goes to `api`. */
function createClient(api: ApiHandler) {
	let issued = 0;
	const apiCalls: { url: string; init: HttpRequestInit }[] = [];
	const fetchImpl = vi.fn<FetchLike>(async (url, init) => {
		if (url.endsWith('/client/token')) {
			issued += 1;
			return response(200, { access_token: `token-${issued}`, token_type: 'Bearer', expires_in: 3600 });
		}
		apiCalls.push({ url, init });
		return api(url, init);
	});
	const logger = silentLogger();
	const session = new SessionManager({
		clientAuth: 'test-client-auth',
		baseUrl: 'https://example.test',
		fetch: fetchImpl,
		logger,
	});
	const client = new RestClient({ session, baseUrl: 'https://example.test/', fetch: fetchImpl, logger });
	return { client, session, fetchImpl, apiCalls, logger };
}

describe('RestClient', () => {
	it('should list devices with a bearer token', async () => {
		const { client, session, apiCalls } = createClient(() => response(200, {
			devs: [{ dev_id: 'dev1', name: 'Home' }, { id: 42 }, { name: 'no id' }],
		}));
		await session.authenticate('user@example.com', 'test-secret');

		const devices = await client.listDevices();

		expect(devices.map((d) => [d.devId, d.name])).toEqual([['dev1', 'Home'], ['42', '42']]);
		expect(apiCalls[0].url).toBe('https://example.test/api/v2/devs/');
		expect(apiCalls[0].init.headers.Authorization).toBe('Bearer token-1');
	});

	it('should keep only heater nodes', async () => {
		const { client, session, apiCalls } = createClient(() => response(200, {
			nodes: [
				{ addr: 2, type: 'HTR', name: ' Lounge ' },
				{ addr: '3', type: 'pmo', name: 'Meter' },
				{ addr: '4', type: 'htr' },
			],
		}));
		await session.authenticate('user@example.com', 'test-secret');

		const nodes = await client.listNodes('dev1');

		expect(nodes).toEqual([
			{ devId: 'dev1', addr: '2', type: 'htr', name: 'Lounge' },
			{ devId: 'dev1', addr: '4', type: 'htr', name: 'Heater 4' },
		]);
		expect(apiCalls[0].url).toBe('https://example.test/api/v2/devs/dev1/mgr/nodes');
	});

	it('should decode heater settings', async () => {
		const { client, session, apiCalls } = createClient(() => response(200, {
			mode: 'auto',
			stemp: '19.0',
			mtemp: '18.4',
			units: 'C',
		}));
		await session.authenticate('user@example.com', 'test-secret');

		expect(await client.getHeaterSettings('dev1', '2')).toEqual({
			mode: 'auto',
			stemp: 19,
			mtemp: 18.4,
			units: 'C',
		});
		expect(apiCalls[0].url).toBe('https://example.test/api/v2/devs/dev1/htr/2/settings');
	});

	it('should post a manual setpoint as JSON', async () => {
		const { client, session, apiCalls } = createClient(() => response(201, ''));
		await session.authenticate('user@example.com', 'test-secret');

		await client.postHeaterSettings('dev1', '2', { stemp: 16, units: 'C' });

		const { init } = apiCalls[0];
		expect(init.method).toBe('POST');
		expect(init.headers['Content-Type']).toBe('application/json');
		expect(JSON.parse(init.body ?? '')).toEqual({ units: 'C', mode: 'manual', stemp: '16.0' });
	});

	it('should refresh once and retry after a 401', async () => {
		const { client, session, apiCalls } = createClient((_url, init) =>
			init.headers.Authorization === 'Bearer token-1' ? response(401, '') : response(200, []),
		);
		await session.authenticate('user@example.com', 'test-secret');

		expect(await client.listDevices()).toEqual([]);
		expect(apiCalls.map((call) => call.init.headers.Authorization)).toEqual(['Bearer token-1', 'Bearer token-2']);
	});

	it('should give up with an AuthError after a second 401', async () => {
		const { client, session, fetchImpl } = createClient(() => response(401, ''));
		await session.authenticate('user@example.com', 'test-secret');

		const err = await client.listDevices().catch((e: unknown) => e);

		expect(err).toBeInstanceOf(AuthError);
		expect(err).toHaveProperty('message', 'Unauthorized: GET /api/v2/devs/');
		// login, first call, refresh, retry
		expect(fetchImpl).toHaveBeenCalledTimes(4);
	});

	it('should mark 429 responses as rate limited', async () => {
		const { client, session } = createClient(() => response(429, 'slow down'));
		await session.authenticate('user@example.com', 'test-secret');

		const err = await client.getAdvancedSetup('dev1', '2').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransportError);
		expect(err instanceof TransportError && err.rateLimited).toBe(true);
		expect(err).toMatchObject({
			status: 429,
			message: 'Rate limited: GET /api/v2/devs/dev1/htr/2/advanced_setup',
		});
	});

	it('should report other error statuses', async () => {
		const { client, session, logger } = createClient(() => response(500, 'oops'));
		await session.authenticate('user@example.com', 'test-secret');

		await expect(client.listNodes('dev1')).rejects.toThrow('GET /api/v2/devs/dev1/mgr/nodes failed with status 500');
		expect(logger.error).toHaveBeenCalledTimes(1);
	});

	it('should put the token in the handshake query', async () => {
		const { client, session, apiCalls } = createClient(() => response(200, 'sid-1:60:60:websocket,xhr-polling'));
		await session.authenticate('user@example.com', 'test-secret');

		const result = await client.realtimeHandshake('dev1', 1700000000000);

		expect(result).toEqual({ body: 'sid-1:60:60:websocket,xhr-polling', token: 'token-1' });
		expect(apiCalls[0].url).toBe('https://example.test/socket.io/1/?token=token-1&dev_id=dev1&t=1700000000000');
	});
});

describe('normalizeDevices', () => {
	it('should accept a bare list or a devices wrapper', () => {
		expect(normalizeDevices([{ dev_id: 'a' }]).map((d) => d.devId)).toEqual(['a']);
		expect(normalizeDevices({ devices: [{ dev_id: 'b' }] }).map((d) => d.devId)).toEqual(['b']);
	});

	it('should treat unknown shapes as empty', () => {
		expect(normalizeDevices({ unexpected: true })).toEqual([]);
		expect(normalizeDevices(null)).toEqual([]);
	});
});

describe('normalizeNodes', () => {
	it('should accept a bare list', () => {
		expect(normalizeNodes('dev1', [{ addr: '1', type: 'htr', name: 'Hall' }])).toEqual([
			{ devId: 'dev1', addr: '1', type: 'htr', name: 'Hall' },
		]);
	});
});
