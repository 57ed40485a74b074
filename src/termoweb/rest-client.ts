// src/termoweb/rest-client.ts
import { AuthError, TransportError } from './errors.js';
import { buildSettingsPayload, decodeHeaterSettings, type SettingsWrite } from './encoding.js';
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
import { createDefaultLogger, redactToken, type TermoWebLogger } from './logger.js';
import type { SessionManager } from './session-manager.js';
import type { HeaterFields, HeaterNode, TermoWebDevice } from './types.js';

export const DEVS_PATH = '/api/v2/devs/';
export const HANDSHAKE_PATH = '/socket.io/1/';

/**
 * Cloud operations the coordinator depends on. RestClient is the real one;
 * tests provide fakes.
 */
export interface TermoWebApi {
	listDevices(): Promise<TermoWebDevice[]>;
	listNodes(devId: string): Promise<HeaterNode[]>;
	getHeaterSettings(devId: string, addr: string): Promise<HeaterFields>;
	postHeaterSettings(devId: string, addr: string, write: SettingsWrite): Promise<void>;
	getAdvancedSetup(devId: string, addr: string): Promise<unknown>;
}

export interface RestClientOptions {
	session: SessionManager;
	baseUrl?: string;
	fetch?: FetchLike;
	requestTimeoutMs?: number;
	logger?: TermoWebLogger;
}

interface ApiRequest {
	method: 'GET' | 'POST';
	path: string;
	query?: Record<string, string>;
	json?: unknown;
}

function toId(value: unknown): string | undefined {
	if (typeof value === 'string' && value.trim() !== '') {
		return value.trim();
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return String(value);
	}
	return undefined;
}

function pickList(data: unknown, keys: readonly string[]): Record<string, unknown>[] | undefined {
	let list: unknown = data;
	if (isRecord(data)) {
		list = keys.map((key) => data[key]).find((value) => Array.isArray(value));
	}
	if (!Array.isArray(list)) {
		return undefined;
	}
	return list.filter(isRecord);
}

export function normalizeDevices(data: unknown): TermoWebDevice[] {
	const list = pickList(data, ['devs', 'devices']) ?? [];
	const devices: TermoWebDevice[] = [];
	for (const raw of list) {
		const devId = toId(raw.dev_id) ?? toId(raw.id);
		if (!devId) {
			continue;
		}
		const name = typeof raw.name === 'string' && raw.name.trim() !== '' ? raw.name.trim() : devId;
		devices.push({ devId, name, nodes: [], raw });
	}
	return devices;
}

/** Heater nodes only; other node types (power monitors, thermostats) are skipped. */
export function normalizeNodes(devId: string, data: unknown): HeaterNode[] {
	const list = pickList(data, ['nodes']) ?? [];
	const nodes: HeaterNode[] = [];
	for (const raw of list) {
		const addr = toId(raw.addr);
		const type = typeof raw.type === 'string' ? raw.type.trim().toLowerCase() : '';
		if (!addr || type !== 'htr') {
			continue;
		}
		const name = typeof raw.name === 'string' && raw.name.trim() !== ''
			? raw.name.trim()
			: `Heater ${addr}`;
		nodes.push({ devId, addr, type, name });
	}
	return nodes;
}

export class RestClient implements TermoWebApi {
	private readonly session: SessionManager;
	private readonly baseUrl: string;
	private readonly fetchImpl: FetchLike;
	private readonly requestTimeoutMs: number;
	private readonly log: TermoWebLogger;

	constructor(options: RestClientOptions) {
		this.session = options.session;
		this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
		this.fetchImpl = options.fetch ?? defaultFetch;
		this.requestTimeoutMs = options.requestTimeoutMs ?? 25_000;
		this.log = options.logger ?? createDefaultLogger('termoweb-rest');
	}

	public getBaseUrl(): string {
		return this.baseUrl;
	}

	public async listDevices(): Promise<TermoWebDevice[]> {
		const body = await this.request({ method: 'GET', path: DEVS_PATH });
		const data = parseJsonBody(body, 'Device list');
		if (pickList(data, ['devs', 'devices']) === undefined) {
			this.log.debug('TermoWeb: unexpected /devs shape; treating as empty.');
		}
		return normalizeDevices(data);
	}

	public async listNodes(devId: string): Promise<HeaterNode[]> {
		const body = await this.request({ method: 'GET', path: this.devicePath(devId, 'mgr/nodes') });
		return normalizeNodes(devId, parseJsonBody(body, 'Node list'));
	}

	public async getHeaterSettings(devId: string, addr: string): Promise<HeaterFields> {
		const body = await this.request({ method: 'GET', path: this.heaterPath(devId, addr, 'settings') });
		const decoded = decodeHeaterSettings(parseJsonBody(body, 'Heater settings'));
		if (decoded.rejected.length > 0) {
			this.log.debug('TermoWeb: %s/%s settings: ignored fields %s', devId, addr, decoded.rejected.join(', '));
		}
		return decoded.fields;
	}

	/** Resolves once the backend accepted the write; the heater applies it later. */
	public async postHeaterSettings(devId: string, addr: string, write: SettingsWrite): Promise<void> {
		const payload = buildSettingsPayload(write);
		this.log.debug('TermoWeb: POST %s/%s settings keys=%s', devId, addr, Object.keys(payload).join(','));
		await this.request({ method: 'POST', path: this.heaterPath(devId, addr, 'settings'), json: payload });
	}

	public async getAdvancedSetup(devId: string, addr: string): Promise<unknown> {
		const body = await this.request({ method: 'GET', path: this.heaterPath(devId, addr, 'advanced_setup') });
		return parseJsonBody(body, 'Advanced setup');
	}

	/**
	 * First phase of the realtime protocol. Returns the raw
	 * `<sid>:<heartbeat>:<disconnect>:<transports>` line.
	 */
	public async realtimeHandshake(devId: string, now: number = Date.now()): Promise<{ body: string; token: string }> {
		let token = '';
		const body = await this.request({ method: 'GET', path: HANDSHAKE_PATH }, (credential) => {
			token = credential;
			return { token: credential, dev_id: devId, t: String(now) };
		});
		return { body, token };
	}

	private devicePath(devId: string, suffix: string): string {
		return `${DEVS_PATH}${encodeURIComponent(devId)}/${suffix}`;
	}

	private heaterPath(devId: string, addr: string, suffix: string): string {
		return this.devicePath(devId, `htr/${encodeURIComponent(addr)}/${suffix}`);
	}

	/**
	 * Send one authenticated request. A 401 invalidates the token, refreshes
	 * once and retries once; a second 401 is an AuthError.
	 */
	private async request(
		req: ApiRequest,
		tokenQuery?: (accessToken: string) => Record<string, string>,
	): Promise<string> {
		for (let attempt = 0; attempt < 2; attempt++) {
			const credential = await this.session.getValidCredential();
			const query = tokenQuery ? tokenQuery(credential.accessToken) : req.query;
			const url = query
				? `${this.baseUrl}${req.path}?${new URLSearchParams(query).toString()}`
				: `${this.baseUrl}${req.path}`;

			const headers: Record<string, string> = {
				'Authorization': `${credential.tokenType} ${credential.accessToken}`,
				'Accept': 'application/json',
				'User-Agent': USER_AGENT,
				'Accept-Language': ACCEPT_LANGUAGE,
			};
			let body: string | undefined;
			if (req.json !== undefined) {
				headers['Content-Type'] = 'application/json';
				body = JSON.stringify(req.json);
			}

			const res = await sendRequest(this.fetchImpl, url, { method: req.method, headers, body }, this.requestTimeoutMs);

			if (res.status === 401) {
				this.session.invalidate(credential.accessToken);
				if (attempt === 0) {
					this.log.debug('TermoWeb: %s %s -> 401; refreshing token and retrying.', req.method, req.path);
					continue;
				}
				throw new AuthError(`Unauthorized: ${req.method} ${req.path}`);
			}

			if (!res.ok) {
				this.log.error(
					'TermoWeb: HTTP error %s %s -> %d; body=%s',
					req.method,
					redactToken(url),
					res.status,
					redactToken(res.body.slice(0, 200)),
				);
				const message = res.status === 429
					? `Rate limited: ${req.method} ${req.path}`
					: `${req.method} ${req.path} failed with status ${res.status}`;
				throw new TransportError(message, res.status);
			}

			return res.body;
		}
		throw new AuthError(`Unauthorized: ${req.method} ${req.path}`);
	}
}
