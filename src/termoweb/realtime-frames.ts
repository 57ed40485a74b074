// src/termoweb/realtime-frames.ts
// Socket.IO 0.9 framing as spoken by the TermoWeb push endpoint, and the
// decoding of path/body pushes into typed deltas.

import { decodeHeaterSettings } from './encoding.js';
import { RealtimeError } from './errors.js';
import { isRecord } from './http.js';
import { normalizeNodes } from './rest-client.js';
import type { HeaterFields, HeaterNode } from './types.js';

export const NAMESPACE = '/api/v2/socket_io';
export const JOIN_FRAME = `1::${NAMESPACE}`;
export const HEARTBEAT_FRAME = '2::';
export const DISCONNECT_FRAME = `0::${NAMESPACE}`;

const DEFAULT_HEARTBEAT_TIMEOUT_S = 60;

export interface HandshakeResult {
	sid: string;
	heartbeatTimeoutS: number;
	disconnectTimeoutS: number;
	transports: string[];
}

/** Parse `<sid>:<heartbeat_timeout>:<disconnect_timeout>:<transports>`. */
export function parseHandshake(body: string): HandshakeResult {
	const parts = body.trim().split(':');
	if (parts.length < 4 || parts[0] === '') {
		throw new RealtimeError(`Malformed handshake response: ${body.slice(0, 80)}`);
	}

	const [sid, hb, disc, transports] = parts;
	const transportList = transports.split(',').map((t) => t.trim()).filter((t) => t !== '');
	if (!transportList.includes('websocket')) {
		throw new RealtimeError(`Handshake does not offer websocket transport (${transports})`);
	}

	const heartbeat = Number(hb);
	const disconnect = Number(disc);
	return {
		sid,
		heartbeatTimeoutS: Number.isFinite(heartbeat) && heartbeat > 0 ? heartbeat : DEFAULT_HEARTBEAT_TIMEOUT_S,
		disconnectTimeoutS: Number.isFinite(disconnect) && disconnect > 0 ? disconnect : DEFAULT_HEARTBEAT_TIMEOUT_S,
		transports: transportList,
	};
}

export function heartbeatSendIntervalMs(heartbeatTimeoutS: number): number {
	return Math.max(5, Math.min(30, heartbeatTimeoutS * 0.45)) * 1000;
}

export type SocketFrame =
	| { type: 'disconnect'; endpoint: string }
	| { type: 'connect'; endpoint: string }
	| { type: 'heartbeat' }
	| { type: 'event'; endpoint: string; name: string; args: unknown[] }
	| { type: 'error'; endpoint: string; reason: string }
	| { type: 'other'; code: string };

const FRAME_RE = /^(\d+):([^:]*):([^:]*)(?::([\s\S]*))?$/;

/**
 * Parse one text frame. Throws RealtimeError on frames that don't follow the
 * `type:id:endpoint[:data]` layout or carry an undecodable event payload.
 */
export function parseFrame(text: string): SocketFrame {
	const match = FRAME_RE.exec(text);
	if (!match) {
		throw new RealtimeError(`Malformed frame: ${text.slice(0, 80)}`);
	}

	const [, code, , endpoint, data = ''] = match;
	switch (code) {
		case '0':
			return { type: 'disconnect', endpoint };
		case '1':
			return { type: 'connect', endpoint };
		case '2':
			return { type: 'heartbeat' };
		case '5': {
			let payload: unknown;
			try {
				payload = JSON.parse(data);
			} catch (err) {
				throw new RealtimeError(`Undecodable event payload: ${data.slice(0, 80)}`, { cause: err });
			}
			if (!isRecord(payload) || typeof payload.name !== 'string') {
				throw new RealtimeError(`Event frame without a name: ${data.slice(0, 80)}`);
			}
			const args = Array.isArray(payload.args) ? payload.args : [];
			return { type: 'event', endpoint, name: payload.name, args };
		}
		case '7':
			return { type: 'error', endpoint, reason: data };
		default:
			return { type: 'other', code };
	}
}

export function encodeEvent(name: string, args: unknown[] = []): string {
	return `5::${NAMESPACE}:${JSON.stringify({ name, args })}`;
}

export const SNAPSHOT_REQUEST_FRAME = encodeEvent('dev_data');

export type RealtimeDelta =
	| { kind: 'heaterSettings'; addr: string; fields: HeaterFields }
	| { kind: 'advancedSetup'; addr: string; body: unknown }
	| { kind: 'nodeList'; nodes: HeaterNode[] }
	| { kind: 'geoData'; body: unknown }
	| { kind: 'powerLimit'; body: unknown }
	| { kind: 'unknown'; path: string; body: unknown };

const HEATER_PATH_RE = /\/htr\/([^/]+)\/(settings|advanced_setup)$/;

/** Map one pushed path/body pair to a typed delta. */
export function decodeDelta(devId: string, path: string, body: unknown): RealtimeDelta {
	const heater = HEATER_PATH_RE.exec(path);
	if (heater) {
		const addr = decodeURIComponent(heater[1]);
		if (heater[2] === 'settings') {
			return { kind: 'heaterSettings', addr, fields: decodeHeaterSettings(body).fields };
		}
		return { kind: 'advancedSetup', addr, body };
	}
	if (path.endsWith('/mgr/nodes')) {
		return { kind: 'nodeList', nodes: normalizeNodes(devId, body) };
	}
	if (path.endsWith('/geo_data')) {
		return { kind: 'geoData', body };
	}
	if (path.endsWith('/htr_system/power_limit')) {
		return { kind: 'powerLimit', body };
	}
	return { kind: 'unknown', path, body };
}

/** Decode the args of a `data` event: `[[{path, body}, ...]]`. */
export function decodeDataEvent(devId: string, args: unknown[]): RealtimeDelta[] {
	const batch = args[0];
	if (!Array.isArray(batch)) {
		throw new RealtimeError('data event without a delta batch');
	}

	const deltas: RealtimeDelta[] = [];
	for (const item of batch) {
		if (!isRecord(item) || typeof item.path !== 'string') {
			continue;
		}
		deltas.push(decodeDelta(devId, item.path, item.body));
	}
	return deltas;
}

function decodeNodeEntries(devId: string, nodes: unknown[]): RealtimeDelta[] {
	const deltas: RealtimeDelta[] = [{ kind: 'nodeList', nodes: normalizeNodes(devId, nodes) }];
	for (const entry of nodes) {
		if (!isRecord(entry) || entry.addr === undefined || String(entry.type).toLowerCase() !== 'htr') {
			continue;
		}
		const addr = String(entry.addr);
		if (entry.settings !== undefined) {
			deltas.push({ kind: 'heaterSettings', addr, fields: decodeHeaterSettings(entry.settings).fields });
		}
		if (entry.advanced_setup !== undefined) {
			deltas.push({ kind: 'advancedSetup', addr, body: entry.advanced_setup });
		}
	}
	return deltas;
}

function decodeByAddr(section: unknown, apply: (addr: string, body: unknown) => RealtimeDelta): RealtimeDelta[] {
	if (!isRecord(section)) {
		return [];
	}
	return Object.entries(section).map(([addr, body]) => apply(addr, body));
}

/**
 * Decode the reply to a `dev_data` request. The payload is either
 * `{nodes: [...]}` with per-node settings, or `{htr: {settings: {<addr>: ...}}}`
 * keyed by address; device-wide sections ride along in both.
 */
export function decodeSnapshot(devId: string, args: unknown[]): RealtimeDelta[] {
	const data = args[0];
	if (!isRecord(data)) {
		throw new RealtimeError('dev_data reply without a payload object');
	}

	const deltas: RealtimeDelta[] = [];
	if (Array.isArray(data.nodes)) {
		deltas.push(...decodeNodeEntries(devId, data.nodes));
	} else if (isRecord(data.nodes)) {
		deltas.push({ kind: 'nodeList', nodes: normalizeNodes(devId, data.nodes) });
	}

	if (isRecord(data.htr)) {
		deltas.push(...decodeByAddr(data.htr.settings, (addr, body) => ({
			kind: 'heaterSettings',
			addr,
			fields: decodeHeaterSettings(body).fields,
		})));
		deltas.push(...decodeByAddr(data.htr.advanced_setup, (addr, body) => ({
			kind: 'advancedSetup',
			addr,
			body,
		})));
	}

	if (data.geo_data !== undefined) {
		deltas.push({ kind: 'geoData', body: data.geo_data });
	}
	if (isRecord(data.htr_system) && data.htr_system.power_limit !== undefined) {
		deltas.push({ kind: 'powerLimit', body: data.htr_system.power_limit });
	}
	return deltas;
}
