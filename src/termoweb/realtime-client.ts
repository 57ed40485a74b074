// src/termoweb/realtime-client.ts
import WebSocket from 'ws';

import { computeBackoffMs } from './backoff.js';
import { RealtimeError, describeError } from './errors.js';
import { createDefaultLogger, redactToken, type TermoWebLogger } from './logger.js';
import {
	DISCONNECT_FRAME,
	HEARTBEAT_FRAME,
	JOIN_FRAME,
	NAMESPACE,
	SNAPSHOT_REQUEST_FRAME,
	decodeDataEvent,
	decodeSnapshot,
	heartbeatSendIntervalMs,
	parseFrame,
	parseHandshake,
	type RealtimeDelta,
	type SocketFrame,
} from './realtime-frames.js';

export type RealtimePhase = 'disconnected' | 'handshaking' | 'connected' | 'streaming' | 'reconnecting';

export interface ConnectionState {
	phase: RealtimePhase;
	/** Consecutive failed connection attempts since the last successful open. */
	attempt: number;
	/** Incremented every time a socket opens. */
	epoch: number;
	lastFrameAt: number | null;
	lastError?: string;
}

export interface RealtimeEvent {
	/** `snapshot` is a `dev_data` reply or the first `data` push of a connection. */
	kind: 'snapshot' | 'deltas';
	devId: string;
	epoch: number;
	deltas: RealtimeDelta[];
}

export type RealtimeEventListener = (event: RealtimeEvent) => void;
export type ConnectionStateListener = (devId: string, state: ConnectionState) => void;

/** What the coordinator needs from a per-device push connection. */
export interface RealtimeChannel {
	start(): void;
	stop(): void;
	onEvent(listener: RealtimeEventListener): void;
	onStateChange(listener: ConnectionStateListener): void;
	getState(): ConnectionState;
}

export interface SocketHandlers {
	onOpen(): void;
	onMessage(text: string): void;
	onClose(reason: string): void;
	onError(err: Error): void;
}

export interface RealtimeSocket {
	send(frame: string): void;
	close(): void;
}

export type RealtimeSocketFactory = (url: string, handlers: SocketHandlers) => RealtimeSocket;

export interface HandshakeSource {
	getBaseUrl(): string;
	realtimeHandshake(devId: string, now?: number): Promise<{ body: string; token: string }>;
}

function rawToString(data: WebSocket.RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString('utf8');
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data).toString('utf8');
	}
	return data.toString('utf8');
}

export const wsSocketFactory: RealtimeSocketFactory = (url, handlers) => {
	const ws = new WebSocket(url, { handshakeTimeout: 15_000 });
	ws.on('open', () => handlers.onOpen());
	ws.on('message', (data: WebSocket.RawData) => handlers.onMessage(rawToString(data)));
	ws.on('close', (code: number, reason: Buffer) => handlers.onClose(`${code} ${reason.toString()}`.trim()));
	ws.on('error', (err: Error) => handlers.onError(err));
	return {
		send: (frame) => ws.send(frame),
		close: () => ws.terminate(),
	};
};

export interface RealtimeClientOptions {
	devId: string;
	source: HandshakeSource;
	socketFactory?: RealtimeSocketFactory;
	logger?: TermoWebLogger;
	now?: () => number;
	random?: () => number;
	reconnectBaseMs?: number;
	reconnectCapMs?: number;
}

/**
 * One push connection per device, speaking the legacy Socket.IO 0.9
 * protocol: handshake, open, join, request a snapshot, then stream deltas.
 * Reconnects forever with jittered exponential backoff until stopped.
 */
export class RealtimeClient implements RealtimeChannel {
	private readonly devId: string;
	private readonly source: HandshakeSource;
	private readonly socketFactory: RealtimeSocketFactory;
	private readonly log: TermoWebLogger;
	private readonly now: () => number;
	private readonly random: () => number;
	private readonly reconnectBaseMs: number;
	private readonly reconnectCapMs: number;

	private readonly eventListeners: RealtimeEventListener[] = [];
	private readonly stateListeners: ConnectionStateListener[] = [];

	private state: ConnectionState = { phase: 'disconnected', attempt: 0, epoch: 0, lastFrameAt: null };
	private running = false;
	private socket: RealtimeSocket | null = null;
	private connecting: Promise<void> | null = null;
	private heartbeatTimer?: ReturnType<typeof setInterval>;
	private watchdogTimer?: ReturnType<typeof setTimeout>;
	private reconnectTimer?: ReturnType<typeof setTimeout>;
	private heartbeatTimeoutMs = 60_000;

	constructor(options: RealtimeClientOptions) {
		this.devId = options.devId;
		this.source = options.source;
		this.socketFactory = options.socketFactory ?? wsSocketFactory;
		this.log = options.logger ?? createDefaultLogger('termoweb-ws');
		this.now = options.now ?? Date.now;
		this.random = options.random ?? Math.random;
		this.reconnectBaseMs = options.reconnectBaseMs ?? 5_000;
		this.reconnectCapMs = options.reconnectCapMs ?? 300_000;
	}

	public onEvent(listener: RealtimeEventListener): void {
		this.eventListeners.push(listener);
	}

	public onStateChange(listener: ConnectionStateListener): void {
		this.stateListeners.push(listener);
	}

	public getState(): ConnectionState {
		return { ...this.state };
	}

	public start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.connect();
	}

	/** Close the socket and cancel any pending reconnect. */
	public stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = undefined;
		}
		const socket = this.socket;
		this.teardownSocket();
		if (socket) {
			this.trySend(socket, DISCONNECT_FRAME);
			socket.close();
		}
		this.setState({ phase: 'disconnected', attempt: 0 });
		this.log.debug('WS %s: stopped.', this.devId);
	}

	/** Resolves when the current connection attempt has settled. Used by tests. */
	public async settled(): Promise<void> {
		await this.connecting;
	}

	private connect(): void {
		this.reconnectTimer = undefined;
		this.setState({ phase: 'handshaking' });
		this.connecting = this.openConnection().catch((err: unknown) => {
			this.handleFailure(err);
		});
	}

	private async openConnection(): Promise<void> {
		const { body, token } = await this.source.realtimeHandshake(this.devId, this.now());
		if (!this.running) {
			return;
		}

		const handshake = parseHandshake(body);
		this.heartbeatTimeoutMs = handshake.heartbeatTimeoutS * 1000;
		const sendIntervalMs = heartbeatSendIntervalMs(handshake.heartbeatTimeoutS);

		const wsBase = this.source.getBaseUrl().replace(/^http/i, 'ws');
		const query = new URLSearchParams({ token, dev_id: this.devId }).toString();
		const url = `${wsBase}/socket.io/1/websocket/${encodeURIComponent(handshake.sid)}?${query}`;
		this.log.debug('WS %s: connecting %s', this.devId, redactToken(url));

		const socket = this.socketFactory(url, {
			onOpen: () => {
				if (this.socket === socket) {
					this.handleOpen(socket, sendIntervalMs);
				}
			},
			onMessage: (text) => {
				if (this.socket === socket) {
					this.handleFrame(socket, text);
				}
			},
			onClose: (reason) => {
				if (this.socket === socket) {
					this.handleFailure(new RealtimeError(`socket closed (${reason || 'no reason'})`));
				}
			},
			onError: (err) => {
				if (this.socket === socket) {
					this.handleFailure(new RealtimeError(`socket error: ${err.message}`, { cause: err }));
				}
			},
		});
		this.socket = socket;
	}

	private handleOpen(socket: RealtimeSocket, sendIntervalMs: number): void {
		this.setState({ phase: 'connected', attempt: 0, epoch: this.state.epoch + 1, lastFrameAt: this.now(), lastError: undefined });
		this.log.info('WS %s: connected (epoch %d).', this.devId, this.state.epoch);

		this.trySend(socket, JOIN_FRAME);
		this.trySend(socket, SNAPSHOT_REQUEST_FRAME);

		this.heartbeatTimer = setInterval(() => this.trySend(socket, HEARTBEAT_FRAME), sendIntervalMs);
		this.armWatchdog();
	}

	private handleFrame(socket: RealtimeSocket, text: string): void {
		this.state.lastFrameAt = this.now();
		this.armWatchdog();

		let frame: SocketFrame;
		try {
			frame = parseFrame(text);
		} catch (err) {
			this.log.warn('WS %s: dropping frame: %s', this.devId, describeError(err));
			return;
		}

		switch (frame.type) {
			case 'heartbeat':
				this.trySend(socket, HEARTBEAT_FRAME);
				return;
			case 'disconnect':
				if (frame.endpoint === '' || frame.endpoint === NAMESPACE) {
					this.handleFailure(new RealtimeError('server disconnect'));
				}
				return;
			case 'error':
				this.log.warn('WS %s: server error frame: %s', this.devId, frame.reason);
				return;
			case 'event':
				if (frame.endpoint === NAMESPACE) {
					this.handleEvent(frame.name, frame.args);
				}
				return;
			default:
				return;
		}
	}

	private handleEvent(name: string, args: unknown[]): void {
		let deltas: RealtimeDelta[];
		let kind: RealtimeEvent['kind'];
		try {
			if (name === 'dev_data') {
				deltas = decodeSnapshot(this.devId, args);
				kind = 'snapshot';
			} else if (name === 'data') {
				deltas = decodeDataEvent(this.devId, args);
				// The first push after joining opens the stream for this epoch.
				kind = this.state.phase === 'streaming' ? 'deltas' : 'snapshot';
			} else {
				this.log.debug('WS %s: ignoring event %s', this.devId, name);
				return;
			}
		} catch (err) {
			this.log.warn('WS %s: dropping %s event: %s', this.devId, name, describeError(err));
			return;
		}

		if (kind === 'snapshot') {
			this.setState({ phase: 'streaming' });
		}
		const event: RealtimeEvent = { kind, devId: this.devId, epoch: this.state.epoch, deltas };
		for (const listener of this.eventListeners) {
			listener(event);
		}
	}

	private handleFailure(err: unknown): void {
		const socket = this.socket;
		this.teardownSocket();
		if (socket) {
			socket.close();
		}
		if (!this.running) {
			return;
		}

		const reason = redactToken(describeError(err));
		this.log.warn('WS %s: connection lost: %s', this.devId, reason);
		this.setState({ phase: 'disconnected', lastError: reason });

		const attempt = this.state.attempt + 1;
		const delay = computeBackoffMs(
			attempt,
			{ baseMs: this.reconnectBaseMs, capMs: this.reconnectCapMs, jitter: [0.8, 1.2] },
			this.random,
		);
		this.log.info('WS %s: reconnecting in %ds (attempt %d).', this.devId, Math.round(delay / 1000), attempt);
		this.setState({ phase: 'reconnecting', attempt });
		this.reconnectTimer = setTimeout(() => this.connect(), delay);
	}

	private armWatchdog(): void {
		if (this.watchdogTimer) {
			clearTimeout(this.watchdogTimer);
		}
		this.watchdogTimer = setTimeout(() => {
			this.watchdogTimer = undefined;
			this.handleFailure(new RealtimeError(`no frame for ${this.heartbeatTimeoutMs / 1000}s`));
		}, this.heartbeatTimeoutMs);
	}

	private teardownSocket(): void {
		this.socket = null;
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = undefined;
		}
		if (this.watchdogTimer) {
			clearTimeout(this.watchdogTimer);
			this.watchdogTimer = undefined;
		}
	}

	private trySend(socket: RealtimeSocket, frame: string): void {
		try {
			socket.send(frame);
		} catch (err) {
			this.log.debug('WS %s: send failed: %s', this.devId, describeError(err));
		}
	}

	private setState(patch: Partial<ConnectionState>): void {
		const next = { ...this.state, ...patch };
		const changed = next.phase !== this.state.phase || next.epoch !== this.state.epoch;
		this.state = next;
		if (!changed) {
			return;
		}
		for (const listener of this.stateListeners) {
			listener(this.devId, this.getState());
		}
	}
}
