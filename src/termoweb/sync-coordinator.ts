// src/termoweb/sync-coordinator.ts
import { computeBackoffMs } from './backoff.js';
import { writeToFields, type SettingsWrite } from './encoding.js';
import { CancelledError, TransportError, ValidationError, describeError, isTransientError } from './errors.js';
import { createDefaultLogger, type TermoWebLogger } from './logger.js';
import type { ConnectionState, RealtimeChannel, RealtimeEvent } from './realtime-client.js';
import type { RealtimeDelta } from './realtime-frames.js';
import type { TermoWebApi } from './rest-client.js';
import { StateStore, type StateChangeListener } from './state-store.js';
import {
	nodeKey,
	validateMode,
	validatePresets,
	validateSchedule,
	validateSetpoint,
	type HeaterMode,
	type HeaterNode,
	type HeaterState,
	type NodeRef,
	type TermoWebDevice,
} from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 120_000;
export const HEALTH_POLL_INTERVAL_MS = 2_700_000;
export const MAX_POLL_BACKOFF_MS = 3_600_000;
export const STARTUP_RETRY_BASE_MS = 30_000;

export type ConnectionChangeListener = (devId: string, state: ConnectionState) => void;
export type ConnectivityChangeListener = (devId: string, online: boolean) => void;
export type InventoryChangeListener = (heaters: HeaterNode[]) => void;

/** The part of the session the coordinator drives: initial login and teardown. */
export interface SessionHandle {
	getValidCredential(): Promise<unknown>;
	close(): void;
}

export interface DeviceExtras {
	geoData?: unknown;
	powerLimit?: unknown;
}

export interface SyncCoordinatorOptions {
	api: TermoWebApi;
	session: SessionHandle;
	/** Builds the push channel for a device; leave out to run on polling alone. */
	realtimeFactory?: (devId: string) => RealtimeChannel;
	store?: StateStore;
	pollIntervalMs?: number;
	healthPollIntervalMs?: number;
	/** First delay before retrying a start that failed on the network. */
	startRetryBaseMs?: number;
	logger?: TermoWebLogger;
	now?: () => number;
}

interface DeviceEntry {
	device: TermoWebDevice;
	realtime: RealtimeChannel | null;
	/** Epoch whose snapshot has been applied; deltas from any other epoch are dropped. */
	acceptedEpoch: number | null;
	pollTimer?: ReturnType<typeof setTimeout>;
	nextPollAt: number;
	pollFailures: number;
	polling: Promise<void> | null;
	/** Last connectivity reported to listeners; null before the first report. */
	online: boolean | null;
	extras: DeviceExtras;
	advanced: Map<string, unknown>;
}

/**
 * Runs the whole integration for one account: discovery, per-device push
 * connections with polling fallback, and serialized writes per heater.
 */
export class SyncCoordinator {
	private readonly api: TermoWebApi;
	private readonly session: SessionHandle;
	private readonly realtimeFactory?: (devId: string) => RealtimeChannel;
	private readonly store: StateStore;
	private readonly pollIntervalMs: number;
	private readonly healthPollIntervalMs: number;
	private readonly startRetryBaseMs: number;
	private readonly log: TermoWebLogger;
	private readonly now: () => number;

	private readonly devices = new Map<string, DeviceEntry>();
	private readonly writeLocks = new Map<string, Promise<void>>();
	private readonly connectionListeners: ConnectionChangeListener[] = [];
	private readonly inventoryListeners: InventoryChangeListener[] = [];
	private readonly connectivityListeners: ConnectivityChangeListener[] = [];
	private retryWait: { timer: ReturnType<typeof setTimeout>; resolve: () => void } | null = null;

	private started = false;
	private live = false;
	private stopped = false;

	constructor(options: SyncCoordinatorOptions) {
		this.api = options.api;
		this.session = options.session;
		this.realtimeFactory = options.realtimeFactory;
		this.log = options.logger ?? createDefaultLogger('termoweb');
		this.now = options.now ?? Date.now;
		this.store = options.store ?? new StateStore({ logger: this.log, now: this.now });
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.healthPollIntervalMs = options.healthPollIntervalMs ?? HEALTH_POLL_INTERVAL_MS;
		this.startRetryBaseMs = options.startRetryBaseMs ?? STARTUP_RETRY_BASE_MS;
	}

	// ---- lifecycle ----

	public async start(): Promise<void> {
		if (this.started) {
			return;
		}
		this.started = true;

		try {
			await this.session.getValidCredential();
			this.assertRunning();
			await this.refreshInventory();
			this.assertRunning();
		} catch (err) {
			this.started = false;
			throw err;
		}

		for (const entry of this.devices.values()) {
			this.startDevice(entry);
		}
		this.live = true;
		this.log.info(
			'TermoWeb: started with %d device(s), %d heater(s).',
			this.devices.size,
			this.listHeaters().length,
		);
	}

	/**
	 * start(), retried with backoff while the cloud is unreachable. Auth and
	 * validation failures are not retried; stop() ends the wait with a
	 * CancelledError.
	 */
	public async startWithRetry(): Promise<void> {
		for (let attempt = 1; ; attempt++) {
			try {
				await this.start();
				return;
			} catch (err) {
				if (this.stopped || !isTransientError(err)) {
					throw err;
				}
				const delay = computeBackoffMs(attempt, { baseMs: this.startRetryBaseMs, capMs: MAX_POLL_BACKOFF_MS });
				this.log.warn(
					'TermoWeb: cloud not reachable (%s); retrying in %ds.',
					describeError(err),
					Math.round(delay / 1000),
				);
				await this.waitBeforeRetry(delay);
				this.assertRunning();
			}
		}
	}

	/** Cancel timers and sockets, clear state, and fail anyone waiting on the session. */
	public async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;
		if (this.retryWait) {
			clearTimeout(this.retryWait.timer);
			this.retryWait.resolve();
			this.retryWait = null;
		}

		const polls: Promise<void>[] = [];
		for (const entry of this.devices.values()) {
			this.stopDevice(entry);
			if (entry.polling) {
				polls.push(entry.polling);
			}
		}
		this.session.close();
		await Promise.allSettled(polls);

		this.devices.clear();
		this.store.clear();
		this.log.info('TermoWeb: stopped.');
	}

	// ---- discovery ----

	/** Re-list devices and heater nodes; new heaters get an initial settings read. */
	public async refreshInventory(): Promise<void> {
		this.assertRunning();
		const listed = await this.api.listDevices();
		this.assertRunning();
		const before = this.heaterKeys();

		const seen = new Set<string>();
		for (const device of listed) {
			seen.add(device.devId);
			let nodes: HeaterNode[];
			try {
				nodes = await this.api.listNodes(device.devId);
			} catch (err) {
				if (err instanceof CancelledError) {
					throw err;
				}
				this.log.warn('TermoWeb: could not list nodes for %s: %s', device.devId, describeError(err));
				nodes = this.devices.get(device.devId)?.device.nodes ?? [];
			}
			this.assertRunning();

			const existing = this.devices.get(device.devId);
			if (existing) {
				existing.device = { ...device, nodes: existing.device.nodes };
				await this.updateNodes(existing, nodes);
				this.assertRunning();
			} else {
				const entry = this.createEntry({ ...device, nodes: [] });
				this.devices.set(device.devId, entry);
				await this.updateNodes(entry, nodes);
				this.assertRunning();
				if (this.live) {
					this.startDevice(entry);
				}
			}
		}

		for (const [devId, entry] of this.devices) {
			if (!seen.has(devId)) {
				this.log.info('TermoWeb: device %s is gone; dropping it.', devId);
				this.stopDevice(entry);
				for (const node of entry.device.nodes) {
					this.store.removeNode(node);
				}
				this.devices.delete(devId);
			}
		}

		this.emitInventoryIfChanged(before);
	}

	// ---- reads ----

	public getState(node: NodeRef): HeaterState | undefined {
		return this.store.snapshot(node);
	}

	public listHeaters(): HeaterNode[] {
		return [...this.devices.values()].flatMap((entry) => entry.device.nodes);
	}

	public listDevices(): TermoWebDevice[] {
		return [...this.devices.values()].map((entry) => entry.device);
	}

	public getDevice(devId: string): TermoWebDevice | undefined {
		return this.devices.get(devId)?.device;
	}

	public getConnectionState(devId: string): ConnectionState | undefined {
		return this.devices.get(devId)?.realtime?.getState();
	}

	/**
	 * Whether the device is reachable: its push connection is up, or, without
	 * one, its last poll succeeded.
	 */
	public isOnline(devId: string): boolean | undefined {
		const entry = this.devices.get(devId);
		return entry ? this.computeOnline(entry) : undefined;
	}

	public getDeviceExtras(devId: string): DeviceExtras | undefined {
		const entry = this.devices.get(devId);
		return entry ? { ...entry.extras } : undefined;
	}

	/** Advanced setup flags; served from the push cache when available. */
	public async getAdvancedSetup(node: NodeRef, refresh = false): Promise<unknown> {
		const entry = this.requireHeater(node);
		if (!refresh && entry.advanced.has(node.addr)) {
			return entry.advanced.get(node.addr);
		}
		const body = await this.api.getAdvancedSetup(node.devId, node.addr);
		entry.advanced.set(node.addr, body);
		return body;
	}

	// ---- notifications ----

	public onChange(listener: StateChangeListener): void {
		this.store.onChange(listener);
	}

	public onConnectionChange(listener: ConnectionChangeListener): void {
		this.connectionListeners.push(listener);
	}

	public onInventoryChange(listener: InventoryChangeListener): void {
		this.inventoryListeners.push(listener);
	}

	public onConnectivityChange(listener: ConnectivityChangeListener): void {
		this.connectivityListeners.push(listener);
	}

	// ---- commands ----

	public async setMode(node: NodeRef, mode: unknown): Promise<void> {
		const target: HeaterMode = validateMode(mode);
		await this.write(node, (state) => {
			if (target === 'manual' && state.stemp !== null) {
				return { mode: target, stemp: state.stemp, units: state.units };
			}
			return { mode: target, units: state.units };
		});
	}

	/** Out-of-range setpoints are clamped to the heater's range. */
	public async setManualSetpoint(node: NodeRef, temperature: unknown): Promise<void> {
		if (typeof temperature !== 'number' || !Number.isFinite(temperature)) {
			throw new ValidationError(`setpoint must be a finite number; got ${String(temperature)}`);
		}
		await this.write(node, (state) => ({
			mode: 'manual',
			stemp: validateSetpoint(temperature, state.units),
			units: state.units,
		}));
	}

	public async setPresetTemperatures(node: NodeRef, presets: unknown): Promise<void> {
		const ptemp = validatePresets(presets);
		await this.write(node, (state) => ({ ptemp, units: state.units }));
	}

	public async setSchedule(node: NodeRef, prog: unknown): Promise<void> {
		const schedule = validateSchedule(prog);
		await this.write(node, (state) => ({ prog: schedule, units: state.units }));
	}

	private async write(node: NodeRef, build: (state: HeaterState) => SettingsWrite): Promise<void> {
		this.assertRunning();
		this.requireHeater(node);
		const key = nodeKey(node);

		await this.withWriteLock(key, async () => {
			this.assertRunning();
			const state = this.store.snapshot(node);
			if (!state) {
				throw new ValidationError(`Unknown heater ${key}`);
			}

			const write = build(state);
			const ticket = this.store.beginWrite(node, writeToFields(write));
			try {
				await this.api.postHeaterSettings(node.devId, node.addr, write);
			} catch (err) {
				this.store.abortWrite(ticket);
				this.log.warn('TermoWeb: write to %s failed: %s', key, describeError(err));
				throw err;
			}
			this.log.debug('TermoWeb: write to %s accepted.', key);
		});
	}

	private async withWriteLock(key: string, run: () => Promise<void>): Promise<void> {
		const previous = this.writeLocks.get(key) ?? Promise.resolve();
		const result = previous.then(run);
		const settled = result.then(
			() => undefined,
			() => undefined,
		);
		this.writeLocks.set(key, settled);
		try {
			await result;
		} finally {
			if (this.writeLocks.get(key) === settled) {
				this.writeLocks.delete(key);
			}
		}
	}

	// ---- per-device machinery ----

	private createEntry(device: TermoWebDevice): DeviceEntry {
		return {
			device,
			realtime: null,
			acceptedEpoch: null,
			nextPollAt: 0,
			pollFailures: 0,
			polling: null,
			online: null,
			extras: {},
			advanced: new Map(),
		};
	}

	private startDevice(entry: DeviceEntry): void {
		if (this.stopped) {
			return;
		}
		const devId = entry.device.devId;
		if (this.realtimeFactory) {
			const realtime = this.realtimeFactory(devId);
			realtime.onEvent((event) => this.handleRealtimeEvent(entry, event));
			realtime.onStateChange((_devId, state) => this.handleConnectionState(entry, state));
			entry.realtime = realtime;
			realtime.start();
		}
		this.updateConnectivity(entry);
		this.schedulePoll(entry, this.currentPollInterval(entry));
	}

	private stopDevice(entry: DeviceEntry): void {
		if (entry.pollTimer) {
			clearTimeout(entry.pollTimer);
			entry.pollTimer = undefined;
		}
		entry.realtime?.stop();
		entry.acceptedEpoch = null;
	}

	private currentPollInterval(entry: DeviceEntry): number {
		return entry.realtime?.getState().phase === 'streaming' ? this.healthPollIntervalMs : this.pollIntervalMs;
	}

	private schedulePoll(entry: DeviceEntry, delayMs: number): void {
		if (this.stopped) {
			return;
		}
		if (entry.pollTimer) {
			clearTimeout(entry.pollTimer);
		}
		entry.nextPollAt = this.now() + delayMs;
		entry.pollTimer = setTimeout(() => {
			entry.pollTimer = undefined;
			entry.polling = this.pollDevice(entry).finally(() => {
				entry.polling = null;
			});
		}, delayMs);
	}

	private async pollDevice(entry: DeviceEntry): Promise<void> {
		const devId = entry.device.devId;
		let failure: unknown = null;

		for (const node of entry.device.nodes) {
			if (this.stopped) {
				return;
			}
			try {
				await this.readHeater(node);
			} catch (err) {
				failure = err;
				break;
			}
		}

		if (this.stopped || !this.devices.has(devId)) {
			return;
		}

		if (failure === null) {
			if (entry.pollFailures > 0) {
				this.log.info('TermoWeb: polling %s recovered.', devId);
			}
			entry.pollFailures = 0;
			this.updateConnectivity(entry);
			this.schedulePoll(entry, this.currentPollInterval(entry));
			return;
		}

		entry.pollFailures++;
		this.updateConnectivity(entry);
		const delay = computeBackoffMs(entry.pollFailures + 1, {
			baseMs: this.pollIntervalMs,
			capMs: MAX_POLL_BACKOFF_MS,
		});
		const reason = failure instanceof TransportError && failure.rateLimited
			? 'rate limited'
			: describeError(failure);
		this.log.warn('TermoWeb: poll of %s failed (%s); next poll in %ds.', devId, reason, Math.round(delay / 1000));
		this.schedulePoll(entry, delay);
	}

	private async readHeater(node: HeaterNode): Promise<void> {
		const fields = await this.api.getHeaterSettings(node.devId, node.addr);
		if (!this.stopped) {
			this.store.applyObservation(node, fields, 'poll');
		}
	}

	private async updateNodes(entry: DeviceEntry, nodes: HeaterNode[]): Promise<void> {
		const previous = new Set(entry.device.nodes.map(nodeKey));
		const next = new Set(nodes.map(nodeKey));

		for (const node of entry.device.nodes) {
			if (!next.has(nodeKey(node))) {
				this.store.removeNode(node);
				entry.advanced.delete(node.addr);
			}
		}
		entry.device = { ...entry.device, nodes };

		for (const node of nodes) {
			this.store.ensureNode(node, node.name);
			if (previous.has(nodeKey(node))) {
				continue;
			}
			try {
				await this.readHeater(node);
			} catch (err) {
				if (err instanceof CancelledError) {
					throw err;
				}
				this.log.warn('TermoWeb: initial read of %s failed: %s', nodeKey(node), describeError(err));
			}
		}
	}

	private handleConnectionState(entry: DeviceEntry, state: ConnectionState): void {
		if (state.phase !== 'streaming' && state.phase !== 'connected') {
			entry.acceptedEpoch = null;
		}

		// Fell back to polling: pull the next poll forward if it was parked on the health interval.
		if (state.phase !== 'streaming' && entry.polling === null && entry.pollFailures === 0) {
			const due = this.now() + this.pollIntervalMs;
			if (entry.nextPollAt > due) {
				this.schedulePoll(entry, this.pollIntervalMs);
			}
		}

		for (const listener of this.connectionListeners) {
			listener(entry.device.devId, state);
		}
		this.updateConnectivity(entry);
	}

	private computeOnline(entry: DeviceEntry): boolean {
		if (entry.realtime) {
			const phase = entry.realtime.getState().phase;
			return phase === 'connected' || phase === 'streaming';
		}
		return entry.pollFailures === 0;
	}

	private updateConnectivity(entry: DeviceEntry): void {
		if (this.stopped) {
			return;
		}
		const online = this.computeOnline(entry);
		if (online === entry.online) {
			return;
		}
		entry.online = online;
		for (const listener of this.connectivityListeners) {
			listener(entry.device.devId, online);
		}
	}

	private waitBeforeRetry(delayMs: number): Promise<void> {
		return new Promise<void>((resolve) => {
			const timer = setTimeout(() => {
				this.retryWait = null;
				resolve();
			}, delayMs);
			this.retryWait = { timer, resolve };
		});
	}

	private handleRealtimeEvent(entry: DeviceEntry, event: RealtimeEvent): void {
		if (this.stopped) {
			return;
		}
		if (event.kind === 'snapshot') {
			entry.acceptedEpoch = event.epoch;
		} else if (entry.acceptedEpoch !== event.epoch) {
			this.log.debug(
				'TermoWeb: dropping %d delta(s) for %s from epoch %d (accepted %s).',
				event.deltas.length,
				event.devId,
				event.epoch,
				String(entry.acceptedEpoch),
			);
			return;
		}

		const before = this.heaterKeys();
		for (const delta of event.deltas) {
			this.applyDelta(entry, delta);
		}
		this.emitInventoryIfChanged(before);
	}

	private applyDelta(entry: DeviceEntry, delta: RealtimeDelta): void {
		const devId = entry.device.devId;
		switch (delta.kind) {
			case 'heaterSettings': {
				const node = entry.device.nodes.find((candidate) => candidate.addr === delta.addr);
				if (!node) {
					this.log.debug('TermoWeb: settings push for unknown heater %s/%s ignored.', devId, delta.addr);
					return;
				}
				this.store.applyObservation(node, delta.fields, 'realtime');
				return;
			}
			case 'advancedSetup':
				entry.advanced.set(delta.addr, delta.body);
				return;
			case 'nodeList':
				this.applyNodeList(entry, delta.nodes);
				return;
			case 'geoData':
				entry.extras.geoData = delta.body;
				return;
			case 'powerLimit':
				entry.extras.powerLimit = delta.body;
				return;
			case 'unknown':
				this.log.debug('TermoWeb: unhandled push path %s for %s.', delta.path, devId);
				return;
		}
	}

	/** Node lists from the socket; new heaters get their settings on the next poll or push. */
	private applyNodeList(entry: DeviceEntry, nodes: HeaterNode[]): void {
		const next = new Set(nodes.map(nodeKey));
		for (const node of entry.device.nodes) {
			if (!next.has(nodeKey(node))) {
				this.store.removeNode(node);
				entry.advanced.delete(node.addr);
			}
		}
		for (const node of nodes) {
			this.store.ensureNode(node, node.name);
		}
		entry.device = { ...entry.device, nodes };
	}

	private heaterKeys(): string {
		return this.listHeaters().map(nodeKey).sort().join('|');
	}

	private emitInventoryIfChanged(before: string): void {
		if (this.heaterKeys() === before) {
			return;
		}
		const heaters = this.listHeaters();
		for (const listener of this.inventoryListeners) {
			listener(heaters);
		}
	}

	private requireHeater(node: NodeRef): DeviceEntry {
		const entry = this.devices.get(node.devId);
		if (!entry || !entry.device.nodes.some((candidate) => candidate.addr === node.addr)) {
			throw new ValidationError(`Unknown heater ${nodeKey(node)}`);
		}
		return entry;
	}

	private assertRunning(): void {
		if (this.stopped) {
			throw new CancelledError('Coordinator stopped');
		}
	}
}
