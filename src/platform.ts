// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { parsePlatformConfig, type TermoWebPlatformConfig } from './config.js';
import type { TermoWebAccessoryContext, TermoWebAccessoryEnv } from './termoweb/accessory-helpers.js';
import { CancelledError, describeError } from './termoweb/errors.js';
import { configureGatewayAccessory, type GatewayUpdater } from './termoweb/gateway-accessory.js';
import type { TermoWebLogger } from './termoweb/logger.js';
import { RealtimeClient } from './termoweb/realtime-client.js';
import { RestClient } from './termoweb/rest-client.js';
import { SessionManager } from './termoweb/session-manager.js';
import { StateStore } from './termoweb/state-store.js';
import { SyncCoordinator } from './termoweb/sync-coordinator.js';
import { configureThermostatAccessory, type ThermostatUpdater } from './termoweb/thermostat-accessory.js';
import { TokenStore } from './termoweb/token-store.js';
import { nodeKey, type HeaterNode } from './termoweb/types.js';

const toTermoWebLogger = (log: Logger): TermoWebLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class TermoWebPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory<TermoWebAccessoryContext>[] = [];
	public configureAccessory(accessory: PlatformAccessory<TermoWebAccessoryContext>): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly settings: TermoWebPlatformConfig | null;
	private readonly logger: TermoWebLogger;

	private coordinator: SyncCoordinator | null = null;
	private accessoryEnv: TermoWebAccessoryEnv | null = null;
	private readonly updaters = new Map<string, ThermostatUpdater>();
	private readonly gatewayUpdaters = new Map<string, GatewayUpdater>();

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;
		this.logger = toTermoWebLogger(log);

		let settings: TermoWebPlatformConfig | null = null;
		try {
			settings = parsePlatformConfig(config);
		} catch (err) {
			this.log.warn('TermoWeb: invalid configuration (%s); skipping cloud login.', describeError(err));
		}
		this.settings = settings;

		this.log.info(config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.loadTermoWeb();
		});

		this.api.on('shutdown', () => {
			const coordinator = this.coordinator;
			this.coordinator = null;
			coordinator?.stop().catch((err: unknown) => {
				this.log.warn('TermoWeb: shutdown failed: %s', describeError(err));
			});
		});
	}

	private async loadTermoWeb(): Promise<void> {
		const settings = this.settings;
		if (!settings) {
			return;
		}

		const requestTimeoutMs = settings.requestTimeout * 1000;
		const session = new SessionManager({
			clientAuth: settings.clientAuth,
			baseUrl: settings.baseUrl,
			requestTimeoutMs,
			tokenStore: new TokenStore(this.api.user.storagePath()),
			logger: this.logger,
		});
		const rest = new RestClient({
			session,
			baseUrl: settings.baseUrl,
			requestTimeoutMs,
			logger: this.logger,
		});

		const coordinator = new SyncCoordinator({
			api: rest,
			session,
			store: new StateStore({ freezeWindowMs: settings.freezeWindow * 1000, logger: this.logger }),
			realtimeFactory: settings.realtime
				? (devId) => new RealtimeClient({ devId, source: rest, logger: this.logger })
				: undefined,
			pollIntervalMs: settings.pollInterval * 1000,
			logger: this.logger,
		});
		this.coordinator = coordinator;

		this.accessoryEnv = {
			log: this.log,
			api: this.api,
			backend: coordinator,
		};

		coordinator.onChange((node, state) => {
			this.updaters.get(nodeKey(node))?.(state);
		});
		coordinator.onInventoryChange((heaters) => {
			this.syncAccessories(heaters);
		});
		coordinator.onConnectionChange((devId, state) => {
			this.log.debug('TermoWeb: realtime %s -> %s (attempt %d)', devId, state.phase, state.attempt);
		});
		coordinator.onConnectivityChange((devId, online) => {
			this.log.info('TermoWeb: gateway %s is %s.', devId, online ? 'online' : 'offline');
			this.gatewayUpdaters.get(devId)?.(online);
		});

		try {
			await session.restore(settings.username, settings.password);
			await coordinator.startWithRetry();
			this.syncAccessories(coordinator.listHeaters());
		} catch (err) {
			if (err instanceof CancelledError) {
				this.log.debug('TermoWeb: startup cancelled by shutdown.');
				return;
			}
			this.log.error('TermoWeb: cloud login failed: %s', describeError(err));
		}
	}

	private findOrRegister(uuid: string, name: string, key: string): PlatformAccessory<TermoWebAccessoryContext> {
		const cached = this.accessories.find((acc) => acc.UUID === uuid);
		if (cached) {
			this.log.info('TermoWeb: using cached accessory for %s (%s)', name, key);
			return cached;
		}
		this.log.info('TermoWeb: registering new accessory for %s (%s)', name, key);
		const accessory = new this.api.platformAccessory<TermoWebAccessoryContext>(name, uuid);
		this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
		this.accessories.push(accessory);
		return accessory;
	}

	/** Register new heaters and gateways, reattach cached ones, and drop the ones that are gone. */
	private syncAccessories(heaters: HeaterNode[]): void {
		const env = this.accessoryEnv;
		const coordinator = this.coordinator;
		if (!env || !coordinator) {
			return;
		}

		const wantedGateways = new Set<string>();
		for (const device of coordinator.listDevices()) {
			wantedGateways.add(device.devId);
			if (this.gatewayUpdaters.has(device.devId)) {
				continue;
			}
			const uuid = this.api.hap.uuid.generate(`termoweb-gateway-${device.devId}`);
			const accessory = this.findOrRegister(uuid, device.name || device.devId, device.devId);
			const update = configureGatewayAccessory(env, device, accessory);
			this.gatewayUpdaters.set(device.devId, update);
			update(coordinator.isOnline(device.devId) ?? false);
		}

		const wanted = new Set<string>();
		for (const heater of heaters) {
			const key = nodeKey(heater);
			wanted.add(key);
			if (this.updaters.has(key)) {
				continue;
			}

			const uuid = this.api.hap.uuid.generate(`termoweb-${key}`);
			const accessory = this.findOrRegister(uuid, heater.name, key);

			const update = configureThermostatAccessory(env, heater, accessory);
			this.updaters.set(key, update);

			const state = coordinator.getState(heater);
			if (state) {
				update(state);
			}
		}

		const stale = this.accessories.filter((acc) => {
			const ref = acc.context.termoweb;
			const gateway = acc.context.termowebGateway;
			if (ref) {
				return !wanted.has(nodeKey(ref));
			}
			return !gateway || !wantedGateways.has(gateway.devId);
		});
		if (stale.length === 0) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('TermoWeb: removing accessory %s; no longer reported.', accessory.displayName);
			const ref = accessory.context.termoweb;
			if (ref) {
				this.updaters.delete(nodeKey(ref));
			}
			const gateway = accessory.context.termowebGateway;
			if (gateway) {
				this.gatewayUpdaters.delete(gateway.devId);
			}
			this.accessories.splice(this.accessories.indexOf(accessory), 1);
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
	}
}
