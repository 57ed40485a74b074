// src/termoweb/gateway-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import {
	applyAccessoryInformation,
	connectivityContactState,
	connectivityFault,
	gatewayAccessoryInfo,
	type TermoWebAccessoryContext,
	type TermoWebAccessoryEnv,
} from './accessory-helpers.js';
import { describeError } from './errors.js';
import type { TermoWebDevice } from './types.js';

export type GatewayUpdater = (online: boolean) => void;

// The refresh switch is momentary.
const SWITCH_RESET_MS = 1_000;

/**
 * Wire the per-gateway accessory: a contact sensor that stays closed while
 * the cloud connection is up, and a switch that re-lists devices and heaters.
 */
export function configureGatewayAccessory(
	env: TermoWebAccessoryEnv,
	device: TermoWebDevice,
	accessory: PlatformAccessory<TermoWebAccessoryContext>,
): GatewayUpdater {
	const { Service, Characteristic } = env.api.hap;
	const info = gatewayAccessoryInfo(device);

	const connection =
		accessory.getService(Service.ContactSensor) ||
		accessory.addService(Service.ContactSensor, `${info.name} Connection`);
	const refresh =
		accessory.getService(Service.Switch) ||
		accessory.addService(Service.Switch, `${info.name} Refresh`);

	applyAccessoryInformation(env.api, accessory, info);

	accessory.context.termowebGateway = { devId: device.devId };

	const online = (): boolean => env.backend.isOnline(device.devId) ?? false;

	connection
		.getCharacteristic(Characteristic.ContactSensorState)
		.onGet(() => connectivityContactState(online()));

	connection
		.getCharacteristic(Characteristic.StatusFault)
		.onGet(() => connectivityFault(online()));

	refresh
		.getCharacteristic(Characteristic.On)
		.onGet(() => false)
		.onSet(async (value: CharacteristicValue) => {
			if (value !== true) {
				return;
			}
			env.log.info('TermoWeb: refreshing devices and heaters (%s)', device.devId);
			try {
				await env.backend.refreshInventory();
			} catch (err) {
				env.log.warn('TermoWeb: refresh failed for %s: %s', device.devId, describeError(err));
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
			} finally {
				setTimeout(() => refresh.updateCharacteristic(Characteristic.On, false), SWITCH_RESET_MS);
			}
		});

	return (isOnline: boolean) => {
		connection.updateCharacteristic(Characteristic.ContactSensorState, connectivityContactState(isOnline));
		connection.updateCharacteristic(Characteristic.StatusFault, connectivityFault(isOnline));
	};
}
