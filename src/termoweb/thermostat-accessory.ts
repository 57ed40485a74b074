// src/termoweb/thermostat-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import {
	HEATING_COOLING,
	applyAccessoryInformation,
	currentHeatingState,
	currentTemperatureCelsius,
	displayUnits,
	fromCelsius,
	heaterAccessoryInfo,
	modeToTargetState,
	targetStateToMode,
	targetTemperatureCelsius,
	type TermoWebAccessoryContext,
	type TermoWebAccessoryEnv,
} from './accessory-helpers.js';
import { ValidationError, describeError } from './errors.js';
import { nodeKey, setpointRange, type HeaterMode, type HeaterNode, type HeaterState } from './types.js';

export type ThermostatUpdater = (state: HeaterState) => void;

/**
 * Wire a HomeKit Thermostat service to one heater. Returns the function the
 * platform calls with every state change so characteristics are pushed.
 */
export function configureThermostatAccessory(
	env: TermoWebAccessoryEnv,
	heater: HeaterNode,
	accessory: PlatformAccessory<TermoWebAccessoryContext>,
): ThermostatUpdater {
	const { Service, Characteristic } = env.api.hap;
	const label = `${heater.name} (${nodeKey(heater)})`;
	const now = env.now ?? (() => new Date());

	const service =
		accessory.getService(Service.Thermostat) ||
		accessory.addService(Service.Thermostat, heater.name);

	applyAccessoryInformation(env.api, accessory, heaterAccessoryInfo(heater, heater.name));

	accessory.context.termoweb = { devId: heater.devId, addr: heater.addr };

	const requireState = (): HeaterState => {
		const state = env.backend.getState(heater);
		if (!state) {
			throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
		}
		return state;
	};

	const toHapError = (err: unknown): Error => {
		const status = err instanceof ValidationError
			? env.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST
			: env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE;
		return new env.api.hap.HapStatusError(status);
	};

	const { min, max } = setpointRange('C');
	service
		.getCharacteristic(Characteristic.TargetTemperature)
		.setProps({ minValue: min, maxValue: max, minStep: 0.5 });

	service
		.getCharacteristic(Characteristic.TargetHeatingCoolingState)
		.setProps({ validValues: [HEATING_COOLING.OFF, HEATING_COOLING.HEAT, HEATING_COOLING.AUTO] });

	service
		.getCharacteristic(Characteristic.CurrentTemperature)
		.onGet(() => {
			const current = currentTemperatureCelsius(requireState());
			if (current === null) {
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
			}
			return current;
		});

	service
		.getCharacteristic(Characteristic.TargetTemperature)
		.onGet(() => targetTemperatureCelsius(requireState(), now()))
		.onSet(async (value: CharacteristicValue) => {
			const state = requireState();
			if (typeof value !== 'number') {
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
			}
			const target = fromCelsius(value, state.units);
			env.log.info('TermoWeb: TargetTemperature.set -> %s°%s for %s', target, state.units, label);
			try {
				await env.backend.setManualSetpoint(heater, target);
			} catch (err) {
				env.log.warn('TermoWeb: TargetTemperature.set failed for %s: %s', label, describeError(err));
				throw toHapError(err);
			}
		});

	service
		.getCharacteristic(Characteristic.CurrentHeatingCoolingState)
		.onGet(() => currentHeatingState(requireState()));

	service
		.getCharacteristic(Characteristic.TargetHeatingCoolingState)
		.onGet(() => modeToTargetState(requireState().mode))
		.onSet(async (value: CharacteristicValue) => {
			let mode: HeaterMode;
			try {
				mode = targetStateToMode(value);
			} catch (err) {
				env.log.warn('TermoWeb: %s for %s', describeError(err), label);
				throw toHapError(err);
			}
			env.log.info('TermoWeb: TargetHeatingCoolingState.set -> %s for %s', mode, label);
			try {
				await env.backend.setMode(heater, mode);
			} catch (err) {
				env.log.warn('TermoWeb: TargetHeatingCoolingState.set failed for %s: %s', label, describeError(err));
				throw toHapError(err);
			}
		});

	// Units follow the heater; HomeKit's choice only affects its own display.
	service
		.getCharacteristic(Characteristic.TemperatureDisplayUnits)
		.onGet(() => displayUnits(requireState()));

	return (state: HeaterState) => {
		const current = currentTemperatureCelsius(state);
		if (current !== null) {
			service.updateCharacteristic(Characteristic.CurrentTemperature, current);
		}
		service.updateCharacteristic(Characteristic.TargetTemperature, targetTemperatureCelsius(state, now()));
		service.updateCharacteristic(Characteristic.CurrentHeatingCoolingState, currentHeatingState(state));
		service.updateCharacteristic(Characteristic.TargetHeatingCoolingState, modeToTargetState(state.mode));
		service.updateCharacteristic(Characteristic.TemperatureDisplayUnits, displayUnits(state));
	};
}
