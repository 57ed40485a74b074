// src/termoweb/accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import { ValidationError } from './errors.js';
import {
	activeProgramSetpoint,
	type HeaterMode,
	type HeaterState,
	type NodeRef,
	type TemperatureUnits,
	type TermoWebDevice,
} from './types.js';

// HAP values for the Thermostat characteristics. Kept here so the mapping can
// be tested without a HAP instance.
export const HEATING_COOLING = {
	OFF: 0,
	HEAT: 1,
	COOL: 2,
	AUTO: 3,
} as const;

export const DISPLAY_UNITS = {
	CELSIUS: 0,
	FAHRENHEIT: 1,
} as const;

export const CONTACT_STATE = {
	DETECTED: 0,
	NOT_DETECTED: 1,
} as const;

export const STATUS_FAULT = {
	NO_FAULT: 0,
	GENERAL_FAULT: 1,
} as const;

// Context stored on the accessory
export interface TermoWebAccessoryContext {
	termoweb?: {
		devId: string;
		addr: string;
	};
	termowebGateway?: {
		devId: string;
	};
	[key: string]: unknown;
}

/** What a thermostat accessory needs from the coordinator. */
export interface ThermostatBackend {
	getState(node: NodeRef): HeaterState | undefined;
	setMode(node: NodeRef, mode: unknown): Promise<void>;
	setManualSetpoint(node: NodeRef, temperature: unknown): Promise<void>;
}

/** What a gateway accessory needs from the coordinator. */
export interface GatewayBackend {
	getDevice(devId: string): TermoWebDevice | undefined;
	isOnline(devId: string): boolean | undefined;
	refreshInventory(): Promise<void>;
}

// Minimal runtime "env" that accessory modules need from the platform
export interface TermoWebAccessoryEnv {
	log: Logger;
	api: API;
	backend: ThermostatBackend & GatewayBackend;
	now?: () => Date;
}

export interface AccessoryInfo {
	name: string;
	model: string;
	serialNumber: string;
}

export function modeToTargetState(mode: HeaterMode): number {
	switch (mode) {
		case 'off':
			return HEATING_COOLING.OFF;
		case 'manual':
			return HEATING_COOLING.HEAT;
		case 'auto':
			return HEATING_COOLING.AUTO;
	}
}

/** COOL, or anything else HomeKit might send, has no heater equivalent. */
export function targetStateToMode(value: unknown): HeaterMode {
	switch (value) {
		case HEATING_COOLING.OFF:
			return 'off';
		case HEATING_COOLING.HEAT:
			return 'manual';
		case HEATING_COOLING.AUTO:
			return 'auto';
		default:
			throw new ValidationError(`unsupported target heating state ${String(value)}`);
	}
}

const IDLE_STATES = new Set(['off', 'idle', 'standby']);

export function isHeating(state: HeaterState): boolean {
	const raw = state.state.trim().toLowerCase();
	if (state.mode === 'off' || raw === '') {
		return false;
	}
	return !IDLE_STATES.has(raw);
}

export function currentHeatingState(state: HeaterState): number {
	return isHeating(state) ? HEATING_COOLING.HEAT : HEATING_COOLING.OFF;
}

export function toCelsius(value: number, units: TemperatureUnits): number {
	const c = units === 'F' ? (value - 32) * 5 / 9 : value;
	return Math.round(c * 10) / 10;
}

export function fromCelsius(value: number, units: TemperatureUnits): number {
	const v = units === 'F' ? value * 9 / 5 + 32 : value;
	return Math.round(v * 10) / 10;
}

/**
 * Target temperature as HomeKit sees it (Celsius). Falls back to the active
 * program slot's preset when the heater reports no setpoint.
 */
export function targetTemperatureCelsius(state: HeaterState, now: Date): number {
	const target = state.stemp ?? activeProgramSetpoint(state, now);
	return toCelsius(target, state.units);
}

export function currentTemperatureCelsius(state: HeaterState): number | null {
	return state.mtemp === null ? null : toCelsius(state.mtemp, state.units);
}

export function displayUnits(state: HeaterState): number {
	return state.units === 'F' ? DISPLAY_UNITS.FAHRENHEIT : DISPLAY_UNITS.CELSIUS;
}

// Contact closed while the gateway is reachable, open when it is not.
export function connectivityContactState(online: boolean): number {
	return online ? CONTACT_STATE.DETECTED : CONTACT_STATE.NOT_DETECTED;
}

export function connectivityFault(online: boolean): number {
	return online ? STATUS_FAULT.NO_FAULT : STATUS_FAULT.GENERAL_FAULT;
}

export function heaterAccessoryInfo(node: NodeRef, name: string): AccessoryInfo {
	return { name, model: 'Heater (htr)', serialNumber: `${node.devId}-${node.addr}` };
}

export function gatewayAccessoryInfo(device: TermoWebDevice): AccessoryInfo {
	return { name: device.name || device.devId, model: 'Gateway', serialNumber: device.devId };
}

/**
 * Populate the standard Accessory Information service.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	info: AccessoryInfo,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	infoService.updateCharacteristic(Characteristic.Name, info.name || accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'TermoWeb');
	infoService.updateCharacteristic(Characteristic.Model, info.model);
	infoService.updateCharacteristic(Characteristic.SerialNumber, info.serialNumber);
}
