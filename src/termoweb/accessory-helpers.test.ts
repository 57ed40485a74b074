import { describe, expect, it } from 'vitest';

import {
	CONTACT_STATE,
	DISPLAY_UNITS,
	HEATING_COOLING,
	STATUS_FAULT,
	connectivityContactState,
	connectivityFault,
	currentHeatingState,
	currentTemperatureCelsius,
	displayUnits,
	fromCelsius,
	gatewayAccessoryInfo,
	heaterAccessoryInfo,
	isHeating,
	modeToTargetState,
	targetStateToMode,
	targetTemperatureCelsius,
	toCelsius,
} from './accessory-helpers.js';
import { ValidationError } from './errors.js';
import { SCHEDULE_LENGTH, type HeaterState, type ScheduleSlot } from './types.js';

function heater(overrides: Partial<HeaterState> = {}): HeaterState {
	return {
		state: 'active',
		mode: 'manual',
		mtemp: 19.5,
		stemp: 21,
		units: 'C',
		ptemp: [7, 16, 20],
		prog: new Array<ScheduleSlot>(SCHEDULE_LENGTH).fill(1),
		priority: null,
		name: 'Lounge',
		...overrides,
	};
}

describe('accessory helpers', () => {
	it('should map heater modes to HomeKit target states and back', () => {
		expect(modeToTargetState('off')).toBe(HEATING_COOLING.OFF);
		expect(modeToTargetState('manual')).toBe(HEATING_COOLING.HEAT);
		expect(modeToTargetState('auto')).toBe(HEATING_COOLING.AUTO);

		expect(targetStateToMode(0)).toBe('off');
		expect(targetStateToMode(1)).toBe('manual');
		expect(targetStateToMode(3)).toBe('auto');
	});

	it('should refuse cooling', () => {
		expect(() => targetStateToMode(HEATING_COOLING.COOL)).toThrow(ValidationError);
		expect(() => targetStateToMode(2)).toThrow('unsupported target heating state 2');
	});

	it('should only report heating for an active, switched-on heater', () => {
		expect(isHeating(heater())).toBe(true);
		expect(isHeating(heater({ state: 'Idle' }))).toBe(false);
		expect(isHeating(heater({ state: '' }))).toBe(false);
		expect(isHeating(heater({ mode: 'off' }))).toBe(false);
		expect(currentHeatingState(heater())).toBe(HEATING_COOLING.HEAT);
		expect(currentHeatingState(heater({ state: 'standby' }))).toBe(HEATING_COOLING.OFF);
	});

	it('should convert Fahrenheit heaters for HomeKit', () => {
		expect(toCelsius(68, 'F')).toBe(20);
		expect(toCelsius(70, 'F')).toBe(21.1);
		expect(fromCelsius(21, 'F')).toBe(69.8);
		expect(fromCelsius(21, 'C')).toBe(21);
	});

	it('should fall back to the active program preset when there is no setpoint', () => {
		const at = new Date(2024, 0, 1, 8, 0);

		expect(targetTemperatureCelsius(heater(), at)).toBe(21);
		expect(targetTemperatureCelsius(heater({ stemp: null }), at)).toBe(16);
	});

	it('should report missing readings as null', () => {
		expect(currentTemperatureCelsius(heater({ mtemp: null }))).toBeNull();
		expect(currentTemperatureCelsius(heater({ mtemp: 66.2, units: 'F' }))).toBe(19);
	});

	it('should follow the heater for display units', () => {
		expect(displayUnits(heater())).toBe(DISPLAY_UNITS.CELSIUS);
		expect(displayUnits(heater({ units: 'F' }))).toBe(DISPLAY_UNITS.FAHRENHEIT);
	});

	it('should show a reachable gateway as a closed contact without a fault', () => {
		expect(connectivityContactState(true)).toBe(CONTACT_STATE.DETECTED);
		expect(connectivityFault(true)).toBe(STATUS_FAULT.NO_FAULT);
		expect(connectivityContactState(false)).toBe(CONTACT_STATE.NOT_DETECTED);
		expect(connectivityFault(false)).toBe(STATUS_FAULT.GENERAL_FAULT);
	});

	it('should describe heaters and gateways for the accessory information service', () => {
		expect(heaterAccessoryInfo({ devId: 'dev1', addr: '2' }, 'Bedroom')).toEqual({
			name: 'Bedroom',
			model: 'Heater (htr)',
			serialNumber: 'dev1-2',
		});
		expect(gatewayAccessoryInfo({ devId: 'dev1', name: '', nodes: [], raw: {} })).toEqual({
			name: 'dev1',
			model: 'Gateway',
			serialNumber: 'dev1',
		});
	});
});
