// src/termoweb/encoding.ts
// Wire format of /htr/<addr>/settings. The backend is picky: temperatures go
// out as one-decimal strings, and a setpoint only sticks together with
// mode=manual.

import { ValidationError } from './errors.js';
import { isRecord } from './http.js';
import {
	PRESET_COUNT,
	SCHEDULE_LENGTH,
	isHeaterMode,
	isScheduleSlot,
	type HeaterFields,
	type HeaterMode,
	type PresetTemperatures,
	type ScheduleSlot,
	type TemperatureUnits,
} from './types.js';

export interface SettingsWrite {
	mode?: HeaterMode;
	stemp?: number;
	ptemp?: PresetTemperatures;
	prog?: readonly ScheduleSlot[];
	units: TemperatureUnits;
}

export interface SettingsPayload {
	units: TemperatureUnits;
	mode?: HeaterMode;
	stemp?: string;
	ptemp?: string[];
	prog?: number[];
}

export function formatTemperature(value: number): string {
	if (!Number.isFinite(value)) {
		throw new ValidationError(`temperature must be a finite number; got ${String(value)}`);
	}
	return value.toFixed(1);
}

export function roundTemperature(value: number): number {
	return Math.round(value * 10) / 10;
}

/**
 * Build the partial POST body. Only the fields present in `write` are sent,
 * plus `units`, which always goes out.
 */
export function buildSettingsPayload(write: SettingsWrite): SettingsPayload {
	const payload: SettingsPayload = { units: write.units };

	if (write.stemp !== undefined) {
		if (write.mode !== undefined && write.mode !== 'manual') {
			throw new ValidationError(`a setpoint can only be written with mode "manual"; got "${write.mode}"`);
		}
		payload.mode = 'manual';
		payload.stemp = formatTemperature(write.stemp);
	} else if (write.mode !== undefined) {
		payload.mode = write.mode;
	}

	if (write.ptemp !== undefined) {
		if (write.ptemp.length !== PRESET_COUNT) {
			throw new ValidationError('ptemp must hold exactly three values [cold, night, day]');
		}
		payload.ptemp = write.ptemp.map(formatTemperature);
	}

	if (write.prog !== undefined) {
		if (write.prog.length !== SCHEDULE_LENGTH) {
			throw new ValidationError(`prog must hold exactly ${SCHEDULE_LENGTH} entries`);
		}
		payload.prog = [...write.prog];
	}

	return payload;
}

export function toNumber(value: unknown): number | undefined {
	if (typeof value === 'number') {
		return Number.isFinite(value) ? value : undefined;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value.trim());
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

function toUnits(value: unknown): TemperatureUnits | undefined {
	if (typeof value !== 'string') {
		return undefined;
	}
	const upper = value.trim().toUpperCase();
	return upper === 'C' || upper === 'F' ? upper : undefined;
}

function toPresets(value: unknown): PresetTemperatures | undefined {
	if (!Array.isArray(value) || value.length !== PRESET_COUNT) {
		return undefined;
	}
	const cold = toNumber(value[0]);
	const night = toNumber(value[1]);
	const day = toNumber(value[2]);
	if (cold === undefined || night === undefined || day === undefined) {
		return undefined;
	}
	return [cold, night, day];
}

function toSchedule(value: unknown): ScheduleSlot[] | undefined {
	if (!Array.isArray(value) || value.length !== SCHEDULE_LENGTH) {
		return undefined;
	}
	const slots: ScheduleSlot[] = [];
	for (const entry of value) {
		const slot = toNumber(entry);
		if (!isScheduleSlot(slot)) {
			return undefined;
		}
		slots.push(slot);
	}
	return slots;
}

export interface DecodedSettings {
	fields: HeaterFields;
	/** Keys that were present but could not be decoded. */
	rejected: string[];
}

/**
 * Decode a settings body from GET or from a push delta. Numbers that arrive
 * as strings are coerced; anything that doesn't fit the heater model is
 * reported in `rejected` and left out of `fields`.
 */
export function decodeHeaterSettings(body: unknown): DecodedSettings {
	const fields: HeaterFields = {};
	const rejected: string[] = [];

	if (!isRecord(body)) {
		return { fields, rejected };
	}

	const take = <T>(key: string, decoded: T | undefined, assign: (value: T) => void): void => {
		if (!(key in body)) {
			return;
		}
		if (decoded === undefined) {
			rejected.push(key);
			return;
		}
		assign(decoded);
	};

	const mode = typeof body.mode === 'string' ? body.mode.trim().toLowerCase() : undefined;
	take('mode', isHeaterMode(mode) ? mode : undefined, (value) => {
		fields.mode = value;
	});
	take('state', typeof body.state === 'string' ? body.state : undefined, (value) => {
		fields.state = value;
	});
	take('mtemp', toNumber(body.mtemp), (value) => {
		fields.mtemp = value;
	});
	take('stemp', toNumber(body.stemp), (value) => {
		fields.stemp = value;
	});
	take('units', toUnits(body.units), (value) => {
		fields.units = value;
	});
	take('ptemp', toPresets(body.ptemp), (value) => {
		fields.ptemp = value;
	});
	take('prog', toSchedule(body.prog), (value) => {
		fields.prog = value;
	});
	take('priority', toNumber(body.priority), (value) => {
		fields.priority = value;
	});
	take('name', typeof body.name === 'string' ? body.name.trim() : undefined, (value) => {
		fields.name = value;
	});

	return { fields, rejected };
}

/**
 * The heater fields a write will change, in the shape the store compares
 * echoes against.
 */
export function writeToFields(write: SettingsWrite): HeaterFields {
	const payload = buildSettingsPayload(write);
	const fields: HeaterFields = {};
	if (payload.mode !== undefined) {
		fields.mode = payload.mode;
	}
	if (write.stemp !== undefined) {
		fields.stemp = roundTemperature(write.stemp);
	}
	if (write.ptemp !== undefined) {
		const [cold, night, day] = write.ptemp.map(roundTemperature);
		fields.ptemp = [cold, night, day];
	}
	if (write.prog !== undefined) {
		fields.prog = [...write.prog];
	}
	return fields;
}
