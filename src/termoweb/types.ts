// src/termoweb/types.ts
import { ValidationError } from './errors.js';

export const SCHEDULE_LENGTH = 168;
export const PRESET_COUNT = 3;

export type HeaterMode = 'auto' | 'manual' | 'off';
export type TemperatureUnits = 'C' | 'F';

/** Program slot values: 0 = cold, 1 = night, 2 = day. */
export type ScheduleSlot = 0 | 1 | 2;

/** Preset temperatures in slot order: [cold, night, day]. */
export type PresetTemperatures = readonly [number, number, number];

export const HEATER_MODES: readonly HeaterMode[] = ['auto', 'manual', 'off'];
export const SLOT_LABELS = ['cold', 'night', 'day'] as const;

export interface NodeRef {
	devId: string;
	addr: string;
}

export interface HeaterNode extends NodeRef {
	type: string;
	name: string;
}

export interface TermoWebDevice {
	devId: string;
	name: string;
	nodes: HeaterNode[];
	raw: Record<string, unknown>;
}

export interface HeaterState {
	/** Raw operating state reported by the heater (e.g. "off", "active"). */
	state: string;
	mode: HeaterMode;
	mtemp: number | null;
	stemp: number | null;
	units: TemperatureUnits;
	ptemp: PresetTemperatures;
	prog: readonly ScheduleSlot[];
	priority: number | null;
	name: string;
}

export type HeaterField = keyof HeaterState;

export const HEATER_FIELDS: readonly HeaterField[] = [
	'state',
	'mode',
	'mtemp',
	'stemp',
	'units',
	'ptemp',
	'prog',
	'priority',
	'name',
];

/** A partial view of a heater, as carried by a poll read, a push delta or a write. */
export type HeaterFields = Partial<HeaterState>;

export type ObservationSource = 'realtime' | 'poll';

export function nodeKey(node: NodeRef): string {
	return `${node.devId}/${node.addr}`;
}

export function isHeaterMode(value: unknown): value is HeaterMode {
	return typeof value === 'string' && (HEATER_MODES as readonly string[]).includes(value);
}

export function validateMode(mode: unknown): HeaterMode {
	if (!isHeaterMode(mode)) {
		throw new ValidationError(`mode must be one of ${HEATER_MODES.join(', ')}; got ${String(mode)}`);
	}
	return mode;
}

export function isScheduleSlot(value: unknown): value is ScheduleSlot {
	return value === 0 || value === 1 || value === 2;
}

export function validateSchedule(prog: unknown): ScheduleSlot[] {
	if (!Array.isArray(prog) || prog.length !== SCHEDULE_LENGTH) {
		throw new ValidationError(`schedule must be a list of ${SCHEDULE_LENGTH} entries (0, 1 or 2)`);
	}

	return prog.map((value: unknown, index) => {
		if (!isScheduleSlot(value)) {
			throw new ValidationError(`schedule entry ${index} must be 0, 1 or 2; got ${String(value)}`);
		}
		return value;
	});
}

export function validatePresets(ptemp: unknown): PresetTemperatures {
	if (!Array.isArray(ptemp) || ptemp.length !== PRESET_COUNT) {
		throw new ValidationError('preset temperatures must be three numbers [cold, night, day]');
	}

	const [cold, night, day] = ptemp.map((value: unknown, index) => {
		if (typeof value !== 'number' || !Number.isFinite(value)) {
			throw new ValidationError(`preset temperature ${SLOT_LABELS[index]} must be a finite number`);
		}
		return value;
	});
	return [cold, night, day];
}

const SETPOINT_RANGE: Record<TemperatureUnits, { min: number; max: number }> = {
	C: { min: 5, max: 30 },
	F: { min: 41, max: 86 },
};

export function setpointRange(units: TemperatureUnits): { min: number; max: number } {
	return SETPOINT_RANGE[units];
}

/**
 * Setpoints outside the heater's range are clamped rather than rejected,
 * matching what the vendor app does.
 */
export function validateSetpoint(value: unknown, units: TemperatureUnits): number {
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new ValidationError(`setpoint must be a finite number; got ${String(value)}`);
	}
	const { min, max } = SETPOINT_RANGE[units];
	return Math.min(max, Math.max(min, value));
}

/**
 * Index into the weekly program for a moment in local time.
 * Monday 00:00 is slot 0.
 */
export function programIndexAt(date: Date): number {
	const mondayFirst = (date.getDay() + 6) % 7;
	return mondayFirst * 24 + date.getHours();
}

export function activeProgramSlot(state: HeaterState, date: Date): ScheduleSlot {
	return state.prog[programIndexAt(date)];
}

export function activeProgramSetpoint(state: HeaterState, date: Date): number {
	return state.ptemp[activeProgramSlot(state, date)];
}
