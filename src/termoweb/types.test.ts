import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors.js';
import {
	SCHEDULE_LENGTH,
	activeProgramSetpoint,
	activeProgramSlot,
	nodeKey,
	programIndexAt,
	validateMode,
	validatePresets,
	validateSchedule,
	validateSetpoint,
	type HeaterState,
	type ScheduleSlot,
} from './types.js';

function heater(overrides: Partial<HeaterState> = {}): HeaterState {
	return {
		state: 'off',
		mode: 'auto',
		mtemp: 19,
		stemp: null,
		units: 'C',
		ptemp: [7, 16, 21],
		prog: new Array<ScheduleSlot>(SCHEDULE_LENGTH).fill(0),
		priority: null,
		name: 'Lounge',
		...overrides,
	};
}

describe('types', () => {
	it('should key nodes by device and address', () => {
		expect(nodeKey({ devId: 'dev1', addr: '2' })).toBe('dev1/2');
	});

	describe('validateMode', () => {
		it('should accept the heater modes', () => {
			expect(validateMode('manual')).toBe('manual');
		});

		it('should reject anything else', () => {
			expect(() => validateMode('cool')).toThrow(ValidationError);
		});
	});

	describe('validateSchedule', () => {
		it('should accept 168 slots of 0, 1 or 2', () => {
			const prog = Array.from({ length: 168 }, (_, i) => i % 3);
			expect(validateSchedule(prog)).toEqual(prog);
		});

		it('should reject the wrong length', () => {
			expect(() => validateSchedule(new Array(167).fill(0)))
				.toThrow('schedule must be a list of 168 entries (0, 1 or 2)');
		});

		it('should name the first bad entry', () => {
			const prog = new Array(168).fill(1);
			prog[40] = 3;
			expect(() => validateSchedule(prog)).toThrow('schedule entry 40 must be 0, 1 or 2; got 3');
		});
	});

	describe('validatePresets', () => {
		it('should accept three finite numbers', () => {
			expect(validatePresets([7, 15.5, 21])).toEqual([7, 15.5, 21]);
		});

		it('should reject the wrong arity', () => {
			expect(() => validatePresets([7, 15])).toThrow('preset temperatures must be three numbers [cold, night, day]');
		});

		it('should name the bad slot', () => {
			expect(() => validatePresets([7, Number.NaN, 21])).toThrow('preset temperature night must be a finite number');
		});
	});

	describe('validateSetpoint', () => {
		it('should clamp Celsius setpoints to 5..30', () => {
			expect(validateSetpoint(35, 'C')).toBe(30);
			expect(validateSetpoint(2, 'C')).toBe(5);
			expect(validateSetpoint(21.5, 'C')).toBe(21.5);
		});

		it('should clamp Fahrenheit setpoints to 41..86', () => {
			expect(validateSetpoint(90, 'F')).toBe(86);
		});

		it('should reject non-numbers', () => {
			expect(() => validateSetpoint('21', 'C')).toThrow(ValidationError);
			expect(() => validateSetpoint(Number.POSITIVE_INFINITY, 'C')).toThrow(ValidationError);
		});
	});

	describe('program slots', () => {
		it('should start the week on Monday', () => {
			// 2024-01-01 was a Monday
			expect(programIndexAt(new Date(2024, 0, 1, 0, 30))).toBe(0);
			expect(programIndexAt(new Date(2024, 0, 3, 10, 0))).toBe(58);
			expect(programIndexAt(new Date(2024, 0, 7, 23, 59))).toBe(167);
		});

		it('should resolve the active slot and its preset', () => {
			const prog = new Array<ScheduleSlot>(SCHEDULE_LENGTH).fill(0);
			prog[58] = 2;
			const state = heater({ prog });
			const at = new Date(2024, 0, 3, 10, 15);

			expect(activeProgramSlot(state, at)).toBe(2);
			expect(activeProgramSetpoint(state, at)).toBe(21);
		});
	});
});
