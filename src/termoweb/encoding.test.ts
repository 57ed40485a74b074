import { describe, expect, it } from 'vitest';

import {
	buildSettingsPayload,
	decodeHeaterSettings,
	formatTemperature,
	toNumber,
	writeToFields,
} from './encoding.js';
import { ValidationError } from './errors.js';
import type { ScheduleSlot } from './types.js';

describe('encoding', () => {
	describe('formatTemperature', () => {
		it('should always write one decimal', () => {
			expect(formatTemperature(16)).toBe('16.0');
			expect(formatTemperature(21.5)).toBe('21.5');
			expect(formatTemperature(7.25)).toBe('7.3');
		});

		it('should reject non-finite values', () => {
			expect(() => formatTemperature(Number.NaN)).toThrow(ValidationError);
		});
	});

	describe('buildSettingsPayload', () => {
		it('should send a setpoint together with manual mode', () => {
			expect(buildSettingsPayload({ stemp: 16, units: 'C' })).toEqual({
				units: 'C',
				mode: 'manual',
				stemp: '16.0',
			});
		});

		it('should refuse a setpoint paired with another mode', () => {
			expect(() => buildSettingsPayload({ mode: 'auto', stemp: 20, units: 'C' })).toThrow(ValidationError);
		});

		it('should send only the changed fields plus units', () => {
			expect(buildSettingsPayload({ mode: 'off', units: 'F' })).toEqual({ units: 'F', mode: 'off' });
			expect(buildSettingsPayload({ ptemp: [7, 15.5, 21], units: 'C' })).toEqual({
				units: 'C',
				ptemp: ['7.0', '15.5', '21.0'],
			});
		});

		it('should send the program as 168 integers', () => {
			const prog: ScheduleSlot[] = [];
			for (let i = 0; i < 168; i++) {
				prog.push(i % 24 < 7 ? 1 : 2);
			}
			const payload = buildSettingsPayload({ prog, units: 'C' });

			expect(payload.prog).toHaveLength(168);
			expect(payload.prog?.[0]).toBe(1);
			expect(payload.prog?.[8]).toBe(2);
			expect(payload.mode).toBeUndefined();
		});

		it('should refuse a short program', () => {
			expect(() => buildSettingsPayload({ prog: [0, 1, 2], units: 'C' })).toThrow('prog must hold exactly 168 entries');
		});
	});

	describe('toNumber', () => {
		it('should coerce numeric strings', () => {
			expect(toNumber('19.5')).toBe(19.5);
			expect(toNumber(' 7 ')).toBe(7);
			expect(toNumber(3)).toBe(3);
		});

		it('should reject blanks and garbage', () => {
			expect(toNumber('')).toBeUndefined();
			expect(toNumber('warm')).toBeUndefined();
			expect(toNumber(null)).toBeUndefined();
		});
	});

	describe('decodeHeaterSettings', () => {
		it('should coerce vendor strings into the heater model', () => {
			const decoded = decodeHeaterSettings({
				mode: 'Manual',
				state: 'active',
				mtemp: '18.2',
				stemp: '19.5',
				units: 'c',
				ptemp: ['5.0', '15.0', '20.0'],
				prog: [0, 1],
			});

			expect(decoded.fields).toEqual({
				mode: 'manual',
				state: 'active',
				mtemp: 18.2,
				stemp: 19.5,
				units: 'C',
				ptemp: [5, 15, 20],
			});
			expect(decoded.rejected).toEqual(['prog']);
		});

		it('should reject unknown modes and bad program slots', () => {
			const prog = new Array(168).fill(0);
			prog[3] = 5;
			const decoded = decodeHeaterSettings({ mode: 'boost', prog, priority: '2' });

			expect(decoded.fields).toEqual({ priority: 2 });
			expect(decoded.rejected).toEqual(['mode', 'prog']);
		});

		it('should return nothing for a non-object body', () => {
			expect(decodeHeaterSettings('oops')).toEqual({ fields: {}, rejected: [] });
		});
	});

	describe('writeToFields', () => {
		it('should describe a setpoint write the way echoes report it', () => {
			expect(writeToFields({ stemp: 21.04, units: 'C' })).toEqual({ mode: 'manual', stemp: 21 });
		});

		it('should include presets rounded to one decimal', () => {
			expect(writeToFields({ ptemp: [7, 15.55, 21], units: 'C' })).toEqual({ ptemp: [7, 15.6, 21] });
		});
	});
});
