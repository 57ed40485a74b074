// src/termoweb/state-store.ts
import { roundTemperature } from './encoding.js';
import { createDefaultLogger, type TermoWebLogger } from './logger.js';
import {
	HEATER_FIELDS,
	SCHEDULE_LENGTH,
	nodeKey,
	type HeaterField,
	type HeaterFields,
	type HeaterState,
	type NodeRef,
	type ObservationSource,
	type ScheduleSlot,
} from './types.js';

export const DEFAULT_FREEZE_WINDOW_MS = 30_000;

export type StateChangeListener = (node: NodeRef, state: HeaterState) => void;

interface PendingWrite {
	fields: HeaterFields;
	deadline: number;
}

/**
 * Returned by beginWrite; hand it back to abortWrite if the REST call fails.
 */
export interface WriteTicket {
	node: NodeRef;
	/** Values this write sent. */
	written: HeaterFields;
	/** State values of the written fields just before the write. */
	previous: HeaterFields;
	/** Pending values those fields had before this write, if any. */
	previousPending: HeaterFields;
}

export interface StateStoreOptions {
	freezeWindowMs?: number;
	now?: () => number;
	logger?: TermoWebLogger;
}

function defaultState(name: string): HeaterState {
	return {
		state: '',
		mode: 'off',
		mtemp: null,
		stemp: null,
		units: 'C',
		ptemp: [7, 15, 20],
		prog: new Array<ScheduleSlot>(SCHEDULE_LENGTH).fill(0),
		priority: null,
		name,
	};
}

function setState<K extends HeaterField>(target: HeaterState, key: K, value: HeaterState[K]): void {
	target[key] = value;
}

function setField<K extends HeaterField>(target: HeaterFields, key: K, value: HeaterState[K]): void {
	target[key] = value;
}

function sameScalar(a: unknown, b: unknown): boolean {
	if (typeof a === 'number' && typeof b === 'number') {
		return roundTemperature(a) === roundTemperature(b);
	}
	return a === b;
}

/** Field equality as used for echo matching: one decimal for numbers, element-wise for arrays. */
export function sameFieldValue(a: unknown, b: unknown): boolean {
	if (Array.isArray(a) || Array.isArray(b)) {
		if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
			return false;
		}
		return a.every((value: unknown, index) => sameScalar(value, b[index]));
	}
	return sameScalar(a, b);
}

function definedKeys(fields: HeaterFields): HeaterField[] {
	return HEATER_FIELDS.filter((key) => fields[key] !== undefined);
}

/**
 * Authoritative per-heater state plus the pending-write freeze: for a short
 * window after a write, observations that contradict the written values are
 * held back so the UI doesn't flip back to stale readings.
 */
export class StateStore {
	private readonly freezeWindowMs: number;
	private readonly now: () => number;
	private readonly log: TermoWebLogger;

	private readonly states = new Map<string, HeaterState>();
	private readonly pending = new Map<string, PendingWrite>();
	private readonly listeners: StateChangeListener[] = [];

	constructor(options: StateStoreOptions = {}) {
		this.freezeWindowMs = options.freezeWindowMs ?? DEFAULT_FREEZE_WINDOW_MS;
		this.now = options.now ?? Date.now;
		this.log = options.logger ?? createDefaultLogger('termoweb-state');
	}

	public onChange(listener: StateChangeListener): void {
		this.listeners.push(listener);
	}

	/** Make sure a discovered heater has a state entry, seeded with defaults. */
	public ensureNode(node: NodeRef, name: string): void {
		if (!this.states.has(nodeKey(node))) {
			this.states.set(nodeKey(node), defaultState(name));
		}
	}

	public removeNode(node: NodeRef): void {
		this.states.delete(nodeKey(node));
		this.pending.delete(nodeKey(node));
	}

	public snapshot(node: NodeRef): HeaterState | undefined {
		const state = this.states.get(nodeKey(node));
		return state ? { ...state } : undefined;
	}

	public getPending(node: NodeRef): HeaterFields | undefined {
		this.dropExpired(nodeKey(node));
		const entry = this.pending.get(nodeKey(node));
		return entry ? { ...entry.fields } : undefined;
	}

	/**
	 * Merge a poll read or push delta. Fields covered by a pending write are
	 * confirmed if every one of them matches what was sent, otherwise they
	 * are all held back; uncovered fields always apply.
	 */
	public applyObservation(node: NodeRef, fields: HeaterFields, source: ObservationSource): HeaterState {
		const key = nodeKey(node);
		this.dropExpired(key);

		let accepted = fields;
		const entry = this.pending.get(key);
		if (entry) {
			const covered = definedKeys(fields).filter((field) => entry.fields[field] !== undefined);
			if (covered.length > 0) {
				const matches = covered.every((field) => sameFieldValue(fields[field], entry.fields[field]));
				if (matches) {
					for (const field of covered) {
						delete entry.fields[field];
					}
					if (definedKeys(entry.fields).length === 0) {
						this.pending.delete(key);
						this.log.debug('TermoWeb: %s write confirmed by %s.', key, source);
					}
				} else {
					this.log.debug('TermoWeb: %s %s observation held back for %s.', key, source, covered.join(','));
					accepted = {};
					for (const field of definedKeys(fields)) {
						const value = fields[field];
						if (!covered.includes(field) && value !== undefined) {
							setField(accepted, field, value);
						}
					}
				}
			}
		}

		return this.merge(node, accepted);
	}

	/**
	 * Register a write and apply it optimistically. A second write to the
	 * same heater merges into the pending entry and restarts its deadline.
	 */
	public beginWrite(node: NodeRef, fields: HeaterFields): WriteTicket {
		const key = nodeKey(node);
		this.dropExpired(key);

		const current = this.states.get(key) ?? defaultState(node.addr);
		const entry = this.pending.get(key) ?? { fields: {}, deadline: 0 };
		const previous: HeaterFields = {};
		const previousPending: HeaterFields = {};

		for (const field of definedKeys(fields)) {
			const value = fields[field];
			if (value === undefined) {
				continue;
			}
			setField(previous, field, current[field]);
			const pendingValue = entry.fields[field];
			if (pendingValue !== undefined) {
				setField(previousPending, field, pendingValue);
			}
			setField(entry.fields, field, value);
		}

		entry.deadline = this.now() + this.freezeWindowMs;
		this.pending.set(key, entry);
		this.merge(node, fields);
		return { node, written: { ...fields }, previous, previousPending };
	}

	/**
	 * The write was rejected: restore the fields and the pending entry to how
	 * they were. Fields an observation already confirmed, and fields a later
	 * write took over, keep their current value.
	 */
	public abortWrite(ticket: WriteTicket): void {
		const key = nodeKey(ticket.node);
		const entry = this.pending.get(key);
		if (!entry) {
			return;
		}

		const reverted: HeaterFields = {};
		for (const field of definedKeys(ticket.written)) {
			if (!sameFieldValue(entry.fields[field], ticket.written[field])) {
				continue;
			}
			const before = ticket.previousPending[field];
			if (before !== undefined) {
				setField(entry.fields, field, before);
			} else {
				delete entry.fields[field];
			}
			const previous = ticket.previous[field];
			if (previous !== undefined) {
				setField(reverted, field, previous);
			}
		}
		if (definedKeys(entry.fields).length === 0) {
			this.pending.delete(key);
		}
		if (definedKeys(reverted).length > 0) {
			this.merge(ticket.node, reverted);
		}
	}

	public clear(): void {
		this.states.clear();
		this.pending.clear();
	}

	private dropExpired(key: string): void {
		const entry = this.pending.get(key);
		if (entry && entry.deadline <= this.now()) {
			this.log.debug('TermoWeb: %s pending write expired without confirmation.', key);
			this.pending.delete(key);
		}
	}

	private merge(node: NodeRef, fields: HeaterFields): HeaterState {
		const key = nodeKey(node);
		const current = this.states.get(key) ?? defaultState(fields.name ?? node.addr);
		const next: HeaterState = { ...current };
		let changed = !this.states.has(key);

		for (const field of HEATER_FIELDS) {
			const value = fields[field];
			if (value === undefined) {
				continue;
			}
			if (!sameFieldValue(current[field], value)) {
				changed = true;
			}
			setState(next, field, value);
		}

		this.states.set(key, next);
		if (changed) {
			const copy = { ...next };
			for (const listener of this.listeners) {
				listener(node, copy);
			}
		}
		return { ...next };
	}
}
