import { describe, it, expect } from 'vitest';
import { HISTORY_CAPACITY, StateHistory } from '../src/core/history';
import { GrammarError } from '../src/errors';

describe('state history', () => {
	it('starts at the initial state and appends new states', () => {
		const h = new StateHistory('INITIAL');
		expect(h.current).toBe('INITIAL');
		h.enter('BAR');
		h.enter('BAR_COLORS');
		expect(h.states).toEqual(['INITIAL', 'BAR', 'BAR_COLORS']);
		expect(h.current).toBe('BAR_COLORS');
	});

	it('truncates when re-entering a state on the path', () => {
		const h = new StateHistory('INITIAL');
		for (const s of ['MODE', 'MODE_BINDING', 'MODE_BINDCOMMAND']) h.enter(s);
		h.enter('MODE');
		expect(h.states).toEqual(['INITIAL', 'MODE']);
		h.enter('MODE');
		expect(h.states).toEqual(['INITIAL', 'MODE']);
		h.enter('INITIAL');
		expect(h.states).toEqual(['INITIAL']);
	});

	it('walks back from the most recent state', () => {
		const h = new StateHistory('INITIAL');
		h.enter('A');
		h.enter('B');
		expect([...h.walkBack()]).toEqual(['B', 'A', 'INITIAL']);
	});

	it('rejects paths deeper than its capacity', () => {
		const h = new StateHistory('INITIAL');
		for (let i = 1; i < HISTORY_CAPACITY; i++) h.enter(`S${i}`);
		expect(h.states.length).toBe(HISTORY_CAPACITY);
		expect(() => h.enter('DEEP')).toThrow(GrammarError);
		expect(() => h.enter('DEEP')).toThrow('state history exceeds 10 nested states (state DEEP)');
	});
});
