import { describe, it, expect } from 'vitest';
import { CAPTURE_CAPACITY, CaptureStack } from '../src/core/captures';
import { GrammarError } from '../src/errors';

describe('capture stack', () => {
	it('joins repeated string captures with a comma', () => {
		const c = new CaptureStack();
		c.pushString('modifiers', 'Mod1');
		c.pushString('modifiers', 'Shift');
		c.pushString('modifiers', 'Control');
		expect(c.getString('modifiers')).toBe('Mod1,Shift,Control');
		expect(c.size).toBe(1);
	});

	it('returns empty string and zero for absent identifiers', () => {
		const c = new CaptureStack();
		c.pushInteger('width', 640);
		expect(c.getString('missing')).toBe('');
		expect(c.getInteger('missing')).toBe(0);
		// wrong type reads like an absent value
		expect(c.getString('width')).toBe('');
		expect(c.getInteger('width')).toBe(640);
		expect(c.has('width')).toBe(true);
		expect(c.has('missing')).toBe(false);
	});

	it('dispatches push by value type and clears everything', () => {
		const c = new CaptureStack();
		c.push('w', 3);
		c.push('name', 'term');
		expect(c.snapshot()).toEqual({ w: 3, name: 'term' });
		c.clear();
		expect(c.size).toBe(0);
		expect(c.snapshot()).toEqual({});
	});

	it('treats more than ten slots as a grammar bug', () => {
		const c = new CaptureStack();
		for (let i = 0; i < CAPTURE_CAPACITY; i++) c.pushInteger(`n${i}`, i);
		expect(() => c.pushString('extra', 'x')).toThrow(GrammarError);
		expect(() => c.pushString('extra', 'x')).toThrow('capture stack full: a directive identifies more than 10 tokens (pushing "extra")');
		// accumulating into an existing slot needs no new one
		c.clear();
		for (let i = 0; i < CAPTURE_CAPACITY; i++) c.pushString(i === 0 ? 'list' : `s${i}`, 'v');
		c.pushString('list', 'w');
		expect(c.getString('list')).toBe('v,w');
	});
});
