import { describe, it, expect } from 'vitest';
import { describeBinding, findDuplicateBindings } from '../src/bindings';
import { MemoryLogger } from '../src/log';
import type { Binding } from '../src/model';

let nextLine = 1;
function bind(over: Partial<Binding>): Binding {
	const line = nextLine++;
	return { mode: 'default', type: 'bindsym', key: 'Return', modifiers: ['Mod4'], release: false, command: `exec cmd${line}`, offset: 0, line, ...over };
}

describe('duplicate bindings', () => {
	it('matches keysyms and modifiers regardless of case and order', () => {
		const a = bind({ modifiers: ['Shift', 'Ctrl'], key: 'q' });
		const b = bind({ modifiers: ['control', 'shift'], key: 'Q' });
		expect(findDuplicateBindings([a, b])).toEqual([{ binding: b, previous: a }]);
	});

	it('keeps modes, release flags and bind types apart', () => {
		const bindings = [
			bind({}),
			bind({ mode: 'resize' }),
			bind({ release: true }),
			bind({ type: 'bindcode', key: '36' }),
			bind({ modifiers: ['Mod1'] }),
		];
		expect(findDuplicateBindings(bindings)).toEqual([]);
	});

	it('compares keycodes numerically', () => {
		const a = bind({ type: 'bindcode', key: '010', modifiers: [] });
		const b = bind({ type: 'bindcode', key: '10', modifiers: [] });
		expect(findDuplicateBindings([a, b])).toEqual([{ binding: b, previous: a }]);
	});

	it('pairs every repeat with the first binding and logs it', () => {
		const a = bind({ command: 'exec a' });
		const b = bind({ command: 'exec b' });
		const c = bind({ command: 'exec c' });
		const logger = new MemoryLogger();
		expect(findDuplicateBindings([a, b, c], logger)).toEqual([{ binding: b, previous: a }, { binding: c, previous: a }]);
		expect(logger.messages('error')).toEqual([
			'Duplicate keybinding in config file:\n  Mod4 with keysym Return, command "exec b"',
			'Duplicate keybinding in config file:\n  Mod4 with keysym Return, command "exec c"',
		]);
	});

	it('describes bindings', () => {
		expect(describeBinding(bind({ type: 'bindcode', key: '36', modifiers: [], release: true }))).toBe('no modifiers with keycode 36 (on release)');
		expect(describeBinding(bind({ modifiers: ['Mod4', 'Shift'], key: 'q' }))).toBe('Mod4+Shift with keysym q');
	});
});
