import type { Logger } from './log';
import type { Binding } from './model';

export interface DuplicateBinding {
	binding: Binding;
	// the earlier binding it repeats
	previous: Binding;
}

const MODIFIER_ALIASES: Record<string, string> = { ctrl: 'control' };

function modifierMask(mods: readonly string[]): string {
	const norm = mods.map(m => {
		const lower = m.toLowerCase();
		return MODIFIER_ALIASES[lower] ?? lower;
	});
	return [...new Set(norm)].sort().join('+');
}

function sameTrigger(a: Binding, b: Binding): boolean {
	if (a.mode !== b.mode || a.type !== b.type || a.release !== b.release) return false;
	const sameKey = a.type === 'bindsym' ? a.key.toLowerCase() === b.key.toLowerCase() : Number(a.key) === Number(b.key);
	return sameKey && modifierMask(a.modifiers) === modifierMask(b.modifiers);
}

// Every binding that repeats an earlier one in the same mode, paired with the first such earlier binding.
export function findDuplicateBindings(bindings: readonly Binding[], logger?: Logger): DuplicateBinding[] {
	const out: DuplicateBinding[] = [];
	bindings.forEach((binding, i) => {
		const previous = bindings.slice(0, i).find(b => sameTrigger(b, binding));
		if (!previous) return;
		out.push({ binding, previous });
		logger?.error(`Duplicate keybinding in config file:\n  ${describeBinding(binding)}, command "${binding.command}"`);
	});
	return out;
}

export function describeBinding(b: Binding): string {
	const keyName = b.type === 'bindsym' ? `keysym ${b.key}` : `keycode ${b.key}`;
	const mods = b.modifiers.length ? b.modifiers.join('+') : 'no modifiers';
	return `${mods} with ${keyName}${b.release ? ' (on release)' : ''}`;
}
