import { GrammarError } from '../errors';
import type { StateId } from './tokens';

export const HISTORY_CAPACITY = 10;

// States that lead to the current one, e.g. INITIAL, BAR, BAR_COLORS.
// Jumping back to a state already on the path truncates instead of appending.
export class StateHistory {
	private readonly path: StateId[];

	constructor(initial: StateId) {
		this.path = [initial];
	}

	get current(): StateId { return this.path[this.path.length - 1] ?? this.path[0] ?? ''; }

	get states(): readonly StateId[] { return this.path; }

	enter(next: StateId): void {
		const at = this.path.indexOf(next);
		if (at >= 0) {
			this.path.length = at + 1;
			return;
		}
		if (this.path.length >= HISTORY_CAPACITY) {
			throw new GrammarError(`state history exceeds ${HISTORY_CAPACITY} nested states`, next);
		}
		this.path.push(next);
	}

	// Most recent first
	*walkBack(): Generator<StateId> {
		for (let i = this.path.length - 1; i >= 0; i--) {
			const s = this.path[i];
			if (s !== undefined) yield s;
		}
	}
}
