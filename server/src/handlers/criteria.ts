import type { CaptureReader } from '../core/captures';
import type { Handler, HandlerArgs } from '../core/parser';
import type { HandlerResult } from '../core/results';
import type { StateId } from '../core/tokens';
import type { Criterion } from '../model';

const URGENT_VALUES = new Set(['latest', 'newest', 'oldest', 'recent']);

// The `[class="..." title="..."]` match being built for the current directive.
export class CriteriaBuilder {
	private criteria: Criterion[] = [];
	private returnTo: StateId | null = null;

	get current(): readonly Criterion[] { return this.criteria; }

	reset(returnTo: StateId | null = null): void {
		this.criteria = [];
		this.returnTo = returnTo;
	}

	// Hands the finished match over and starts a new one.
	take(): Criterion[] {
		const out = this.criteria;
		this.criteria = [];
		return out;
	}

	readonly init: Handler = (_c: CaptureReader, result: HandlerResult, args: HandlerArgs) => {
		const target = args.return_to;
		this.reset(typeof target === 'string' ? target : null);
		result.payload = { return_to: this.returnTo };
	};

	readonly add: Handler = (c: CaptureReader, result: HandlerResult) => {
		const type = c.getString('ctype').toLowerCase();
		const value = c.getString('cvalue');
		result.payload = { ctype: type, cvalue: value };
		const problem = checkCriterion(type, value);
		if (problem) {
			result.success = false;
			result.error = problem;
			return;
		}
		this.criteria.push({ type, value });
	};

	readonly popState: Handler = (_c: CaptureReader, result: HandlerResult) => {
		if (this.returnTo === null) {
			result.success = false;
			result.error = 'criteria closed without a directive to return to';
			return;
		}
		result.nextState = this.returnTo;
		result.payload = { criteria: this.criteria.map(c => ({ ...c })) };
	};
}

function checkCriterion(type: string, value: string): string | null {
	switch (type) {
		case 'con_id':
		case 'id':
			return /^\d+$/.test(value) ? null : `${type} must be a number, got "${value}"`;
		case 'urgent':
			return URGENT_VALUES.has(value.toLowerCase()) ? null : `urgent must be one of latest, newest, oldest, recent; got "${value}"`;
		case 'class':
		case 'instance':
		case 'window_role':
		case 'title':
			try {
				new RegExp(value);
				return null;
			} catch (err) {
				return `invalid regular expression for ${type}: ${err instanceof Error ? err.message : String(err)}`;
			}
		default:
			return null;
	}
}
