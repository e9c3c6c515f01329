import { GrammarError } from '../errors';
import { INITIAL, type StateId, type TokenDescriptor, type TokenKind, type TokenTable, type Transition } from './tokens';

export type GrammarKind = Exclude<TokenKind, 'literal'>;

export interface GrammarToken {
	// a list expands to one descriptor per literal, in order
	literal?: string | string[];
	kind?: GrammarKind;
	capture?: string;
	next?: StateId;
	call?: string;
	args?: Record<string, string | number>;
}

export interface GrammarFile {
	version: number;
	initial?: StateId;
	states: Record<StateId, GrammarToken[]>;
}

const NON_CAPTURING: ReadonlySet<TokenKind> = new Set<TokenKind>(['line', 'end', 'error']);

// Compiles a validated grammar file into the immutable table the parser walks.
export function buildTokenTable(grammar: GrammarFile): TokenTable {
	const initial = grammar.initial ?? INITIAL;
	const declared = new Set(Object.keys(grammar.states));
	if (!declared.has(initial)) throw new GrammarError(`initial state "${initial}" is not declared`);

	const handlers: string[] = [];
	const handlerIndex = new Map<string, number>();
	const intern = (name: string) => {
		let idx = handlerIndex.get(name);
		if (idx === undefined) { idx = handlers.length; handlers.push(name); handlerIndex.set(name, idx); }
		return idx;
	};
	const checkState = (s: StateId, from: StateId) => {
		if (!declared.has(s)) throw new GrammarError(`transition to undeclared state "${s}"`, from);
		return s;
	};

	const states = new Map<StateId, readonly TokenDescriptor[]>();
	for (const [name, specs] of Object.entries(grammar.states)) {
		if (!specs.length) throw new GrammarError('state declares no tokens', name);
		const out: TokenDescriptor[] = [];
		for (const spec of specs) {
			let transition: Transition;
			if (spec.call) {
				transition = { type: 'call', handler: intern(spec.call), next: checkState(spec.next ?? initial, name), args: { ...(spec.args ?? {}) } };
			} else if (spec.next) {
				if (spec.args) throw new GrammarError('args are only allowed on handler calls', name);
				transition = { type: 'state', state: checkState(spec.next, name) };
			} else {
				throw new GrammarError('token needs either "next" or "call"', name);
			}
			const capture = spec.capture ? { capture: spec.capture } : {};
			if (spec.literal !== undefined) {
				const literals = Array.isArray(spec.literal) ? spec.literal : [spec.literal];
				for (const text of literals) {
					if (!text) throw new GrammarError('empty literal', name);
					out.push({ kind: 'literal', text, ...capture, transition });
				}
			} else if (spec.kind) {
				if (spec.capture && NON_CAPTURING.has(spec.kind)) throw new GrammarError(`<${spec.kind}> tokens cannot capture`, name);
				out.push({ kind: spec.kind, ...capture, transition });
			} else {
				throw new GrammarError('token needs either "literal" or "kind"', name);
			}
		}
		states.set(name, out);
	}

	// After recovery the parser sits on a line feed, which only `end` consumes.
	for (const [name, tokens] of states) {
		const err = tokens.find(t => t.kind === 'error');
		if (!err || err.transition.type !== 'state') continue;
		const target = states.get(err.transition.state) ?? [];
		if (!target.some(t => t.kind === 'end')) throw new GrammarError(`error recovery enters "${err.transition.state}", which does not accept <end>`, name);
	}

	return { initial, states, handlers };
}
