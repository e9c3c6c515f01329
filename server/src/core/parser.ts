/*
	Table-driven configuration parser.

	Each iteration skips blanks and tries the current state's tokens in the
	order the grammar declares them; the first match wins. Literals, numbers,
	words and strings may be captured under an identifier and are handed to
	semantic handlers on `call` transitions. On input that no token matches,
	the parser reports the line with a caret pointer, skips to the next line
	feed and resumes in the nearest state on its path that declares `error`.
*/
import { GrammarError } from '../errors';
import type { Logger } from '../log';
import { silentLogger } from '../log';
import { CaptureStack, type CaptureReader } from './captures';
import { StateHistory } from './history';
import { matchToken, skipBlanks } from './recognizer';
import { buildErrorReport } from './report';
import { ResultEmitter, type HandlerResult, type ResultRecord } from './results';
import type { CaptureValue, StateId, TokenDescriptor, TokenTable, Transition } from './tokens';

export type HandlerArgs = Readonly<Record<string, string | number>>;
// where the call happened: the cursor just past the triggering token, and its line
export interface HandlerPosition { offset: number; line: number }
export type Handler = (captures: CaptureReader, result: HandlerResult, args: HandlerArgs, at: HandlerPosition) => void;

export interface HandlerSet {
	handlers: Readonly<Record<string, Handler>>;
	// Runs at parser entry and after every `end` token, before the next directive starts.
	onDirectiveBoundary?(initial: StateId): void;
}

export interface ConfigContext {
	filename: string;
	hasErrors: boolean;
	hasWarnings: boolean;
}

export function createContext(filename = '<stdin>'): ConfigContext {
	return { filename, hasErrors: false, hasWarnings: false };
}

export interface StepSnapshot {
	state: StateId;
	history: readonly StateId[];
	captures: Record<string, CaptureValue>;
	cursor: number;
	line: number;
}

export interface ParseOptions {
	logger?: Logger;
	// observes the parser after every iteration of the main loop
	onStep?: (snap: StepSnapshot) => void;
}

export class ConfigParser {
	private readonly bound: Handler[];

	constructor(readonly table: TokenTable, readonly handlerSet: HandlerSet) {
		this.bound = table.handlers.map(name => {
			const fn = handlerSet.handlers[name];
			if (!fn) throw new GrammarError(`grammar calls handler "${name}" but no such handler is registered`);
			return fn;
		});
	}

	parse(input: string, context: ConfigContext, opts: ParseOptions = {}): ResultRecord[] {
		return new ParseRun(this.table, this.bound, this.handlerSet, input, context, opts).run();
	}
}

// State of a single parse; a fresh run per input keeps ConfigParser reusable.
class ParseRun {
	private readonly text: string;
	private readonly logger: Logger;
	private readonly captures = new CaptureStack();
	private readonly history: StateHistory;
	private readonly emitter = new ResultEmitter();
	private cursor = 0;
	private line = 1;
	private lastRecoveryAt = -1;

	constructor(
		private readonly table: TokenTable,
		private readonly bound: readonly Handler[],
		private readonly handlerSet: HandlerSet,
		input: string,
		private readonly context: ConfigContext,
		private readonly opts: ParseOptions,
	) {
		// A NUL byte terminates the input.
		const nul = input.indexOf('\0');
		this.text = nul >= 0 ? input.slice(0, nul) : input;
		this.logger = opts.logger ?? silentLogger;
		this.history = new StateHistory(table.initial);
	}

	run(): ResultRecord[] {
		this.dumpInput();
		this.emitter.begin();
		this.handlerSet.onDirectiveBoundary?.(this.table.initial);
		// `<=`: the end of input is matched explicitly by an `end` token
		while (this.cursor <= this.text.length) {
			this.cursor = skipBlanks(this.text, this.cursor);
			const tokens = this.tokensFor(this.history.current);
			if (!this.step(tokens)) this.recover(tokens);
			this.opts.onStep?.({
				state: this.history.current,
				history: [...this.history.states],
				captures: this.captures.snapshot(),
				cursor: this.cursor,
				line: this.line,
			});
		}
		return this.emitter.end();
	}

	private tokensFor(state: StateId): readonly TokenDescriptor[] {
		const tokens = this.table.states.get(state);
		if (!tokens) throw new GrammarError('state has no token list', state);
		return tokens;
	}

	private step(tokens: readonly TokenDescriptor[]): boolean {
		for (const token of tokens) {
			const m = matchToken(this.text, this.cursor, token);
			if (!m) continue;
			if (token.capture && m.value !== undefined) this.captures.push(token.capture, m.value);
			if (m.lineBreak) {
				this.transition(token.transition);
				if (token.kind === 'end') this.handlerSet.onDirectiveBoundary?.(this.table.initial);
				this.line++;
				this.cursor = m.end;
			} else {
				this.cursor = m.end;
				this.transition(token.transition);
			}
			return true;
		}
		return false;
	}

	private transition(t: Transition): void {
		let next: StateId;
		if (t.type === 'call') {
			const name = this.table.handlers[t.handler] ?? `#${t.handler}`;
			const fn = this.bound[t.handler];
			if (!fn) throw new GrammarError(`no handler bound at index ${t.handler}`, this.history.current);
			const result: HandlerResult = { nextState: t.next, success: true };
			fn(this.captures, result, t.args, { offset: this.cursor, line: this.line });
			if (!this.table.states.has(result.nextState)) {
				throw new GrammarError(`handler "${name}" chose unknown next state "${result.nextState}"`, this.history.current);
			}
			this.emitter.push({
				kind: 'handler',
				handler: name,
				nextState: result.nextState,
				success: result.success,
				...(result.error !== undefined ? { error: result.error } : {}),
				...(result.payload ? { payload: result.payload } : {}),
				offset: this.cursor,
				line: this.line,
			});
			next = result.nextState;
			this.captures.clear();
		} else {
			next = t.state;
		}
		if (next === this.table.initial) this.captures.clear();
		this.history.enter(next);
	}

	private recover(tokens: readonly TokenDescriptor[]): void {
		// Recovery that lands on the same offset twice would never advance.
		if (this.lastRecoveryAt === this.cursor) {
			throw new GrammarError('error recovery made no progress; the recovery state needs an end token', this.history.current);
		}
		this.lastRecoveryAt = this.cursor;

		const report = buildErrorReport(this.text, this.cursor, this.line, tokens);
		this.logger.error(`CONFIG: ${report.message}`);
		this.logger.error(`CONFIG: (in file ${this.context.filename})`);
		for (const l of report.excerpt) this.logger.error(`CONFIG: ${l}`);
		this.context.hasErrors = true;

		this.emitter.push({
			kind: 'parse-error',
			success: false,
			parseError: true,
			error: report.message,
			input: this.text,
			errorPosition: report.pointer,
			offset: this.cursor,
			line: this.line,
			lineStart: report.lineStart,
		});

		// Stop on the line feed itself; the resync state's `end` token consumes it.
		while (this.cursor <= this.text.length && this.text[this.cursor] !== '\n') this.cursor++;
		this.captures.clear();

		for (const state of [...this.history.walkBack()]) {
			const errorToken = this.tokensFor(state).find(t => t.kind === 'error');
			if (!errorToken) continue;
			this.transition(errorToken.transition);
			return;
		}
		throw new GrammarError('no state on the current path declares an error token', this.history.current);
	}

	private dumpInput(): void {
		if (!this.text) return;
		const lines = this.text.split('\n');
		if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
		lines.forEach((l, i) => this.logger.debug(`CONFIG(line ${String(i + 1).padStart(3)}): ${l}`));
	}
}

export function parseConfig(table: TokenTable, handlers: HandlerSet, input: string, context: ConfigContext, opts?: ParseOptions): ResultRecord[] {
	return new ConfigParser(table, handlers).parse(input, context, opts);
}
