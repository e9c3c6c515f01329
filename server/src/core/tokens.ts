// Token model for the table-driven configuration parser

export type StateId = string;

export const INITIAL: StateId = 'INITIAL';

export type TokenKind =
	| 'literal'
	| 'number'
	| 'word'
	| 'string'
	| 'line'
	| 'end'
	| 'error'; // recovery target only, never matched while scanning forward

export type Transition =
	| { type: 'state'; state: StateId }
	// handler index into TokenTable.handlers; `next` is the default written into the result
	| { type: 'call'; handler: number; next: StateId; args: Readonly<Record<string, string | number>> };

export interface TokenDescriptor {
	kind: TokenKind;
	// only set for literals
	text?: string;
	capture?: string;
	transition: Transition;
}

export interface TokenTable {
	initial: StateId;
	states: ReadonlyMap<StateId, readonly TokenDescriptor[]>;
	handlers: readonly string[];
}

export type CaptureValue = string | number;

// A span of input consumed by one recognized token
export interface TokenMatch {
	end: number;
	value?: CaptureValue;
	// set by tokens that consume a line terminator
	lineBreak?: boolean;
}

export function describeToken(t: TokenDescriptor): string | null {
	if (t.kind === 'error') return null;
	if (t.kind === 'literal') return `'${t.text ?? ''}'`;
	return `<${t.kind}>`;
}
