import type { StateId } from './tokens';

export type Payload = Record<string, unknown>;

// Written by a semantic handler; the parser pre-fills nextState with the grammar's default.
export interface HandlerResult {
	nextState: StateId;
	success: boolean;
	error?: string;
	payload?: Payload;
}

export interface HandlerRecord extends HandlerResult {
	kind: 'handler';
	handler: string;
	// offset into the parsed input just after the token that triggered the call
	offset: number;
	line: number;
}

export interface ParseErrorRecord {
	kind: 'parse-error';
	success: false;
	parseError: true;
	error: string;
	input: string;
	errorPosition: string;
	offset: number;
	line: number;
	lineStart: number;
}

export type ResultRecord = HandlerRecord | ParseErrorRecord;

export class ResultEmitter {
	private readonly records: ResultRecord[] = [];
	private open = false;

	begin(): void {
		this.records.length = 0;
		this.open = true;
	}

	push(record: ResultRecord): void {
		if (!this.open) throw new Error('result sequence is not open');
		this.records.push(record);
	}

	end(): ResultRecord[] {
		this.open = false;
		return [...this.records];
	}
}

export function isParseError(r: ResultRecord): r is ParseErrorRecord {
	return r.kind === 'parse-error';
}

// Wire format of the reply array, one object per record.
export function toReply(r: ResultRecord): Payload {
	if (r.kind === 'parse-error') {
		return { success: false, parse_error: true, error: r.error, input: r.input, errorposition: r.errorPosition };
	}
	const out: Payload = { success: r.success, handler: r.handler, next_state: r.nextState };
	if (r.error !== undefined) out.error = r.error;
	if (r.payload) Object.assign(out, r.payload);
	return out;
}

export function serializeReplies(records: readonly ResultRecord[], space?: number): string {
	return JSON.stringify(records.map(toReply), null, space);
}
