import { describeToken, type TokenDescriptor } from './tokens';
import { isLineBreak } from './recognizer';

const CONTEXT_LINES = 2;

export function expectedTokensMessage(tokens: readonly TokenDescriptor[]): string {
	const names = tokens.map(describeToken).filter((n): n is string => n !== null);
	return `Expected one of these tokens: ${names.join(', ')}`;
}

// First offset of the line containing `pos` (a cursor sitting on a terminator belongs to the line it ends).
export function lineStartAt(text: string, pos: number): number {
	let i = Math.min(pos, text.length);
	while (i > 0 && !isLineBreak(text[i - 1])) i--;
	return i;
}

export function lineEndAt(text: string, start: number): number {
	let i = start;
	while (i < text.length && !isLineBreak(text[i])) i++;
	return i;
}

function previousLineStart(text: string, start: number): number | null {
	if (start <= 0) return null;
	let end = start - 1;
	if (text[end] === '\n' && text[end - 1] === '\r') end--;
	return lineStartAt(text, end);
}

function nextLineStart(text: string, start: number): number | null {
	const end = lineEndAt(text, start);
	if (end >= text.length) return null;
	const next = text[end] === '\r' && text[end + 1] === '\n' ? end + 2 : end + 1;
	return next < text.length ? next : null;
}

// Same length as the line: blanks (tabs kept for alignment) before the cursor, carets from it.
export function pointerLine(text: string, lineStart: number, cursor: number): string {
	const end = lineEndAt(text, lineStart);
	let out = '';
	for (let k = lineStart; k < end; k++) {
		if (k >= cursor) out += '^';
		else out += text[k] === '\t' ? '\t' : ' ';
	}
	return out;
}

export interface ErrorReport {
	message: string;
	lineStart: number;
	errorLine: string;
	pointer: string;
	// log lines in output order, without the CONFIG prefix
	excerpt: string[];
}

function numbered(line: number, content: string): string {
	return `Line ${String(line).padStart(3)}: ${content}`;
}

export function buildErrorReport(text: string, cursor: number, line: number, tokens: readonly TokenDescriptor[]): ErrorReport {
	const message = expectedTokensMessage(tokens);
	const lineStart = lineStartAt(text, cursor);
	const errorLine = text.slice(lineStart, lineEndAt(text, lineStart));
	const pointer = pointerLine(text, lineStart, cursor);

	const before: string[] = [];
	let walk: number | null = lineStart;
	for (let i = 1; i <= CONTEXT_LINES && line - i >= 1; i++) {
		walk = walk === null ? null : previousLineStart(text, walk);
		if (walk === null) break;
		before.unshift(numbered(line - i, text.slice(walk, lineEndAt(text, walk))));
	}

	const after: string[] = [];
	walk = lineStart;
	for (let i = 1; i <= CONTEXT_LINES; i++) {
		walk = nextLineStart(text, walk);
		if (walk === null) break;
		after.push(numbered(line + i, text.slice(walk, lineEndAt(text, walk))));
	}

	const excerpt = [...before, numbered(line, errorLine), `          ${pointer}`, ...after];
	return { message, lineStart, errorLine, pointer, excerpt };
}
