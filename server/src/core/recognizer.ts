import type { TokenDescriptor, TokenMatch } from './tokens';

// Matching primitives. All of them look at `text` from `pos` and return the
// consumed span, or null when the token does not match there. Positions past
// the last character behave like a NUL terminator.

const MIN_INTEGER = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_INTEGER = BigInt(Number.MAX_SAFE_INTEGER);

export function isLineBreak(ch: string | undefined): boolean {
	return ch === '\n' || ch === '\r';
}

function atEnd(text: string, pos: number): boolean {
	return pos >= text.length;
}

// ASCII-only case folding; bytes above 0x7f compare exactly.
function foldAscii(code: number): number {
	return code >= 65 && code <= 90 ? code + 32 : code;
}

export function skipBlanks(text: string, pos: number): number {
	let i = pos;
	while (i < text.length && (text[i] === ' ' || text[i] === '\t')) i++;
	return i;
}

export function matchLiteral(text: string, pos: number, literal: string): TokenMatch | null {
	if (!literal || pos + literal.length > text.length) return null;
	for (let k = 0; k < literal.length; k++) {
		if (foldAscii(text.charCodeAt(pos + k)) !== foldAscii(literal.charCodeAt(k))) return null;
	}
	return { end: pos + literal.length, value: literal };
}

export function matchNumber(text: string, pos: number): TokenMatch | null {
	let j = pos;
	if (text[j] === '+' || text[j] === '-') j++;
	const digitsStart = j;
	while (j < text.length && text.charCodeAt(j) >= 48 && text.charCodeAt(j) <= 57) j++;
	if (j === digitsStart) return null;
	const big = BigInt(text.slice(pos, j).replace(/^\+/, ''));
	if (big < MIN_INTEGER || big > MAX_INTEGER) return null;
	return { end: j, value: Number(big) };
}

function isWordDelimiter(ch: string | undefined): boolean {
	return ch === undefined || ch === ' ' || ch === '\t' || ch === ']' || ch === ',' || ch === ';' || isLineBreak(ch);
}

// Only \" is unescaped; \w and friends stay as written for regular expressions.
export function unescapeQuotes(raw: string): string {
	let out = '';
	for (let i = 0; i < raw.length; i++) {
		if (raw[i] === '\\' && raw[i + 1] === '"') i++;
		out += raw.charAt(i);
	}
	return out;
}

// word and string share the quoted form; they differ in where an unquoted run stops.
export function matchWordOrString(text: string, pos: number, kind: 'word' | 'string'): TokenMatch | null {
	let begin = pos;
	let j = pos;
	if (text[j] === '"') {
		begin++;
		j++;
		while (j < text.length && (text[j] !== '"' || text[j - 1] === '\\')) j++;
	} else if (kind === 'string') {
		while (j < text.length && !isLineBreak(text[j])) j++;
	} else {
		while (!isWordDelimiter(text[j])) j++;
	}
	if (j === begin) return null;
	const value = unescapeQuotes(text.slice(begin, j));
	if (text[j] === '"') j++;
	return { end: j, value };
}

export function matchLine(text: string, pos: number): TokenMatch {
	let j = pos;
	while (j < text.length && !isLineBreak(text[j])) j++;
	return { end: j + 1, lineBreak: true };
}

export function matchEnd(text: string, pos: number): TokenMatch | null {
	if (!atEnd(text, pos) && !isLineBreak(text[pos])) return null;
	return { end: pos + 1, lineBreak: true };
}

export function matchToken(text: string, pos: number, token: TokenDescriptor): TokenMatch | null {
	switch (token.kind) {
		case 'literal': return matchLiteral(text, pos, token.text ?? '');
		case 'number': return matchNumber(text, pos);
		case 'word':
		case 'string': return matchWordOrString(text, pos, token.kind);
		case 'line': return matchLine(text, pos);
		case 'end': return matchEnd(text, pos);
		case 'error': return null;
	}
}
