import type { DiagnosticSeverity, Range } from 'vscode-languageserver/node';

export const CFG_DIAGCODES = {
	PARSE_ERROR: 'CFG001',
	HANDLER_ERROR: 'CFG002',
	DUPLICATE_BINDING: 'CFG003',
	MALFORMED_VARIABLE: 'CFG004',
	LEGACY_FORMAT: 'CFG005',
} as const;
export type DiagCode = typeof CFG_DIAGCODES[keyof typeof CFG_DIAGCODES];

const DIAG_CODES: readonly DiagCode[] = Object.values(CFG_DIAGCODES);

function isDiagCode(raw: string): raw is DiagCode {
	return DIAG_CODES.some(c => c === raw);
}

// Friendly names derived from the enum: PARSE_ERROR -> parse-error. Parse errors can only be disabled by code.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(CFG_DIAGCODES)) {
		if (code === CFG_DIAGCODES.PARSE_ERROR) continue;
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export interface Diag { range: Range; message: string; severity: DiagnosticSeverity; code: DiagCode; }
