import { type Diag, type DiagCode, normalizeDiagCode } from './analysisTypes';

export interface DiagSettings {
	disabled: ReadonlySet<DiagCode>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// `disable` accepts an array or a comma/space separated string of codes (CFG003) or names (duplicate-binding).
export function parseDisabledDiagList(input: unknown): Set<DiagCode> {
	const raw = Array.isArray(input) ? input : typeof input === 'string' ? input.split(/[,\s]+/) : [];
	const codes = raw
		.map(item => (typeof item === 'string' ? normalizeDiagCode(item) : null))
		.filter((c): c is DiagCode => c !== null);
	return new Set(codes);
}

// Reads the `diagnostics` block of the client settings ({ disable: [...] }).
export function readDiagSettings(diagnostics: unknown): DiagSettings {
	return { disabled: parseDisabledDiagList(isRecord(diagnostics) ? diagnostics.disable : undefined) };
}

export function filterDiagnostics(diags: ReadonlyArray<Diag>, settings: DiagSettings): Diag[] {
	return diags.filter(d => !settings.disabled.has(d.code));
}
