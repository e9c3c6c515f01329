import { DiagnosticSeverity, type Diagnostic, type Range } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { CFG_DIAGCODES, type Diag, type DiagCode } from './analysisTypes';
import { describeBinding } from './bindings';
import { lineEndAt, lineStartAt } from './core/report';
import type { CheckResult } from './pipeline';
import { origAt } from './variables';

export const DIAGNOSTIC_SOURCE = 'tilecfg';

/*
	Converts one check into diagnostics on the original document. Offsets from
	the parser refer to the text after variable substitution and are mapped
	back first; line numbers from the parser are not used since they count a
	CRLF terminator twice.
*/
export function collectDiagnostics(doc: TextDocument, result: CheckResult): Diag[] {
	const text = doc.getText();
	const map = result.substituted.mapToOrig;
	const out: Diag[] = [];
	const push = (code: DiagCode, severity: DiagnosticSeverity, range: Range, message: string) => out.push({ code, severity, range, message });

	// from the offset to the end of its line
	const tail = (offset: number): Range => ({ start: doc.positionAt(offset), end: doc.positionAt(lineEndAt(text, lineStartAt(text, offset))) });
	const wholeLine = (offset: number): Range => {
		const start = lineStartAt(text, offset);
		return { start: doc.positionAt(start), end: doc.positionAt(lineEndAt(text, start)) };
	};

	for (const r of result.records) {
		const offset = origAt(map, r.offset);
		if (r.kind === 'parse-error') push(CFG_DIAGCODES.PARSE_ERROR, DiagnosticSeverity.Error, tail(offset), r.error);
		else if (!r.success) push(CFG_DIAGCODES.HANDLER_ERROR, DiagnosticSeverity.Error, wholeLine(offset), `${r.handler}: ${r.error ?? 'failed'}`);
	}
	for (const d of result.duplicates) {
		const prev = doc.positionAt(origAt(map, d.previous.offset));
		push(CFG_DIAGCODES.DUPLICATE_BINDING, DiagnosticSeverity.Warning, wholeLine(origAt(map, d.binding.offset)),
			`Duplicate keybinding (${describeBinding(d.binding)}) in mode "${d.binding.mode}", first bound on line ${prev.line + 1}`);
	}
	for (const p of result.substituted.problems) {
		push(CFG_DIAGCODES.MALFORMED_VARIABLE, DiagnosticSeverity.Warning, { start: doc.positionAt(p.offset), end: doc.positionAt(p.offset + p.length) }, p.message);
	}
	if (result.version.version === 3 && text.length) {
		push(CFG_DIAGCODES.LEGACY_FORMAT, DiagnosticSeverity.Information, wholeLine(0),
			'No statement specific to the current configuration format was found; version 3 files are not converted');
	}
	return out;
}

export function toLspDiagnostic(d: Diag): Diagnostic {
	return { range: d.range, message: d.message, severity: d.severity, code: d.code, source: DIAGNOSTIC_SOURCE };
}
