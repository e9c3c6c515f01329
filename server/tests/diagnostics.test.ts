import { describe, it, expect } from 'vitest';
import { DiagnosticSeverity, SymbolKind } from 'vscode-languageserver/node';
import { CFG_DIAGCODES, normalizeDiagCode, type Diag } from '../src/analysisTypes';
import { filterDiagnostics, parseDisabledDiagList, readDiagSettings } from '../src/diagSettings';
import { collectDiagnostics, toLspDiagnostic } from '../src/diagnostics';
import { checkConfigText } from '../src/pipeline';
import { documentSymbols } from '../src/symbols';
import { bundledTable, docFrom } from './testUtils';

const HEADER = '# tilecfg config file (v4)\n';

async function analyze(text: string) {
	const doc = docFrom(text);
	const result = checkConfigText(await bundledTable(), text);
	return { doc, result };
}

const range = (sl: number, sc: number, el: number, ec: number) => ({ start: { line: sl, character: sc }, end: { line: el, character: ec } });

describe('diagnostic codes', () => {
	it('normalizes codes and names', () => {
		expect(normalizeDiagCode('cfg003')).toBe('CFG003');
		expect(normalizeDiagCode(' duplicate_binding ')).toBe('CFG003');
		expect(normalizeDiagCode('handler-error')).toBe('CFG002');
		expect(normalizeDiagCode('malformed-variable')).toBe('CFG004');
		expect(normalizeDiagCode('legacy-format')).toBe('CFG005');
		expect(normalizeDiagCode('CFG001')).toBe('CFG001');
		// parse errors are only addressable by code
		expect(normalizeDiagCode('parse-error')).toBeNull();
		expect(normalizeDiagCode('')).toBeNull();
		expect(normalizeDiagCode(undefined)).toBeNull();
	});

	it('reads the disabled list from settings', () => {
		expect([...parseDisabledDiagList('CFG003, legacy-format bogus')]).toEqual(['CFG003', 'CFG005']);
		expect([...parseDisabledDiagList(['cfg004', 3])]).toEqual(['CFG004']);
		expect(parseDisabledDiagList(42).size).toBe(0);
		expect([...readDiagSettings({ disable: ['duplicate-binding'] }).disabled]).toEqual(['CFG003']);
		expect(readDiagSettings(null).disabled.size).toBe(0);
	});

	it('filters disabled diagnostics', () => {
		const mk = (code: Diag['code']): Diag => ({ code, message: code, severity: DiagnosticSeverity.Warning, range: range(0, 0, 0, 0) });
		const diags = [mk('CFG001'), mk('CFG003'), mk('CFG005')];
		expect(filterDiagnostics(diags, readDiagSettings({ disable: 'CFG003,CFG005' })).map(d => d.code)).toEqual(['CFG001']);
	});
});

describe('diagnostics', () => {
	it('reports parse, handler, duplicate and variable problems on the original lines', async () => {
		const { doc, result } = await analyze(HEADER + [
			'bogus',
			'bindsym x exec a',
			'bindsym x exec b',
			'client.background red',
			'set nope 1',
			'',
		].join('\n'));
		const diags = collectDiagnostics(doc, result);
		expect(diags.map(d => [d.code, d.severity, d.range])).toEqual([
			[CFG_DIAGCODES.PARSE_ERROR, DiagnosticSeverity.Error, range(1, 0, 1, 5)],
			[CFG_DIAGCODES.HANDLER_ERROR, DiagnosticSeverity.Error, range(4, 0, 4, 21)],
			[CFG_DIAGCODES.DUPLICATE_BINDING, DiagnosticSeverity.Warning, range(3, 0, 3, 16)],
			[CFG_DIAGCODES.MALFORMED_VARIABLE, DiagnosticSeverity.Warning, range(5, 0, 5, 10)],
		]);
		expect(diags[0]?.message.startsWith("Expected one of these tokens: <end>, '#', 'set', 'bindsym'")).toBe(true);
		expect(diags.slice(1).map(d => d.message)).toEqual([
			'color_single: invalid color "red", expected #rrggbb',
			'Duplicate keybinding (no modifiers with keysym x) in mode "default", first bound on line 3',
			'Malformed variable assignment, name has to start with $',
		]);
	});

	it('maps offsets through variable substitution', async () => {
		const { doc, result } = await analyze('set $c red\nclient.background $c\n');
		expect(collectDiagnostics(doc, result).map(d => [d.code, d.range, d.message])).toEqual([
			['CFG002', range(1, 0, 1, 20), 'color_single: invalid color "red", expected #rrggbb'],
			['CFG005', range(0, 0, 0, 10), 'No statement specific to the current configuration format was found; version 3 files are not converted'],
		]);
	});

	it('keeps CRLF documents on the right lines', async () => {
		const { doc, result } = await analyze('bogus\r\nfont x\r\n');
		const [parse] = collectDiagnostics(doc, result);
		expect(parse?.range).toEqual(range(0, 0, 0, 5));
	});

	it('reports nothing for an empty document', async () => {
		const { doc, result } = await analyze('');
		expect(collectDiagnostics(doc, result)).toEqual([]);
	});

	it('converts to protocol diagnostics', () => {
		const d: Diag = { code: 'CFG003', message: 'dup', severity: DiagnosticSeverity.Warning, range: range(1, 0, 1, 4) };
		expect(toLspDiagnostic(d)).toEqual({ code: 'CFG003', message: 'dup', severity: DiagnosticSeverity.Warning, range: range(1, 0, 1, 4), source: 'tilecfg' });
	});
});

describe('document symbols', () => {
	it('outlines modes with their bindings and bars', async () => {
		const { doc, result } = await analyze(HEADER + [
			'mode "resize" {',
			'  bindsym Left resize shrink',
			'  bindsym Mod4+Escape mode default',
			'}',
			'bar {',
			'  output HDMI-1',
			'}',
			'',
		].join('\n'));
		const symbols = documentSymbols(doc, result);
		expect(symbols.map(s => [s.name, s.detail, s.kind, s.range])).toEqual([
			['resize', 'mode', SymbolKind.Namespace, range(1, 0, 4, 1)],
			['bar 1', 'HDMI-1', SymbolKind.Struct, range(5, 0, 7, 1)],
		]);
		expect(symbols[0]?.children?.map(s => [s.name, s.detail, s.kind, s.range])).toEqual([
			['Left', 'resize shrink', SymbolKind.Key, range(2, 0, 2, 28)],
			['Mod4+Escape', 'mode default', SymbolKind.Key, range(3, 0, 3, 34)],
		]);
	});
});
