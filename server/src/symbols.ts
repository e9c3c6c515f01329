import { DocumentSymbol, SymbolKind, type Range } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { lineStartAt } from './core/report';
import type { CheckResult } from './pipeline';
import { origAt } from './variables';

// Outline of a configuration: one symbol per mode block (bindings as children) and per bar block.
export function documentSymbols(doc: TextDocument, result: CheckResult): DocumentSymbol[] {
	const text = doc.getText();
	const map = result.substituted.mapToOrig;
	const block = (offset: number, endOffset: number | undefined): Range => ({
		start: doc.positionAt(lineStartAt(text, origAt(map, offset))),
		end: doc.positionAt(endOffset === undefined ? text.length : origAt(map, endOffset)),
	});
	const top: DocumentSymbol[] = [];

	for (const m of result.model.modes) {
		const range = block(m.offset, m.endOffset);
		const children = result.model.bindings
			.filter(b => b.mode === m.name && b.offset >= m.offset && (m.endOffset === undefined || b.offset <= m.endOffset))
			.map(b => {
				const r = block(b.offset, b.offset);
				const name = [...b.modifiers, b.key].join('+');
				return DocumentSymbol.create(name, b.command, SymbolKind.Key, r, r);
			});
		top.push(DocumentSymbol.create(m.name, 'mode', SymbolKind.Namespace, range, range, children));
	}
	result.model.bars.forEach((bar, i) => {
		const range = block(bar.offset, bar.endOffset);
		const detail = bar.outputs.length ? bar.outputs.join(', ') : undefined;
		top.push(DocumentSymbol.create(`bar ${i + 1}`, detail, SymbolKind.Struct, range, range));
	});
	return top.sort((a, b) => a.range.start.line - b.range.start.line);
}
