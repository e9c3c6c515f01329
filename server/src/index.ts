import {
	createConnection,
	TextDocuments,
	ProposedFeatures,
	InitializeParams,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	InitializeResult,
	type Connection,
	DocumentSymbolParams,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import path from 'node:path';
import type { DiagCode } from './analysisTypes';
import type { TokenTable } from './core/tokens';
import { toReply } from './core/results';
import { collectDiagnostics, toLspDiagnostic } from './diagnostics';
import { filterDiagnostics, readDiagSettings, type DiagSettings } from './diagSettings';
import { GrammarError } from './errors';
import { loadGrammar } from './grammar';
import { createLogger, type Logger } from './log';
import { checkConfigText, type CheckResult } from './pipeline';
import { documentSymbols } from './symbols';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let grammar: TokenTable | null = null;
const noneDisabled: DiagSettings = { disabled: new Set<DiagCode>() };
const settings = {
	grammarPath: '',
	logFile: '',
	debug: false,
	checkDuplicates: true,
	diag: noneDisabled,
};
let log: Logger = createLogger(connection.console);

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
	if (a.size !== b.size) return false;
	for (const v of a) if (!b.has(v)) return false;
	return true;
}

// Applies initializationOptions or a `tilecfg` settings section; returns what changed.
function applySettings(raw: unknown): { grammar: boolean; validation: boolean } {
	const s: Record<string, unknown> = isRecord(raw) ? raw : {};
	const changed = { grammar: false, validation: false };
	if (typeof s.grammarPath === 'string' && s.grammarPath !== settings.grammarPath) {
		settings.grammarPath = s.grammarPath;
		changed.grammar = true;
	}
	if (typeof s.logFile === 'string') settings.logFile = s.logFile;
	if (typeof s.debug === 'boolean') settings.debug = s.debug;
	if (typeof s.checkDuplicates === 'boolean' && s.checkDuplicates !== settings.checkDuplicates) {
		settings.checkDuplicates = s.checkDuplicates;
		changed.validation = true;
	}
	if ('diagnostics' in s) {
		const next = readDiagSettings(s.diagnostics);
		if (!setsEqual(settings.diag.disabled, next.disabled)) {
			settings.diag = next;
			changed.validation = true;
		}
	}
	log = createLogger(connection.console, { debug: settings.debug, logFile: settings.logFile || undefined });
	return changed;
}

async function reloadGrammar(): Promise<void> {
	try {
		const loaded = await loadGrammar(settings.grammarPath || undefined);
		grammar = loaded.table;
		log.info(`[tilecfg] grammar loaded from ${loaded.source}`);
	} catch (e) {
		// keep serving with the previous grammar
		log.error(`[tilecfg] failed to load grammar: ${e instanceof Error ? e.message : String(e)}`);
		if (!grammar) throw e;
	}
}

// -------------------------------------------------
// Per-document results, reused by symbol requests
// -------------------------------------------------
const checkCache = new Map<string, { version: number; result: CheckResult }>();

function check(doc: TextDocument): CheckResult | null {
	if (!grammar) return null;
	const hit = checkCache.get(doc.uri);
	if (hit && hit.version === doc.version) return hit.result;
	const uri = URI.parse(doc.uri);
	const filename = uri.scheme === 'file' ? path.basename(uri.fsPath) : doc.uri;
	const result = checkConfigText(grammar, doc.getText(), { filename, logger: log, checkDuplicates: settings.checkDuplicates });
	checkCache.set(doc.uri, { version: doc.version, result });
	return result;
}

function validateTextDocument(doc: TextDocument): void {
	try {
		const result = check(doc);
		if (!result) return;
		const diags = filterDiagnostics(collectDiagnostics(doc, result), settings.diag).map(toLspDiagnostic);
		connection.sendDiagnostics({ uri: doc.uri, diagnostics: diags }).catch((e: unknown) => log.warn(`[tilecfg] sendDiagnostics error: ${String(e)}`));
	} catch (e) {
		// a grammar bug surfaces in the log without taking the connection down
		const msg = e instanceof GrammarError ? `BUG: ${e.message}` : String(e);
		log.error(`[tilecfg] validation of ${doc.uri} failed: ${msg}`);
	}
}

function revalidateAllOpenDocs(): void {
	checkCache.clear();
	for (const d of documents.all()) validateTextDocument(d);
}

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
	applySettings(params.initializationOptions);
	log.debug(`[tilecfg] initialized ${new Date().toISOString()}`);
	await reloadGrammar();
	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			documentSymbolProvider: true,
		},
	};
});

connection.onInitialized(() => {
	connection.client.register(DidChangeConfigurationNotification.type, undefined).catch((e: unknown) => {
		log.warn(`[tilecfg] client does not accept configuration registration: ${String(e)}`);
	});
});

connection.onDidChangeConfiguration(async change => {
	const section = isRecord(change.settings) ? change.settings.tilecfg : undefined;
	const changed = applySettings(section);
	if (changed.grammar) await reloadGrammar();
	if (changed.grammar || changed.validation) revalidateAllOpenDocs();
});

// Raw handler replies for a document, in the wire format of the command-line tool's --json output.
connection.onRequest('tilecfg/parseReplies', (params: unknown) => {
	const uri = isRecord(params) && typeof params.uri === 'string' ? params.uri : '';
	const doc = documents.get(uri);
	if (!doc) return { ok: false, error: `document ${uri} is not open` };
	const result = check(doc);
	if (!result) return { ok: false, error: 'no grammar loaded' };
	return { ok: true, replies: result.records.map(toReply) };
});

documents.onDidChangeContent(change => {
	validateTextDocument(change.document);
});

documents.onDidClose(e => {
	checkCache.delete(e.document.uri);
	connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }).catch((err: unknown) => log.warn(`[tilecfg] sendDiagnostics error: ${String(err)}`));
});

connection.onDocumentSymbol((params: DocumentSymbolParams, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	const result = check(doc); if (!result) return [];
	return documentSymbols(doc, result);
});

documents.listen(connection);
connection.listen();
