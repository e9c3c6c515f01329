#!/usr/bin/env node
import 'source-map-support/register.js';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { serializeReplies } from './core/results';
import { GrammarError } from './errors';
import { loadGrammar } from './grammar';
import { createLogger, stderrConsole, type ConsoleLike } from './log';
import { checkConfigText } from './pipeline';

export const EXIT_OK = 0;
export const EXIT_ERRORS = 1;
export const EXIT_USAGE = 2;

const USAGE = 'usage: tilecfg <config-file> [--grammar <path>] [--json] [--debug] [--no-duplicates]';

export interface CliArgs {
	file: string;
	grammar?: string;
	json: boolean;
	debug: boolean;
	duplicates: boolean;
}

export interface CliIO {
	out: (text: string) => void;
	console: ConsoleLike;
	env: Record<string, string | undefined>;
}

export function parseArgs(argv: readonly string[]): CliArgs | string {
	const args: CliArgs = { file: '', json: false, debug: false, duplicates: true };
	for (let i = 0; i < argv.length; i++) {
		const a = argv[i] ?? '';
		if (a === '--json') args.json = true;
		else if (a === '--debug') args.debug = true;
		else if (a === '--no-duplicates') args.duplicates = false;
		else if (a === '--grammar') {
			const next = argv[++i];
			if (!next) return '--grammar needs a path';
			args.grammar = next;
		} else if (a.startsWith('--grammar=')) args.grammar = a.slice('--grammar='.length);
		else if (a.startsWith('-') && a !== '-') return `unknown option ${a}`;
		else if (args.file) return `unexpected argument ${a}`;
		else args.file = a;
	}
	if (!args.file) return 'no configuration file given';
	return args;
}

async function readInput(file: string): Promise<string> {
	if (file !== '-') return fs.readFile(file, 'utf8');
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	return Buffer.concat(chunks).toString('utf8');
}

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
	const parsed = parseArgs(argv);
	if (typeof parsed === 'string') {
		io.console.error(`tilecfg: ${parsed}`);
		io.console.error(USAGE);
		return EXIT_USAGE;
	}
	const debug = parsed.debug || io.env.TILECFG_DEBUG === '1';
	const logger = createLogger(io.console, { debug });

	let text: string;
	try {
		text = await readInput(parsed.file);
	} catch (e) {
		io.console.error(`tilecfg: could not read ${parsed.file}: ${e instanceof Error ? e.message : String(e)}`);
		return EXIT_USAGE;
	}

	try {
		const { table, source } = await loadGrammar(parsed.grammar);
		logger.debug(`grammar: ${source}`);
		const filename = parsed.file === '-' ? '<stdin>' : path.basename(parsed.file);
		const result = checkConfigText(table, text, { filename, logger, checkDuplicates: parsed.duplicates });
		if (parsed.json) io.out(`${serializeReplies(result.records, 2)}\n`);
		if (result.context.hasErrors || result.context.hasWarnings) {
			logger.info(`${filename}: ${result.context.hasErrors ? 'errors' : 'warnings'} found (see above)`);
		}
		return result.context.hasErrors ? EXIT_ERRORS : EXIT_OK;
	} catch (e) {
		if (e instanceof GrammarError) {
			io.console.error(`BUG: ${e.message}`);
			return EXIT_USAGE;
		}
		throw e;
	}
}

if (require.main === module) {
	const io: CliIO = { out: text => process.stdout.write(text), console: stderrConsole(), env: process.env };
	runCli(process.argv.slice(2), io)
		.then(code => { process.exitCode = code; })
		.catch(err => { console.error(err); process.exit(EXIT_USAGE); });
}
