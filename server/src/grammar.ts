import process from 'node:process';
import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/grammarSchema.json';
import draft7Meta from 'ajv/dist/refs/json-schema-draft-07.json';
import { GrammarError } from './errors';
import { buildTokenTable, type GrammarFile } from './core/table';
import type { TokenTable } from './core/tokens';

export interface LoadedGrammar {
	table: TokenTable;
	source: string;
}

const SOURCE_GRAMMAR = path.resolve(__dirname, '..', '..', 'common', 'grammar.yaml');
const BUILD_GRAMMAR = path.resolve(__dirname, '..', '..', '..', 'common', 'grammar.yaml');

async function resolveGrammarPath(grammarPath?: string): Promise<{ raw: string; resolvedPath: string }> {
	const candidates: string[] = [];
	for (const requested of [grammarPath?.trim(), process.env.TILECFG_GRAMMAR?.trim()]) {
		if (!requested) continue;
		if (path.isAbsolute(requested)) candidates.push(requested);
		else candidates.push(path.resolve(process.cwd(), requested));
	}
	// an explicitly requested grammar that cannot be read is an error, not a fallback
	if (!candidates.length) candidates.push(SOURCE_GRAMMAR, BUILD_GRAMMAR);
	const seen = new Set<string>();
	let lastErr: unknown;
	for (const candidate of candidates) {
		if (seen.has(candidate)) continue;
		seen.add(candidate);
		try {
			const raw = await fs.readFile(candidate, 'utf8');
			return { raw, resolvedPath: candidate };
		} catch (err) {
			lastErr = err;
		}
	}
	throw new GrammarError(`no grammar file could be read (${candidates.join(', ')}): ${String(lastErr)}`);
}

function validateGrammar(obj: unknown, source: string): GrammarFile {
	const ajv = new Ajv2020({ allErrors: true, strict: false });
	ajv.addMetaSchema(draft7Meta);
	const validate = ajv.compile<GrammarFile>(schema);
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new GrammarError(`grammar "${source}" failed schema validation:\n${msg}`);
	}
	return obj;
}

// Parses grammar YAML that is already in memory (tests, editor settings).
export function parseGrammarText(raw: string, source = '<inline>'): TokenTable {
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		throw new GrammarError(`grammar "${source}" is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
	}
	if (!obj) throw new GrammarError(`grammar "${source}" appears to be empty`);
	return buildTokenTable(validateGrammar(obj, source));
}

export async function loadGrammar(grammarPath?: string): Promise<LoadedGrammar> {
	const { raw, resolvedPath } = await resolveGrammarPath(grammarPath);
	return { table: parseGrammarText(raw, resolvedPath), source: resolvedPath };
}
