import { findDuplicateBindings, type DuplicateBinding } from './bindings';
import { ConfigParser, createContext, type ConfigContext, type StepSnapshot } from './core/parser';
import type { ResultRecord } from './core/results';
import type { TokenTable } from './core/tokens';
import { DirectiveHandlers } from './handlers/directives';
import { silentLogger, type Logger } from './log';
import type { ConfigModel } from './model';
import { preprocessVariables, type SubstitutedText } from './variables';
import { detectVersion, type VersionVerdict } from './version';

export interface CheckOptions {
	filename?: string;
	logger?: Logger;
	// defaults to true
	checkDuplicates?: boolean;
	onStep?: (snap: StepSnapshot) => void;
}

export interface CheckResult {
	context: ConfigContext;
	records: ResultRecord[];
	model: ConfigModel;
	// parser input after variable substitution, with offsets back to the original
	substituted: SubstitutedText;
	version: VersionVerdict;
	duplicates: DuplicateBinding[];
}

// Variables, version detection, parse, duplicate check: the full pass over one configuration file.
export function checkConfigText(table: TokenTable, original: string, opts: CheckOptions = {}): CheckResult {
	const logger = opts.logger ?? silentLogger;
	const context = createContext(opts.filename);

	const substituted = preprocessVariables(original);
	for (const v of substituted.variables) logger.debug(`Got new variable ${v.key} = ${v.value}`);
	for (const p of substituted.problems) {
		logger.error(p.message);
		context.hasWarnings = true;
	}

	const version = detectVersion(original);
	if (version.evidence) logger.debug(`deciding for version 4 due to this line: ${version.evidence.text}`);
	else {
		logger.warn(`${context.filename} looks like a version 3 configuration file; it is parsed as version 4 without conversion`);
		context.hasWarnings = true;
	}

	const handlers = new DirectiveHandlers();
	const records = new ConfigParser(table, handlers).parse(substituted.text, context, { logger, onStep: opts.onStep });
	for (const r of records) {
		if (r.kind !== 'handler' || r.success) continue;
		logger.error(`CONFIG: line ${r.line}: ${r.handler}: ${r.error ?? 'failed'}`);
		context.hasErrors = true;
	}

	const duplicates = opts.checkDuplicates === false ? [] : findDuplicateBindings(handlers.model.bindings, logger);
	if (duplicates.length) context.hasErrors = true;

	return { context, records, model: handlers.model, substituted, version, duplicates };
}
