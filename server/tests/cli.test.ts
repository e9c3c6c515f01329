import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { EXIT_ERRORS, EXIT_OK, EXIT_USAGE, parseArgs, runCli, type CliIO } from '../src/cli';
import { BUNDLED_GRAMMAR } from './testUtils';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

function fakeIO(env: Record<string, string | undefined> = {}) {
	const out: string[] = [];
	const lines: { level: string; msg: string }[] = [];
	const at = (level: string) => (msg: string) => { lines.push({ level, msg }); };
	const io: CliIO = { out: t => { out.push(t); }, console: { log: at('log'), info: at('info'), warn: at('warn'), error: at('error') }, env };
	return { io, out, messages: (level: string) => lines.filter(l => l.level === level).map(l => l.msg) };
}

describe('argument parsing', () => {
	it('reads flags and the file', () => {
		expect(parseArgs(['a.conf', '--grammar', 'g.yaml', '--json'])).toEqual({ file: 'a.conf', grammar: 'g.yaml', json: true, debug: false, duplicates: true });
		expect(parseArgs(['--grammar=x.yaml', '--debug', '--no-duplicates', '-'])).toEqual({ file: '-', grammar: 'x.yaml', json: false, debug: true, duplicates: false });
	});

	it('rejects bad invocations', () => {
		expect(parseArgs([])).toBe('no configuration file given');
		expect(parseArgs(['--bogus'])).toBe('unknown option --bogus');
		expect(parseArgs(['a', 'b'])).toBe('unexpected argument b');
		expect(parseArgs(['a', '--grammar'])).toBe('--grammar needs a path');
	});
});

describe('tilecfg command', () => {
	it('prints the reply array for a valid file', async () => {
		const { io, out, messages } = fakeIO();
		const code = await runCli([fixture('valid.conf'), '--grammar', BUNDLED_GRAMMAR, '--json'], io);
		expect(code).toBe(EXIT_OK);
		expect(out).toHaveLength(1);
		expect(out[0]?.endsWith(']\n')).toBe(true);
		expect(JSON.parse(out[0] ?? '')).toEqual([
			{ success: true, handler: 'binding', next_state: 'INITIAL', bindtype: 'bindsym', modifiers: ['Mod4'], key: 'Return', release: false, command: 'exec terminal', mode: 'default' },
			{ success: true, handler: 'workspace', next_state: 'INITIAL', workspace: '1', output: 'HDMI-1' },
		]);
		expect(messages('error')).toEqual([]);
		expect(messages('info')).toEqual([]);
	});

	it('exits with 1 and logs the report for a broken file', async () => {
		const { io, out, messages } = fakeIO();
		const code = await runCli([fixture('broken.conf'), '--grammar', BUNDLED_GRAMMAR], io);
		expect(code).toBe(EXIT_ERRORS);
		expect(out).toEqual([]);
		const errors = messages('error');
		expect(errors[0]?.startsWith("CONFIG: Expected one of these tokens: <end>, '#', 'set'")).toBe(true);
		expect(errors.slice(1)).toEqual([
			'CONFIG: (in file broken.conf)',
			'CONFIG: Line   1: # tilecfg config file (v4)',
			'CONFIG: Line   2: bogus',
			'CONFIG:           ^^^^^',
		]);
		expect(messages('info')).toEqual(['broken.conf: errors found (see above)']);
	});

	it('can skip the duplicate binding check', async () => {
		expect(await runCli([fixture('duplicates.conf'), '--grammar', BUNDLED_GRAMMAR], fakeIO().io)).toBe(EXIT_ERRORS);
		expect(await runCli([fixture('duplicates.conf'), '--grammar', BUNDLED_GRAMMAR, '--no-duplicates'], fakeIO().io)).toBe(EXIT_OK);
	});

	it('logs debug output when TILECFG_DEBUG is set', async () => {
		const { io, messages } = fakeIO({ TILECFG_DEBUG: '1' });
		await runCli([fixture('valid.conf'), '--grammar', BUNDLED_GRAMMAR], io);
		expect(messages('log').slice(0, 2)).toEqual([
			`grammar: ${BUNDLED_GRAMMAR}`,
			'Got new variable $mod = Mod4',
		]);
	});

	it('reports usage and unreadable files with exit code 2', async () => {
		const usage = fakeIO();
		expect(await runCli([], usage.io)).toBe(EXIT_USAGE);
		expect(usage.messages('error')[0]).toBe('tilecfg: no configuration file given');

		const missing = fakeIO();
		expect(await runCli([fixture('missing.conf')], missing.io)).toBe(EXIT_USAGE);
		expect(missing.messages('error')[0]?.startsWith(`tilecfg: could not read ${fixture('missing.conf')}:`)).toBe(true);
	});

	it('treats a broken grammar as a bug', async () => {
		const { io, messages } = fakeIO();
		expect(await runCli([fixture('valid.conf'), '--grammar', fixture('bad-grammar.yaml')], io)).toBe(EXIT_USAGE);
		expect(messages('error')[0]).toMatch(/^BUG: grammar ".*bad-grammar\.yaml" failed schema validation:/);
	});
});
