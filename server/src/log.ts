import fs from 'node:fs';

export interface Logger {
	debug(msg: string): void;
	info(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
}

// Shape shared by console and the language server's RemoteConsole
export interface ConsoleLike {
	log(msg: string): void;
	info(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
}

export interface LoggerOptions {
	debug?: boolean;
	logFile?: string;
}

export function createLogger(target: ConsoleLike, opts: LoggerOptions = {}): Logger {
	const toFile = (level: string, msg: string) => {
		if (!opts.logFile) return;
		try {
			fs.appendFileSync(opts.logFile, `${new Date().toISOString()} ${level} ${msg}\n`);
		} catch (e) {
			if (opts.debug) target.warn(`failed to append to log file ${opts.logFile}: ${String(e)}`);
		}
	};
	return {
		debug(msg) { if (!opts.debug) return; target.log(msg); toFile('debug', msg); },
		info(msg) { target.info(msg); toFile('info', msg); },
		warn(msg) { target.warn(msg); toFile('warn', msg); },
		error(msg) { target.error(msg); toFile('error', msg); },
	};
}

// Everything goes to stderr so stdout stays free for --json output.
export function stderrConsole(): ConsoleLike {
	const write = (msg: string) => console.error(msg);
	return { log: write, info: write, warn: write, error: write };
}

export const silentLogger: Logger = {
	debug() { /* discard */ },
	info() { /* discard */ },
	warn() { /* discard */ },
	error() { /* discard */ },
};

// Collects log lines in memory; used by tests and the language server's per-document runs.
export class MemoryLogger implements Logger {
	readonly lines: { level: 'debug' | 'info' | 'warn' | 'error'; msg: string }[] = [];
	debug(msg: string) { this.lines.push({ level: 'debug', msg }); }
	info(msg: string) { this.lines.push({ level: 'info', msg }); }
	warn(msg: string) { this.lines.push({ level: 'warn', msg }); }
	error(msg: string) { this.lines.push({ level: 'error', msg }); }
	messages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
		return this.lines.filter(l => l.level === level).map(l => l.msg);
	}
}
