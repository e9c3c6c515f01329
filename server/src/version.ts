export type ConfigVersion = 3 | 4;

export interface VersionVerdict {
	version: ConfigVersion;
	// the line that decided for version 4
	evidence?: { line: number; text: string };
}

const V4_STATEMENTS = ['bindcode', 'force_focus_wrapping', '# tilecfg config file (v4)', 'workspace_layout'];
const V4_BIND_COMMANDS = [
	'layout', 'floating', 'workspace',
	'focus left', 'focus right', 'focus up', 'focus down',
	'border normal', 'border 1pixel', 'border pixel', 'border borderless',
	'--no-startup-id', 'bar',
];

const startsWithFolded = (s: string, prefix: string) => s.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase();

// `bind <key> <command>`: returns the command part, or null when the line has none.
function bindCommand(line: string): string | null {
	const skipBlanks = (i: number) => {
		while (line[i] === ' ' || line[i] === '\t') i++;
		return i;
	};
	let i = line.indexOf(' ');
	if (i < 0) return null;
	i = line.indexOf(' ', skipBlanks(i));
	if (i < 0) return null;
	i = skipBlanks(i);
	return i < line.length ? line.slice(i) : null;
}

/*
	Looks for statements only the current format has. Only lines terminated by
	a line feed are inspected, and prefixes are compared at the very start of
	the line (no leading blanks).
*/
export function detectVersion(text: string): VersionVerdict {
	const lines = text.split('\n');
	lines.pop();
	for (const [i, line] of lines.entries()) {
		const hit = V4_STATEMENTS.some(s => startsWithFolded(line, s))
			|| (startsWithFolded(line, 'bind') && V4_BIND_COMMANDS.some(c => startsWithFolded(bindCommand(line) ?? '', c)));
		if (hit) return { version: 4, evidence: { line: i + 1, text: line } };
	}
	return { version: 3 };
}
