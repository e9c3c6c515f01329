// `set $name value` substitution, applied to the whole file before parsing.

export interface Variable {
	key: string;
	value: string;
	// offset of the `set` line in the original text
	offset: number;
}

export interface VariableProblem {
	message: string;
	offset: number;
	length: number;
}

export interface SubstitutedText {
	text: string;
	variables: Variable[];
	problems: VariableProblem[];
	// mapToOrig[i] is the original offset of text[i]; one extra entry maps the end of input
	mapToOrig: number[];
}

// Collects every variable assignment. Lines whose first word is a comment or shorter than three characters are skipped.
export function collectVariables(original: string): { variables: Variable[]; problems: VariableProblem[] } {
	const variables: Variable[] = [];
	const problems: VariableProblem[] = [];
	let lineStart = 0;
	for (const rawLine of original.split('\n')) {
		const offset = lineStart;
		lineStart += rawLine.length + 1;
		const line = rawLine.replace(/\r$/, '');
		const m = /^[ \t]*(\S+)(?:[ \t]+(.*))?$/.exec(line);
		if (!m) continue;
		const key = m[1] ?? '';
		if (key.startsWith('#') || key.length < 3) continue;
		if (key.toLowerCase() !== 'set') continue;
		const rest = (m[2] ?? '').trimEnd();
		const problem = (message: string) => problems.push({ message, offset, length: line.length });
		if (!rest.startsWith('$')) {
			problem('Malformed variable assignment, name has to start with $');
			continue;
		}
		const split = /^(\S+)[ \t]+(.*)$/.exec(rest);
		if (!split) {
			problem('Malformed variable assignment, need a value');
			continue;
		}
		variables.push({ key: split[1] ?? '', value: split[2] ?? '', offset });
	}
	return { variables, problems };
}

// ASCII-only so folded offsets stay aligned with the original
function foldAscii(s: string): string {
	return s.replace(/[A-Z]/g, c => c.toLowerCase());
}

/*
	Replaces variables in a single left-to-right pass: at each step the
	occurrence nearest to the cursor wins. On a tie the variable defined last
	wins. Matching ignores case; substituted text is never rescanned.
*/
export function substituteVariables(original: string, variables: readonly Variable[]): Pick<SubstitutedText, 'text' | 'mapToOrig'> {
	const folded = foldAscii(original);
	const ordered = [...variables].reverse().map(v => ({ ...v, folded: foldAscii(v.key) }));
	let text = '';
	const mapToOrig: number[] = [];
	const copy = (from: number, to: number) => {
		text += original.slice(from, to);
		for (let k = from; k < to; k++) mapToOrig.push(k);
	};

	let walk = 0;
	while (walk < original.length) {
		let nearest: (typeof ordered)[number] | undefined;
		let at = original.length;
		for (const v of ordered) {
			if (!v.folded) continue;
			const idx = folded.indexOf(v.folded, walk);
			if (idx >= 0 && idx < at) { at = idx; nearest = v; }
		}
		if (!nearest) {
			copy(walk, original.length);
			break;
		}
		copy(walk, at);
		text += nearest.value;
		for (let k = 0; k < nearest.value.length; k++) mapToOrig.push(at);
		walk = at + nearest.key.length;
	}
	mapToOrig.push(original.length);
	return { text, mapToOrig };
}

export function preprocessVariables(original: string): SubstitutedText {
	const { variables, problems } = collectVariables(original);
	return { ...substituteVariables(original, variables), variables, problems };
}

export function origAt(mapToOrig: readonly number[], idx: number): number {
	return mapToOrig[Math.max(0, Math.min(idx, mapToOrig.length - 1))] ?? 0;
}
