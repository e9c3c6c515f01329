import type { CaptureReader } from '../core/captures';
import type { Handler, HandlerPosition, HandlerSet } from '../core/parser';
import type { HandlerResult } from '../core/results';
import {
	DEFAULT_MODE, emptyModel,
	type BarConfig, type BindType, type BorderStyle, type ColorSet, type ConfigModel, type FakeOutput, type Settings, type WindowBorder,
} from '../model';
import { CriteriaBuilder } from './criteria';

const TRUE_WORDS = new Set(['1', 'yes', 'true', 'on', 'enable', 'active']);
const FALSE_WORDS = new Set(['0', 'no', 'false', 'off', 'disable', 'inactive']);
const COLOR_RE = /^#[0-9a-fA-F]{6}$/;
const FAKE_OUTPUT_RE = /^(\d+)x(\d+)\+(\d+)\+(\d+)$/;

export function parseBoolean(word: string): boolean | null {
	const w = word.toLowerCase();
	if (TRUE_WORDS.has(w)) return true;
	if (FALSE_WORDS.has(w)) return false;
	return null;
}

export function isColor(value: string): boolean {
	return COLOR_RE.test(value);
}

export function parseFakeOutputs(spec: string): FakeOutput[] | null {
	const out: FakeOutput[] = [];
	for (const part of spec.split(',')) {
		const m = FAKE_OUTPUT_RE.exec(part.trim());
		if (!m) return null;
		out.push({ width: Number(m[1]), height: Number(m[2]), x: Number(m[3]), y: Number(m[4]) });
	}
	return out;
}

function fail(result: HandlerResult, error: string): void {
	result.success = false;
	result.error = error;
}

function splitList(value: string): string[] {
	return value ? value.split(',') : [];
}

type BooleanSetting = 'focusFollowsMouse' | 'forceFocusWrapping' | 'forceXinerama' | 'workspaceAutoBackAndForth';

/*
	Semantic handlers for the bundled grammar. Every call describes the
	directive in its payload and records it in `model`; values the grammar
	cannot rule out (colors, sizes, booleans) are checked here and reported
	through the result.
*/
export class DirectiveHandlers implements HandlerSet {
	readonly model: ConfigModel = emptyModel();
	readonly handlers: Readonly<Record<string, Handler>>;
	private readonly criteria = new CriteriaBuilder();
	private mode = DEFAULT_MODE;
	private bar: BarConfig | null = null;

	constructor() {
		this.handlers = {
			criteria_init: this.criteria.init,
			criteria_add: this.criteria.add,
			criteria_pop_state: this.criteria.popState,

			font: (c, r) => this.setString(r, 'font', c.getString('font')),
			floating_minimum_size: (c, r) => this.floatingSize(c, r, 'floatingMinimumSize'),
			floating_maximum_size: (c, r) => this.floatingSize(c, r, 'floatingMaximumSize'),
			floating_modifier: (c, r) => {
				const modifiers = splitList(c.getString('modifiers'));
				r.payload = { modifiers };
				if (!modifiers.length) return fail(r, 'floating_modifier needs at least one modifier');
				this.model.settings.floatingModifier = modifiers;
			},
			default_orientation: (c, r) => {
				const orientation = c.getString('orientation').toLowerCase();
				r.payload = { orientation };
				if (orientation === 'horizontal' || orientation === 'vertical' || orientation === 'auto') this.model.settings.defaultOrientation = orientation;
			},
			workspace_layout: (c, r) => {
				const raw = c.getString('layout').toLowerCase();
				const layout = raw === 'stacked' ? 'stacking' : raw;
				r.payload = { layout };
				if (layout === 'default' || layout === 'stacking' || layout === 'tabbed') this.model.settings.workspaceLayout = layout;
			},
			new_window: (c, r) => this.newWindow(c, r),
			hide_edge_borders: (c, r) => this.hideEdgeBorders(c, r),
			for_window: (c, r, _a, at) => {
				const command = c.getString('command');
				const criteria = this.criteria.take();
				r.payload = { criteria, command };
				if (!criteria.length) return fail(r, 'for_window needs at least one criterion');
				this.model.windowRules.push({ kind: 'for_window', criteria, target: command, line: at.line });
			},
			assign: (c, r, _a, at) => {
				const workspace = c.getString('workspace');
				const criteria = this.criteria.take();
				r.payload = { criteria, workspace };
				if (!criteria.length) return fail(r, 'assign needs at least one criterion');
				this.model.windowRules.push({ kind: 'assign', criteria, target: workspace, line: at.line });
			},
			focus_follows_mouse: (c, r) => this.setBoolean(c, r, 'focusFollowsMouse'),
			force_focus_wrapping: (c, r) => this.setBoolean(c, r, 'forceFocusWrapping'),
			force_xinerama: (c, r) => this.setBoolean(c, r, 'forceXinerama'),
			workspace_back_and_forth: (c, r) => this.setBoolean(c, r, 'workspaceAutoBackAndForth'),
			fake_outputs: (c, r) => {
				const spec = c.getString('outputs');
				const outputs = parseFakeOutputs(spec);
				r.payload = { outputs: spec };
				if (!outputs) return fail(r, `fake_outputs expects <width>x<height>+<x>+<y>[,...], got "${spec}"`);
				this.model.settings.fakeOutputs = outputs;
			},
			workspace: (c, r) => {
				const workspace = c.getString('workspace');
				const output = c.getString('output');
				r.payload = { workspace, output };
				this.model.workspaceOutputs.push({ workspace, output });
			},
			ipc_socket: (c, r) => this.setString(r, 'ipcSocket', c.getString('path')),
			restart_state: (c, r) => this.setString(r, 'restartState', c.getString('path')),
			popup_during_fullscreen: (c, r) => {
				const value = c.getString('value').toLowerCase();
				r.payload = { value };
				if (value === 'ignore' || value === 'leave_fullscreen' || value === 'smart') this.model.settings.popupDuringFullscreen = value;
			},
			exec: (c, r) => {
				const autostart = {
					command: c.getString('command'),
					always: c.getString('exectype').toLowerCase() === 'exec_always',
					noStartupId: c.has('no_startup_id'),
				};
				r.payload = { exectype: autostart.always ? 'exec_always' : 'exec', no_startup_id: autostart.noStartupId, command: autostart.command };
				this.model.autostarts.push(autostart);
			},
			color_single: (c, r) => {
				const colorclass = c.getString('colorclass').toLowerCase();
				const color = c.getString('color');
				r.payload = { colorclass, color };
				if (!isColor(color)) return fail(r, `invalid color "${color}", expected #rrggbb`);
				this.model.clientColors[colorclass] = color;
			},
			color: (c, r) => {
				const colorclass = c.getString('colorclass').toLowerCase();
				const set = readColorSet(c);
				r.payload = { colorclass, ...set };
				const bad = badColor(set);
				if (bad !== null) return fail(r, `invalid color "${bad}", expected #rrggbb`);
				this.model.clientColors[colorclass] = set;
			},

			binding: (c, r, _a, at) => this.binding(c, r, at, DEFAULT_MODE),
			mode_binding: (c, r, _a, at) => this.binding(c, r, at, this.mode),
			enter_mode: (c, r, _a, at) => {
				this.mode = c.getString('modename');
				r.payload = { mode: this.mode };
				this.model.modes.push({ name: this.mode, offset: at.offset, line: at.line });
			},
			leave_mode: (_c, r, _a, at) => {
				r.payload = { mode: this.mode };
				const block = this.model.modes.find(m => m.name === this.mode && m.endOffset === undefined);
				if (block) block.endOffset = at.offset;
				this.mode = DEFAULT_MODE;
			},

			bar_start: (_c, r, _a, at) => {
				this.bar = newBar(at);
				r.payload = { bar: this.model.bars.length };
			},
			bar_finish: (_c, r, _a, at) => {
				const bar = this.bar ?? newBar(at);
				bar.endOffset = at.offset;
				r.payload = { bar: this.model.bars.length };
				this.model.bars.push(bar);
				this.bar = null;
			},
			bar_command: (c, r, _a, at) => this.barString(r, at, 'barCommand', c.getString('command')),
			bar_status_command: (c, r, _a, at) => this.barString(r, at, 'statusCommand', c.getString('command')),
			bar_socket_path: (c, r, _a, at) => this.barString(r, at, 'socketPath', c.getString('path')),
			bar_font: (c, r, _a, at) => this.barString(r, at, 'font', c.getString('font')),
			bar_tray_output: (c, r, _a, at) => this.barString(r, at, 'trayOutput', c.getString('output')),
			bar_modifier: (c, r, _a, at) => this.barString(r, at, 'modifier', c.getString('modifier')),
			bar_output: (c, r, _a, at) => {
				const output = c.getString('output');
				r.payload = { output };
				this.currentBar(at).outputs.push(output);
			},
			bar_mode: (c, r, _a, at) => {
				const mode = c.getString('mode').toLowerCase();
				r.payload = { mode };
				if (mode === 'dock' || mode === 'hide') this.currentBar(at).mode = mode;
			},
			bar_position: (c, r, _a, at) => {
				const position = c.getString('position').toLowerCase();
				r.payload = { position };
				if (position === 'top' || position === 'bottom') this.currentBar(at).position = position;
			},
			bar_workspace_buttons: (c, r, _a, at) => {
				const value = this.readBoolean(c, r);
				if (value !== null) this.currentBar(at).workspaceButtons = value;
			},
			bar_verbose: (c, r, _a, at) => {
				const value = this.readBoolean(c, r);
				if (value !== null) this.currentBar(at).verbose = value;
			},
			bar_color_single: (c, r, _a, at) => {
				const colorclass = c.getString('colorclass').toLowerCase();
				const color = c.getString('color');
				r.payload = { colorclass, color };
				if (!isColor(color)) return fail(r, `invalid color "${color}", expected #rrggbb`);
				const colors = this.currentBar(at).colors;
				if (colorclass === 'background' || colorclass === 'statusline' || colorclass === 'separator') colors[colorclass] = color;
			},
			bar_color: (c, r, _a, at) => {
				const colorclass = c.getString('colorclass').toLowerCase();
				const set = readColorSet(c);
				r.payload = { colorclass, ...set };
				const bad = badColor(set);
				if (bad !== null) return fail(r, `invalid color "${bad}", expected #rrggbb`);
				this.currentBar(at).colors.workspaces[colorclass] = set;
			},
		};
	}

	// A finished (or abandoned) directive leaves no criteria behind.
	onDirectiveBoundary(): void {
		this.criteria.reset();
	}

	private setString(r: HandlerResult, key: 'font' | 'ipcSocket' | 'restartState', value: string): void {
		r.payload = { [key === 'font' ? 'font' : 'path']: value };
		this.model.settings[key] = value;
	}

	private readBoolean(c: CaptureReader, r: HandlerResult): boolean | null {
		const word = c.getString('value');
		const value = parseBoolean(word);
		r.payload = { value: value ?? word };
		if (value === null) fail(r, `"${word}" is not a boolean (use yes/no, true/false, on/off, 1/0, enable/disable)`);
		return value;
	}

	private setBoolean(c: CaptureReader, r: HandlerResult, key: BooleanSetting): void {
		const value = this.readBoolean(c, r);
		if (value !== null) this.model.settings[key] = value;
	}

	private floatingSize(c: CaptureReader, r: HandlerResult, key: 'floatingMinimumSize' | 'floatingMaximumSize'): void {
		const width = c.getInteger('width');
		const height = c.getInteger('height');
		r.payload = { width, height };
		if (width <= 0 || height <= 0) return fail(r, `floating size must be positive, got ${width} x ${height}`);
		this.model.settings[key] = { width, height };
	}

	private newWindow(c: CaptureReader, r: HandlerResult): void {
		const windowtype = c.getString('windowtype').toLowerCase();
		const border = c.getString('border').toLowerCase();
		let style: BorderStyle;
		let width: number;
		if (border === '1pixel') { style = 'pixel'; width = 1; }
		else if (border === 'none') { style = 'none'; width = 0; }
		else if (border === 'pixel') { style = 'pixel'; width = c.has('width') ? c.getInteger('width') : 1; }
		else { style = 'normal'; width = c.has('width') ? c.getInteger('width') : 2; }
		r.payload = { windowtype, border: style, width };
		if (width < 0) return fail(r, `border width must not be negative, got ${width}`);
		const setting: WindowBorder = { style, width };
		if (windowtype === 'new_float') this.model.settings.newFloat = setting;
		else this.model.settings.newWindow = setting;
	}

	private hideEdgeBorders(c: CaptureReader, r: HandlerResult): void {
		const word = c.getString('hide_borders').toLowerCase();
		let value: Settings['hideEdgeBorders'];
		if (word === 'none' || word === 'vertical' || word === 'horizontal' || word === 'both') value = word;
		else {
			const b = parseBoolean(word);
			if (b !== null) value = b ? 'vertical' : 'none';
		}
		r.payload = { hide_borders: value ?? word };
		if (value === undefined) return fail(r, `hide_edge_borders expects none, vertical, horizontal, both or a boolean, got "${word}"`);
		this.model.settings.hideEdgeBorders = value;
	}

	private binding(c: CaptureReader, r: HandlerResult, at: HandlerPosition, mode: string): void {
		const raw = c.getString('bindtype').toLowerCase();
		const type: BindType = raw === 'bindsym' ? 'bindsym' : 'bindcode';
		const key = c.getString('key');
		const modifiers = splitList(c.getString('modifiers'));
		const release = c.has('release');
		const command = c.getString('command');
		r.payload = { bindtype: type, modifiers, key, release, command, mode };
		if (type === 'bindcode' && !/^\d+$/.test(key)) return fail(r, `${raw} expects a numeric keycode, got "${key}"`);
		this.model.bindings.push({ mode, type, key, modifiers, release, command, offset: at.offset, line: at.line });
	}

	// Bar directives outside a bar block still get somewhere to land.
	private currentBar(at: HandlerPosition): BarConfig {
		if (!this.bar) this.bar = newBar(at);
		return this.bar;
	}

	private barString(r: HandlerResult, at: HandlerPosition, key: 'barCommand' | 'statusCommand' | 'socketPath' | 'font' | 'trayOutput' | 'modifier', value: string): void {
		r.payload = { [key]: value };
		this.currentBar(at)[key] = value;
	}
}

function newBar(at: HandlerPosition): BarConfig {
	return {
		offset: at.offset, line: at.line,
		mode: 'dock', position: 'bottom', outputs: [],
		workspaceButtons: true, verbose: false,
		colors: { workspaces: {} },
	};
}

function readColorSet(c: CaptureReader): ColorSet {
	const set: ColorSet = { border: c.getString('border'), background: c.getString('background') };
	if (c.has('text')) set.text = c.getString('text');
	if (c.has('indicator')) set.indicator = c.getString('indicator');
	return set;
}

function badColor(set: ColorSet): string | null {
	for (const v of [set.border, set.background, set.text, set.indicator]) {
		if (v !== undefined && !isColor(v)) return v;
	}
	return null;
}
