// What a parsed configuration amounts to. Filled in by the directive handlers.

export const DEFAULT_MODE = 'default';

export type BindType = 'bindsym' | 'bindcode';

export interface Binding {
	mode: string;
	type: BindType;
	// key symbol for bindsym, keycode (as written) for bindcode
	key: string;
	modifiers: string[];
	release: boolean;
	command: string;
	offset: number;
	line: number;
}

export interface ModeBlock { name: string; offset: number; line: number; endOffset?: number }

export interface Criterion { type: string; value: string }

export interface WindowRule {
	kind: 'for_window' | 'assign';
	criteria: Criterion[];
	// command for for_window, workspace name for assign
	target: string;
	line: number;
}

export interface ColorSet { border: string; background: string; text?: string; indicator?: string }

export interface BarColors {
	background?: string;
	statusline?: string;
	separator?: string;
	workspaces: Record<string, ColorSet>;
}

export interface BarConfig {
	offset: number;
	line: number;
	endOffset?: number;
	barCommand?: string;
	statusCommand?: string;
	socketPath?: string;
	mode: 'dock' | 'hide';
	modifier?: string;
	position: 'top' | 'bottom';
	outputs: string[];
	trayOutput?: string;
	font?: string;
	workspaceButtons: boolean;
	verbose: boolean;
	colors: BarColors;
}

export type BorderStyle = 'normal' | 'pixel' | 'none';
export interface WindowBorder { style: BorderStyle; width: number }

export interface Autostart { command: string; always: boolean; noStartupId: boolean }

export interface FakeOutput { width: number; height: number; x: number; y: number }

export interface Settings {
	font?: string;
	floatingMinimumSize?: { width: number; height: number };
	floatingMaximumSize?: { width: number; height: number };
	floatingModifier?: string[];
	defaultOrientation?: 'horizontal' | 'vertical' | 'auto';
	workspaceLayout?: 'default' | 'stacking' | 'tabbed';
	newWindow?: WindowBorder;
	newFloat?: WindowBorder;
	hideEdgeBorders?: 'none' | 'vertical' | 'horizontal' | 'both';
	focusFollowsMouse?: boolean;
	forceFocusWrapping?: boolean;
	forceXinerama?: boolean;
	workspaceAutoBackAndForth?: boolean;
	fakeOutputs?: FakeOutput[];
	ipcSocket?: string;
	restartState?: string;
	popupDuringFullscreen?: 'ignore' | 'leave_fullscreen' | 'smart';
}

export interface ConfigModel {
	settings: Settings;
	bindings: Binding[];
	modes: ModeBlock[];
	bars: BarConfig[];
	windowRules: WindowRule[];
	workspaceOutputs: { workspace: string; output: string }[];
	autostarts: Autostart[];
	clientColors: Record<string, ColorSet | string>;
}

export function emptyModel(): ConfigModel {
	return { settings: {}, bindings: [], modes: [], bars: [], windowRules: [], workspaceOutputs: [], autostarts: [], clientColors: {} };
}
