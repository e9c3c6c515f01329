// Raised for defects in the grammar or its handlers, never for bad user input.
export class GrammarError extends Error {
	readonly state?: string;

	constructor(message: string, state?: string) {
		super(state ? `${message} (state ${state})` : message);
		this.name = 'GrammarError';
		this.state = state;
	}
}
