import { GrammarError } from '../errors';
import type { CaptureValue } from './tokens';

export const CAPTURE_CAPACITY = 10;

// Read-only view handed to semantic handlers
export interface CaptureReader {
	getString(id: string): string;
	getInteger(id: string): number;
	has(id: string): boolean;
}

interface CaptureEntry { id: string; value: CaptureValue }

// Values identified by the grammar during one directive (e.g. $workspace, &width).
export class CaptureStack implements CaptureReader {
	private readonly entries: CaptureEntry[] = [];

	get size(): number { return this.entries.length; }

	// Repeated pushes under one id build a comma separated list.
	pushString(id: string, value: string): void {
		const prev = this.entries.find(e => e.id === id);
		if (prev) {
			prev.value = `${String(prev.value)},${value}`;
			return;
		}
		this.alloc({ id, value });
	}

	pushInteger(id: string, value: number): void {
		this.alloc({ id, value });
	}

	push(id: string, value: CaptureValue): void {
		if (typeof value === 'number') this.pushInteger(id, value);
		else this.pushString(id, value);
	}

	getString(id: string): string {
		const e = this.entries.find(x => x.id === id);
		return e && typeof e.value === 'string' ? e.value : '';
	}

	getInteger(id: string): number {
		const e = this.entries.find(x => x.id === id);
		return e && typeof e.value === 'number' ? e.value : 0;
	}

	has(id: string): boolean {
		return this.entries.some(e => e.id === id);
	}

	clear(): void {
		this.entries.length = 0;
	}

	snapshot(): Record<string, CaptureValue> {
		const out: Record<string, CaptureValue> = {};
		for (const e of this.entries) out[e.id] = e.value;
		return out;
	}

	private alloc(entry: CaptureEntry): void {
		if (this.entries.length >= CAPTURE_CAPACITY) {
			throw new GrammarError(`capture stack full: a directive identifies more than ${CAPTURE_CAPACITY} tokens (pushing "${entry.id}")`);
		}
		this.entries.push(entry);
	}
}
