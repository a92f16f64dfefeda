import type { QuickJSHandle } from "quickjs-emscripten";
import { InvalidFunctionError } from "./errors";

/**
 * Opaque reference to a callable script value.
 * Only valid against the runtime that produced it, and only until that runtime
 * releases it or is disposed.
 */
export class StoredFunction {
	constructor(
		public readonly runtimeId: number,
		public readonly slot: number,
		public readonly name: string
	) {
		Object.freeze(this);
	}

	toString(): string {
		return `[StoredFunction ${this.name || "anonymous"}#${this.runtimeId}:${this.slot}]`;
	}
}

/**
 * Arena of callable engine values owned by one runtime, indexed by slot.
 * The table holds its own duplicate of each handle and disposes it on release.
 */
export class FunctionTable {
	private slots: Map<number, QuickJSHandle> = new Map();
	private nextSlot = 1;
	private closed = false;

	constructor(public readonly runtimeId: number) {}

	/**
	 * Store a function handle. The table takes ownership of `handle`.
	 */
	store(handle: QuickJSHandle, name: string): StoredFunction {
		if (this.closed) {
			handle.dispose();
			throw new InvalidFunctionError("Cannot store a function in a disposed runtime");
		}
		const slot = this.nextSlot++;
		this.slots.set(slot, handle);
		return new StoredFunction(this.runtimeId, slot, name);
	}

	/**
	 * Borrow the handle behind a stored function. The caller must not dispose it.
	 */
	get(fn: StoredFunction): QuickJSHandle {
		if (fn.runtimeId !== this.runtimeId) {
			throw new InvalidFunctionError(
				`${fn.toString()} belongs to runtime ${fn.runtimeId}, not runtime ${this.runtimeId}`
			);
		}
		const handle = this.slots.get(fn.slot);
		if (!handle || !handle.alive) {
			throw new InvalidFunctionError(`${fn.toString()} has been released`);
		}
		return handle;
	}

	has(fn: StoredFunction): boolean {
		return fn.runtimeId === this.runtimeId && this.slots.has(fn.slot);
	}

	release(fn: StoredFunction): void {
		const handle = this.get(fn);
		handle.dispose();
		this.slots.delete(fn.slot);
	}

	get size(): number {
		return this.slots.size;
	}

	/**
	 * Dispose every stored handle. Later lookups fail.
	 */
	close(): void {
		for (const handle of this.slots.values()) {
			if (handle.alive) {
				handle.dispose();
			}
		}
		this.slots.clear();
		this.closed = true;
	}
}
