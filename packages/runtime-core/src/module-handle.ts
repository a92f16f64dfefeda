import type { Module } from "./module";
import type { StoredFunction } from "./stored-function";

/**
 * Reference to a module evaluated by a runtime.
 * Only meaningful against the runtime that produced it.
 */
export interface ModuleHandle {
	readonly module: Module;
	/** Per-runtime id, starting at 1 */
	readonly id: number;
	readonly runtimeId: number;
	/** Function called by callEntrypoint, if the module has one */
	readonly entrypoint?: StoredFunction;
}

export function createModuleHandle(
	module: Module,
	id: number,
	runtimeId: number,
	entrypoint?: StoredFunction
): ModuleHandle {
	const handle: ModuleHandle = entrypoint ? { module, id, runtimeId, entrypoint } : { module, id, runtimeId };
	return Object.freeze(handle);
}
