import type { Module } from "./module";
import type { ModuleHandle } from "./module-handle";
import { ModuleRuntime } from "./runtime";
import type { RuntimeOptions } from "./runtime-options";
import type { StoredFunction } from "./stored-function";
import type { FunctionArguments } from "./types";
import type { ValueSchema } from "./value-schema";

/**
 * A runtime dedicated to a single module.
 * Reads and calls go to that module without passing a handle around.
 */
export class ModuleWrapper {
	private constructor(
		private runtime: ModuleRuntime,
		private handle: ModuleHandle
	) {}

	/**
	 * Create a runtime and load `module` into it
	 */
	static async fromModule(module: Module, options?: RuntimeOptions): Promise<ModuleWrapper> {
		const runtime = await ModuleRuntime.create(options);
		try {
			const handle = await runtime.loadModule(module);
			return new ModuleWrapper(runtime, handle);
		} catch (error) {
			runtime.dispose();
			throw error;
		}
	}

	getModuleContext(): ModuleHandle {
		return this.handle;
	}

	getRuntime(): ModuleRuntime {
		return this.runtime;
	}

	get(name: string): Promise<unknown>;
	get<T>(name: string, schema: ValueSchema<T>): Promise<T>;
	async get<T>(name: string, schema?: ValueSchema<T>): Promise<unknown> {
		return schema ? this.runtime.getValue(this.handle, name, schema) : this.runtime.getValue(this.handle, name);
	}

	isCallable(name: string): boolean {
		return this.runtime.isCallable(this.handle, name);
	}

	call(name: string, args?: FunctionArguments): Promise<unknown>;
	call<T>(name: string, args: FunctionArguments, schema: ValueSchema<T>): Promise<T>;
	async call<T>(name: string, args: FunctionArguments = [], schema?: ValueSchema<T>): Promise<unknown> {
		return schema
			? this.runtime.callFunction(this.handle, name, args, schema)
			: this.runtime.callFunction(this.handle, name, args);
	}

	callStored(fn: StoredFunction, args?: FunctionArguments): Promise<unknown>;
	callStored<T>(fn: StoredFunction, args: FunctionArguments, schema: ValueSchema<T>): Promise<T>;
	async callStored<T>(fn: StoredFunction, args: FunctionArguments = [], schema?: ValueSchema<T>): Promise<unknown> {
		return schema
			? this.runtime.callStoredFunction(this.handle, fn, args, schema)
			: this.runtime.callStoredFunction(this.handle, fn, args);
	}

	/**
	 * Export names of the wrapped module
	 */
	keys(): string[] {
		return this.runtime.keys(this.handle);
	}

	dispose(): void {
		this.runtime.dispose();
	}
}
