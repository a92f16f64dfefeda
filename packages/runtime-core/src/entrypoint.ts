import type { QuickJSContext, QuickJSHandle } from "quickjs-emscripten";
import type { FunctionTable, StoredFunction } from "./stored-function";
import type { ValueBridge } from "./value-bridge";

/**
 * Decides which function callEntrypoint invokes for a freshly loaded module.
 *
 * A function registered by the script during loading wins; registering again
 * replaces the previous one. Otherwise the configured default export is used
 * when it is callable.
 */
export class EntrypointResolver {
	private registered: StoredFunction | null = null;

	constructor(
		private functions: FunctionTable,
		private defaultEntrypoint?: string
	) {}

	/**
	 * Record a function registered by script code. The handle is borrowed; it is
	 * checked before anything is stored in the function table.
	 * @throws TypeError when `handle` is not a function
	 */
	register(vm: QuickJSContext, handle: QuickJSHandle | undefined): void {
		if (!handle || vm.typeof(handle) !== "function") {
			throw new TypeError("registerEntrypoint expects a function");
		}
		const name = vm.getProp(handle, "name");
		const label = vm.typeof(name) === "string" ? vm.getString(name) : "";
		name.dispose();

		if (this.registered && this.functions.has(this.registered)) {
			this.functions.release(this.registered);
		}
		this.registered = this.functions.store(handle.dup(), label);
	}

	/**
	 * Pick the entrypoint after a load and clear the registration
	 * @param namespace - Export namespace of the module just loaded
	 */
	resolve(vm: QuickJSContext, bridge: ValueBridge, namespace: QuickJSHandle): StoredFunction | undefined {
		const registered = this.take();
		if (registered) {
			return registered;
		}
		if (!this.defaultEntrypoint) {
			return undefined;
		}
		return this.lookupDefault(vm, bridge, namespace, this.defaultEntrypoint);
	}

	/**
	 * Remove and return the registered function, if any
	 */
	take(): StoredFunction | null {
		const registered = this.registered;
		this.registered = null;
		return registered;
	}

	private lookupDefault(
		vm: QuickJSContext,
		bridge: ValueBridge,
		namespace: QuickJSHandle,
		name: string
	): StoredFunction | undefined {
		for (const scope of [vm.global, namespace]) {
			const value = vm.getProp(scope, name);
			try {
				if (bridge.isNullish(value)) {
					continue;
				}
				return bridge.isCallable(value) ? this.functions.store(value.dup(), name) : undefined;
			} finally {
				value.dispose();
			}
		}
		return undefined;
	}
}
