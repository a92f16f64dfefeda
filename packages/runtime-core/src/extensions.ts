import type { QuickJSContext, QuickJSDeferredPromise, QuickJSHandle } from "quickjs-emscripten";
import type { EntrypointResolver } from "./entrypoint";
import type { ExecutionCoordinator } from "./execution-coordinator";
import { DYNAMIC_IMPORT_MODULE, type ModuleLoader } from "./module-loader";
import type { Extension, ExtensionCallContext, HostFunction, Logger } from "./types";
import type { ValueBridge } from "./value-bridge";

/**
 * Name of the namespace every runtime installs
 */
export const BUILTIN_EXTENSION_NAME = "modhost";

/**
 * Property-descriptor helpers importable from ext:modhost/runtime.js
 */
const RUNTIME_HELPERS_SOURCE = `
export function nonEnumerable(value) {
	return { value, writable: true, enumerable: false, configurable: true };
}

export function readOnly(value) {
	return { value, enumerable: true, writable: false, configurable: true };
}

export function writeable(value) {
	return { value, writable: true, enumerable: true, configurable: true };
}

export function getterOnly(getter) {
	return { get: getter, set() {}, enumerable: true, configurable: true };
}

export function applyToGlobal(properties) {
	Object.defineProperties(globalThis, properties);
}
`;

/**
 * Entry for rewritten dynamic imports: the host resolves and fetches the target graph,
 * then the engine links the prepared module
 */
const DYNAMIC_IMPORT_SOURCE = `
export async function dynamicImport(referrer, specifier) {
	return import(await modhost.prepareImport(referrer, \`\${specifier}\`));
}
`;

/**
 * Native function working on engine handles directly. Arguments are borrowed.
 */
export type EngineFunction = (...args: QuickJSHandle[]) => QuickJSHandle | void;

/**
 * An extension some of whose functions need the raw engine arguments
 */
export interface BuiltinExtension extends Extension {
	engineFunctions: Record<string, EngineFunction>;
}

/**
 * Everything an extension needs from the runtime that installs it
 */
export interface ExtensionHost {
	vm: QuickJSContext;
	bridge: ValueBridge;
	coordinator: ExecutionCoordinator;
	loader: ModuleLoader;
	context: ExtensionCallContext;
}

/**
 * The extension every runtime carries: entrypoint registration, dynamic import
 * preparation and the runtime helpers module
 */
export function createBuiltinExtension(
	vm: QuickJSContext,
	entrypoints: EntrypointResolver,
	loader: ModuleLoader
): BuiltinExtension {
	const importFile = DYNAMIC_IMPORT_MODULE.slice(`ext:${BUILTIN_EXTENSION_NAME}/`.length);
	return {
		name: BUILTIN_EXTENSION_NAME,
		functions: {
			prepareImport: (_context, referrer, specifier) => {
				if (typeof referrer !== "string" || typeof specifier !== "string") {
					throw new TypeError("prepareImport expects a referrer and a specifier string");
				}
				return loader.prepareImport(specifier, referrer);
			},
		},
		engineFunctions: {
			registerEntrypoint: (fn) => {
				entrypoints.register(vm, fn);
			},
		},
		modules: {
			"runtime.js": RUNTIME_HELPERS_SOURCE,
			[importFile]: DYNAMIC_IMPORT_SOURCE,
		},
	};
}

/**
 * Installs extensions into an engine context.
 * Host functions receive decoded arguments; returned values, and resolved promise
 * values, are encoded back. Promise results become engine promises settled later.
 */
export class ExtensionInstaller {
	private pending: Set<QuickJSDeferredPromise> = new Set();

	constructor(private host: ExtensionHost) {}

	/**
	 * Install an extension's functions, modules and setup hook
	 */
	install(extension: Extension | BuiltinExtension): void {
		const { vm, bridge, loader } = this.host;
		const functions = Object.entries(extension.functions ?? {});
		const engineFunctions = "engineFunctions" in extension ? Object.entries(extension.engineFunctions) : [];

		if (functions.length + engineFunctions.length > 0) {
			const namespace = vm.newObject();
			try {
				for (const [name, fn] of functions) {
					const handle = this.wrap(`${extension.name}.${name}`, fn);
					vm.setProp(namespace, name, handle);
					handle.dispose();
				}
				for (const [name, fn] of engineFunctions) {
					const handle = this.wrapEngineFunction(`${extension.name}.${name}`, fn);
					vm.setProp(namespace, name, handle);
					handle.dispose();
				}
				bridge.freeze(namespace);
				vm.defineProp(vm.global, extension.name, {
					value: namespace,
					configurable: false,
					enumerable: false,
				});
			} finally {
				namespace.dispose();
			}
		}

		for (const [file, code] of Object.entries(extension.modules ?? {})) {
			loader.registerExtensionModule(extension.name, file, code);
		}

		extension.setup?.(this.host.context);
		this.host.context.logger.debug(`[ExtensionInstaller] Installed extension: ${extension.name}`);
	}

	/**
	 * Install a global console forwarding to the logger
	 */
	installConsole(logger: Logger): void {
		const { vm } = this.host;
		const levels: Record<string, (message: string) => void> = {
			log: (message) => logger.info(message),
			info: (message) => logger.info(message),
			debug: (message) => logger.debug(message),
			warn: (message) => logger.warn(message),
			error: (message) => logger.error(message),
		};

		const consoleHandle = vm.newObject();
		for (const [level, write] of Object.entries(levels)) {
			const fn = vm.newFunction(level, (...args: QuickJSHandle[]) => {
				write(`[script] ${args.map((arg) => formatLogArgument(vm.dump(arg))).join(" ")}`);
			});
			vm.setProp(consoleHandle, level, fn);
			fn.dispose();
		}
		vm.setProp(vm.global, "console", consoleHandle);
		consoleHandle.dispose();
	}

	/**
	 * Release engine promises whose host work never finished
	 */
	dispose(): void {
		for (const deferred of this.pending) {
			deferred.dispose();
		}
		this.pending.clear();
	}

	private wrap(name: string, fn: HostFunction): QuickJSHandle {
		const { vm, bridge } = this.host;
		return vm.newFunction(name, (...argHandles: QuickJSHandle[]) => {
			let result: unknown;
			try {
				const args = argHandles.map((handle, index) => bridge.decode(handle, `${name} argument ${index}`));
				result = fn(this.host.context, ...args);
			} catch (error) {
				return { error: this.newError(error) };
			}

			if (result instanceof Promise) {
				return this.defer(name, result);
			}
			try {
				return bridge.encode(result);
			} catch (error) {
				return { error: this.newError(error) };
			}
		});
	}

	private wrapEngineFunction(name: string, fn: EngineFunction): QuickJSHandle {
		return this.host.vm.newFunction(name, (...argHandles: QuickJSHandle[]) => {
			try {
				return fn(...argHandles);
			} catch (error) {
				return { error: this.newError(error) };
			}
		});
	}

	private defer(name: string, operation: Promise<unknown>): QuickJSHandle {
		const { vm, bridge, coordinator } = this.host;
		const deferred = vm.newPromise();
		this.pending.add(deferred);

		const settle = (succeeded: boolean, outcome: unknown) => {
			this.pending.delete(deferred);
			if (!vm.alive) {
				return;
			}
			let handle: QuickJSHandle;
			try {
				handle = succeeded ? bridge.encode(outcome) : this.newError(outcome);
			} catch (error) {
				handle = this.newError(error);
				succeeded = false;
			}
			if (succeeded) {
				deferred.resolve(handle);
			} else {
				deferred.reject(handle);
			}
			handle.dispose();
		};

		coordinator.trackHostOperation(
			operation.then(
				(value) => settle(true, value),
				(error: unknown) => {
					this.host.context.logger.debug(`[ExtensionInstaller] ${name} rejected:`, error);
					settle(false, error);
				}
			)
		);
		return deferred.handle;
	}

	private newError(error: unknown): QuickJSHandle {
		if (error instanceof Error) {
			return this.host.vm.newError({ name: error.name, message: error.message });
		}
		return this.host.vm.newError(String(error));
	}
}

function formatLogArgument(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
}
