import type { QuickJSContext, QuickJSHandle, QuickJSRuntime, QuickJSWASMModule } from "quickjs-emscripten";
import { getEngineModule } from "./engine";
import { EntrypointResolver } from "./entrypoint";
import {
	ConfigurationError,
	DisposedError,
	MissingEntrypointError,
	ModuleLoadError,
	ModuleRuntimeError,
	ValueNotCallableError,
	ValueNotFoundError,
	isModuleRuntimeError,
} from "./errors";
import { ExecutionCoordinator } from "./execution-coordinator";
import { BUILTIN_EXTENSION_NAME, ExtensionInstaller, createBuiltinExtension } from "./extensions";
import type { Module } from "./module";
import { createModuleHandle, type ModuleHandle } from "./module-handle";
import { ModuleLoader } from "./module-loader";
import { resolveRuntimeOptions, type ResolvedRuntimeOptions, type RuntimeOptions } from "./runtime-options";
import { RuntimeState } from "./runtime-state";
import { FunctionTable, type StoredFunction } from "./stored-function";
import type { FunctionArguments, Logger } from "./types";
import { ValueBridge } from "./value-bridge";
import { parseValue, type ValueSchema } from "./value-schema";

const EVAL_FILENAME = "<eval>";

/**
 * A script engine instance with its module loader, deadline and host bridge.
 *
 * Calls into one runtime must not overlap: await each call before starting the next.
 * Always dispose a runtime when done with it; engine memory is not garbage collected
 * by the host.
 *
 * @example
 * ```ts
 * const runtime = await ModuleRuntime.create({ timeoutMs: 1000 });
 * const handle = await runtime.loadModule(new Module("math.js", "export const add = (a, b) => a + b;"));
 * await runtime.callFunction(handle, "add", [2, 3]); // 5
 * runtime.dispose();
 * ```
 */
export class ModuleRuntime {
	private static nextRuntimeId = 1;

	readonly id: number;
	/** Host-side state shared with extensions */
	readonly state: RuntimeState = new RuntimeState();

	private options: ResolvedRuntimeOptions;
	private engine: QuickJSRuntime;
	private vm: QuickJSContext;
	private functions: FunctionTable;
	private bridge: ValueBridge;
	private loader: ModuleLoader;
	private coordinator: ExecutionCoordinator;
	private entrypoints: EntrypointResolver;
	private extensions: ExtensionInstaller;
	private disposed = false;

	/**
	 * Create a runtime. Loads the engine on first use.
	 * @throws ConfigurationError for invalid options
	 */
	static async create(options: RuntimeOptions = {}): Promise<ModuleRuntime> {
		const resolved = resolveRuntimeOptions(options);
		if (resolved.extensions.some((extension) => extension.name === BUILTIN_EXTENSION_NAME)) {
			throw new ConfigurationError(`Invalid runtime options: extension name '${BUILTIN_EXTENSION_NAME}' is reserved`);
		}
		const engineModule = await getEngineModule();
		return new ModuleRuntime(engineModule, resolved);
	}

	/**
	 * Load a module with its side modules into a fresh runtime, call its entrypoint,
	 * and dispose the runtime
	 */
	static executeModule(
		module: Module,
		sideModules: readonly Module[],
		options?: RuntimeOptions,
		args?: FunctionArguments
	): Promise<unknown>;
	static executeModule<T>(
		module: Module,
		sideModules: readonly Module[],
		options: RuntimeOptions | undefined,
		args: FunctionArguments,
		schema: ValueSchema<T>
	): Promise<T>;
	static async executeModule<T>(
		module: Module,
		sideModules: readonly Module[],
		options: RuntimeOptions = {},
		args: FunctionArguments = [],
		schema?: ValueSchema<T>
	): Promise<unknown> {
		const runtime = await ModuleRuntime.create(options);
		try {
			const handle = await runtime.loadModules(module, sideModules);
			const value = await runtime.callEntrypoint(handle, args);
			return schema ? parseValue(schema, value, `Entrypoint of ${module.filename}`) : value;
		} finally {
			runtime.dispose();
		}
	}

	private constructor(engineModule: QuickJSWASMModule, options: ResolvedRuntimeOptions) {
		this.id = ModuleRuntime.nextRuntimeId++;
		this.options = options;

		this.engine = engineModule.newRuntime();
		this.engine.setMemoryLimit(options.memoryLimitBytes);
		this.engine.setMaxStackSize(options.maxStackBytes);
		this.vm = this.engine.newContext();

		this.functions = new FunctionTable(this.id);
		this.bridge = new ValueBridge(this.vm, this.functions);
		this.loader = new ModuleLoader({
			cache: options.moduleCache,
			transpiler: options.transpiler,
			logger: options.logger,
			permissions: options.permissions,
			fetchers: options.fetchers,
			cwd: options.cwd,
		});
		this.coordinator = new ExecutionCoordinator({
			runtime: this.engine,
			vm: this.vm,
			loader: this.loader,
			bridge: this.bridge,
			transpiler: options.transpiler,
			logger: options.logger,
			timeoutMs: options.timeoutMs,
		});
		this.entrypoints = new EntrypointResolver(this.functions, options.defaultEntrypoint);

		this.engine.setModuleLoader(
			(moduleName) => this.loadEngineModule(moduleName),
			(baseName, requestedName) => this.normalizeEngineSpecifier(baseName, requestedName)
		);

		this.extensions = new ExtensionInstaller({
			vm: this.vm,
			bridge: this.bridge,
			coordinator: this.coordinator,
			loader: this.loader,
			context: { state: this.state, logger: options.logger },
		});
		this.extensions.installConsole(options.logger);
		for (const extension of [createBuiltinExtension(this.vm, this.entrypoints, this.loader), ...options.extensions]) {
			this.extensions.install(extension);
		}

		this.logger.debug(`[ModuleRuntime] Created runtime ${this.id}`);
	}

	get logger(): Logger {
		return this.options.logger;
	}

	/**
	 * Deadline applied to every load and call, in milliseconds
	 */
	get timeoutMs(): number {
		return this.options.timeoutMs;
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	/**
	 * Load a single module as a side module
	 */
	async loadModule(module: Module): Promise<ModuleHandle> {
		return this.load(null, [module]);
	}

	/**
	 * Load side modules in order, then `main` as the runtime's main module.
	 * Returns the main module's handle, or the last side module's when `main` is null.
	 * Modules evaluated before a failure stay loaded.
	 */
	async loadModules(main: Module | null, sideModules: readonly Module[] = []): Promise<ModuleHandle> {
		return this.load(main, sideModules);
	}

	/**
	 * Call the entrypoint found when the module was loaded
	 * @throws MissingEntrypointError when the module has none
	 */
	callEntrypoint(handle: ModuleHandle, args?: FunctionArguments): Promise<unknown>;
	callEntrypoint<T>(handle: ModuleHandle, args: FunctionArguments, schema: ValueSchema<T>): Promise<T>;
	async callEntrypoint<T>(
		handle: ModuleHandle,
		args: FunctionArguments = [],
		schema?: ValueSchema<T>
	): Promise<unknown> {
		this.assertAlive();
		if (!handle.entrypoint) {
			throw new MissingEntrypointError(handle.module);
		}
		const value = await this.invokeStored(handle, handle.entrypoint, args);
		return schema ? parseValue(schema, value, `Entrypoint of ${handle.module.filename}`) : value;
	}

	/**
	 * Call a function by name. Globals are searched before the module's exports.
	 * @param handle - Module whose exports are searched and bound as `this`; omit for globals only
	 */
	callFunction(handle: ModuleHandle | undefined, name: string, args?: FunctionArguments): Promise<unknown>;
	callFunction<T>(
		handle: ModuleHandle | undefined,
		name: string,
		args: FunctionArguments,
		schema: ValueSchema<T>
	): Promise<T>;
	async callFunction<T>(
		handle: ModuleHandle | undefined,
		name: string,
		args: FunctionArguments = [],
		schema?: ValueSchema<T>
	): Promise<unknown> {
		this.assertAlive();
		const moduleId = this.moduleIdOf(handle);
		const fn = this.lookup(moduleId, name);
		let value: unknown;
		try {
			if (!this.bridge.isCallable(fn)) {
				throw new ValueNotCallableError(name);
			}
			value = await this.coordinator.callFunction(moduleId, fn, args);
		} finally {
			fn.dispose();
		}
		return schema ? parseValue(schema, value, name) : value;
	}

	/**
	 * Call a function captured earlier by getFunction or returned from script code
	 * @throws InvalidFunctionError when `fn` belongs to another runtime or was released
	 */
	callStoredFunction(
		handle: ModuleHandle | undefined,
		fn: StoredFunction,
		args?: FunctionArguments
	): Promise<unknown>;
	callStoredFunction<T>(
		handle: ModuleHandle | undefined,
		fn: StoredFunction,
		args: FunctionArguments,
		schema: ValueSchema<T>
	): Promise<T>;
	async callStoredFunction<T>(
		handle: ModuleHandle | undefined,
		fn: StoredFunction,
		args: FunctionArguments = [],
		schema?: ValueSchema<T>
	): Promise<unknown> {
		this.assertAlive();
		const value = await this.invokeStored(handle, fn, args);
		return schema ? parseValue(schema, value, fn.name || "stored function") : value;
	}

	/**
	 * Read a value by name. Globals are searched before the module's exports, and
	 * promises are awaited under the runtime's deadline.
	 * @throws ValueNotFoundError when the value is missing, null or undefined
	 */
	getValue(handle: ModuleHandle | undefined, name: string): Promise<unknown>;
	getValue<T>(handle: ModuleHandle | undefined, name: string, schema: ValueSchema<T>): Promise<T>;
	async getValue<T>(handle: ModuleHandle | undefined, name: string, schema?: ValueSchema<T>): Promise<unknown> {
		this.assertAlive();
		const raw = this.lookup(this.moduleIdOf(handle), name);
		let value: unknown;
		try {
			const resolved = await this.coordinator.resolveValue(raw);
			try {
				value = this.bridge.decode(resolved, name);
			} finally {
				resolved.dispose();
			}
		} finally {
			raw.dispose();
		}
		return schema ? parseValue(schema, value, name) : value;
	}

	/**
	 * Capture a function by name for later calls
	 * @throws ValueNotCallableError when the value is not a function
	 */
	getFunction(handle: ModuleHandle | undefined, name: string): StoredFunction {
		this.assertAlive();
		const value = this.lookup(this.moduleIdOf(handle), name);
		try {
			if (!this.bridge.isCallable(value)) {
				throw new ValueNotCallableError(name);
			}
			return this.functions.store(value.dup(), name);
		} finally {
			value.dispose();
		}
	}

	/**
	 * Check whether a name resolves to a function
	 */
	isCallable(handle: ModuleHandle | undefined, name: string): boolean {
		this.assertAlive();
		let value: QuickJSHandle;
		try {
			value = this.lookup(this.moduleIdOf(handle), name);
		} catch (error) {
			if (isModuleRuntimeError(error, "ValueNotFound")) {
				return false;
			}
			throw error;
		}
		try {
			return this.bridge.isCallable(value);
		} finally {
			value.dispose();
		}
	}

	/**
	 * Export names of a loaded module
	 */
	keys(handle: ModuleHandle): string[] {
		this.assertAlive();
		const namespace = this.coordinator.getNamespace(this.requireModuleId(handle));
		return namespace ? this.bridge.keys(namespace) : [];
	}

	/**
	 * Evaluate an expression in the global scope
	 */
	eval(expression: string): Promise<unknown>;
	eval<T>(expression: string, schema: ValueSchema<T>): Promise<T>;
	async eval<T>(expression: string, schema?: ValueSchema<T>): Promise<unknown> {
		this.assertAlive();
		const value = await this.coordinator.evaluateScript(expression, EVAL_FILENAME);
		return schema ? parseValue(schema, value, "Expression result") : value;
	}

	/**
	 * Store a host value for extensions to read
	 */
	put(key: string, value: unknown): void {
		this.state.put(key, value);
	}

	/**
	 * Remove and return a host value
	 */
	take(key: string): unknown {
		return this.state.take(key);
	}

	/**
	 * Free a stored function. Later calls with it fail.
	 */
	releaseFunction(fn: StoredFunction): void {
		this.assertAlive();
		this.functions.release(fn);
	}

	/**
	 * Release every engine resource held by this runtime
	 */
	dispose(): void {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		this.extensions.dispose();
		this.functions.close();
		this.coordinator.dispose();
		this.bridge.dispose();
		this.vm.dispose();
		this.engine.dispose();
		this.logger.debug(`[ModuleRuntime] Disposed runtime ${this.id}`);
	}

	private async load(main: Module | null, sideModules: readonly Module[]): Promise<ModuleHandle> {
		this.assertAlive();
		const loaded = await this.coordinator.loadModules(main, sideModules);
		const namespace = this.coordinator.getNamespace(loaded.id);
		if (!namespace) {
			throw new ModuleRuntimeError("Runtime", `Internal error: module ${loaded.id} has no namespace`);
		}
		const entrypoint = this.entrypoints.resolve(this.vm, this.bridge, namespace);
		this.logger.debug(`[ModuleRuntime] Loaded ${loaded.specifier}${entrypoint ? " (with entrypoint)" : ""}`);
		return createModuleHandle(loaded.module, loaded.id, this.id, entrypoint);
	}

	private async invokeStored(
		handle: ModuleHandle | undefined,
		fn: StoredFunction,
		args: FunctionArguments
	): Promise<unknown> {
		const moduleId = this.moduleIdOf(handle);
		const fnHandle = this.functions.get(fn);
		return this.coordinator.callFunction(moduleId, fnHandle, args);
	}

	/**
	 * Find a non-nullish value in the global scope, then in a module's exports.
	 * Returns a handle owned by the caller.
	 */
	private lookup(moduleId: number | null, name: string): QuickJSHandle {
		const scopes: QuickJSHandle[] = [this.vm.global];
		const namespace = moduleId === null ? undefined : this.coordinator.getNamespace(moduleId);
		if (namespace) {
			scopes.push(namespace);
		}

		for (const scope of scopes) {
			const value = this.vm.getProp(scope, name);
			if (!this.bridge.isNullish(value)) {
				return value;
			}
			value.dispose();
		}
		throw new ValueNotFoundError(name);
	}

	private moduleIdOf(handle: ModuleHandle | undefined): number | null {
		return handle ? this.requireModuleId(handle) : null;
	}

	private requireModuleId(handle: ModuleHandle): number {
		if (handle.runtimeId !== this.id) {
			throw new ModuleRuntimeError(
				"Runtime",
				`Module handle for ${handle.module.filename} belongs to runtime ${handle.runtimeId}, not runtime ${this.id}`
			);
		}
		return handle.id;
	}

	private loadEngineModule(moduleName: string): string | { error: Error } {
		const code = this.loader.getEngineSource(moduleName);
		if (code === undefined) {
			return { error: new ModuleLoadError(moduleName, `requested module is not loaded: ${moduleName}`) };
		}
		return code;
	}

	private normalizeEngineSpecifier(baseName: string, requestedName: string): string | { error: Error } {
		try {
			return this.loader.resolve(requestedName, baseName, "dynamic").href;
		} catch (error) {
			return { error: error instanceof Error ? error : new Error(String(error)) };
		}
	}

	private assertAlive(): void {
		if (this.disposed) {
			throw new DisposedError();
		}
	}
}
