import type { QuickJSContext, QuickJSHandle, QuickJSRuntime } from "quickjs-emscripten";
import { ModuleRuntimeError, RuntimeScriptError, TimeoutError } from "./errors";
import { Module } from "./module";
import type { ModuleLoader } from "./module-loader";
import { ROOT_REFERRER } from "./specifier";
import type { FunctionArguments, Logger, Transpiler } from "./types";
import type { ValueBridge } from "./value-bridge";

/**
 * Work that may suspend. The signal is aborted once the task is abandoned.
 */
export type AsyncTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * A module evaluated inside the engine
 */
export interface LoadedModule {
	module: Module;
	id: number;
	specifier: string;
}

export interface ExecutionCoordinatorOptions {
	runtime: QuickJSRuntime;
	vm: QuickJSContext;
	loader: ModuleLoader;
	bridge: ValueBridge;
	transpiler: Transpiler;
	logger: Logger;
	/** Deadline for every task, in milliseconds. Infinity means unbounded. */
	timeoutMs: number;
}

const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Drives the engine's evaluation of modules and function calls, bounding every
 * suspension point by the configured deadline.
 *
 * Cancellation is cooperative: a timed-out task is abandoned, not rolled back.
 * Jobs the engine already queued may still run on a later drain.
 */
export class ExecutionCoordinator {
	private runtime: QuickJSRuntime;
	private vm: QuickJSContext;
	private loader: ModuleLoader;
	private bridge: ValueBridge;
	private transpiler: Transpiler;
	private logger: Logger;
	private timeoutMs: number;
	private deadline: number | null = null;
	private namespaces: Map<number, QuickJSHandle> = new Map();
	private nextModuleId = 1;
	private mainModuleLoaded = false;
	private hostOperations = 0;
	private hostActivityWaiters: Array<() => void> = [];

	constructor(options: ExecutionCoordinatorOptions) {
		this.runtime = options.runtime;
		this.vm = options.vm;
		this.loader = options.loader;
		this.bridge = options.bridge;
		this.transpiler = options.transpiler;
		this.logger = options.logger;
		this.timeoutMs = options.timeoutMs;
		this.runtime.setInterruptHandler(() => this.deadline !== null && Date.now() > this.deadline);
	}

	/**
	 * Race a task against the deadline.
	 * The engine's interrupt handler is armed with the same deadline so that
	 * synchronous script loops are cut off too.
	 */
	async runAsyncTask<T>(task: AsyncTask<T>, timeoutMs: number = this.timeoutMs): Promise<T> {
		const controller = new AbortController();
		if (!Number.isFinite(timeoutMs) || timeoutMs > MAX_TIMER_MS) {
			return task(controller.signal);
		}

		const deadline = Date.now() + timeoutMs;
		const previousDeadline = this.deadline;
		this.deadline = previousDeadline === null ? deadline : Math.min(previousDeadline, deadline);

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				controller.abort();
				reject(new TimeoutError());
			}, timeoutMs);
		});

		const running = task(controller.signal);
		try {
			return await Promise.race([running, timeout]);
		} catch (error) {
			if (error instanceof TimeoutError) {
				throw error;
			}
			if (Date.now() >= deadline) {
				controller.abort();
				throw new TimeoutError();
			}
			throw error;
		} finally {
			clearTimeout(timer);
			this.deadline = previousDeadline;
			if (controller.signal.aborted) {
				running.then(
					() => this.logger.debug("[ExecutionCoordinator] Abandoned task completed after its deadline"),
					(error: unknown) => this.logger.debug("[ExecutionCoordinator] Abandoned task failed after its deadline:", error)
				);
			}
		}
	}

	/**
	 * Load side modules in order, then the main module.
	 * Returns the main module if given, else the last side module.
	 * Modules evaluated before a failure stay registered in the engine.
	 */
	async loadModules(main: Module | null, sideModules: readonly Module[]): Promise<LoadedModule> {
		if (!main && sideModules.length === 0) {
			throw new ModuleRuntimeError("Runtime", "Internal error: attempt to load no modules");
		}
		if (main && this.mainModuleLoaded) {
			throw new ModuleRuntimeError("Runtime", `A main module was already loaded; cannot load ${main.filename} as main`);
		}

		return this.runAsyncTask(async (signal) => {
			let latest: LoadedModule | null = null;
			for (const sideModule of sideModules) {
				latest = await this.evaluateModule(sideModule, signal);
			}
			if (main) {
				latest = await this.evaluateModule(main, signal);
				this.mainModuleLoaded = true;
			}
			if (!latest) {
				throw new ModuleRuntimeError("Runtime", "Internal error: no module was loaded");
			}
			return latest;
		});
	}

	/**
	 * Call an engine function with a module's export namespace as `this`,
	 * settle the result, and decode it
	 */
	async callFunction(moduleId: number | null, fn: QuickJSHandle, args: FunctionArguments): Promise<unknown> {
		return this.runAsyncTask(async (signal) => {
			const value = this.invoke(moduleId, fn, args);
			try {
				return await this.settleAndDecode(value, signal);
			} finally {
				value.dispose();
			}
		});
	}

	/**
	 * Evaluate a classic script in the global scope and decode its completion value
	 */
	async evaluateScript(code: string, filename: string): Promise<unknown> {
		return this.runAsyncTask(async (signal) => {
			const result = this.vm.evalCode(code, filename, { type: "global" });
			if (result.error) {
				throw this.toScriptError(result.error);
			}
			try {
				return await this.settleAndDecode(result.value, signal);
			} finally {
				result.value.dispose();
			}
		});
	}

	/**
	 * Resolve a value under the deadline when it is promise-like.
	 * Returns a new handle owned by the caller.
	 */
	async resolveValue(handle: QuickJSHandle): Promise<QuickJSHandle> {
		if (!this.bridge.isPromiseLike(handle)) {
			return handle.dup();
		}
		return this.runAsyncTask((signal) => this.settle(handle, signal));
	}

	/**
	 * Resolve a promise-like engine value by draining engine jobs and yielding to the
	 * host until it settles. Does not take ownership of `handle`.
	 */
	async settle(handle: QuickJSHandle, signal?: AbortSignal): Promise<QuickJSHandle> {
		const outcome = this.vm.resolvePromise(handle);
		const state: { result?: Awaited<typeof outcome>; failure?: unknown; abandoned?: boolean } = {};
		outcome.then(
			(result) => {
				if (state.abandoned) {
					disposeResult(result);
					return;
				}
				state.result = result;
			},
			(error: unknown) => {
				state.failure = error ?? new RuntimeScriptError("Promise resolution failed");
			}
		);

		for (;;) {
			if (signal?.aborted) {
				state.abandoned = true;
				if (state.result) {
					disposeResult(state.result);
				}
				throw new TimeoutError("Task was abandoned after its deadline");
			}
			this.drainJobs();
			await yieldToHost();

			const result = state.result;
			if (result) {
				if (result.error) {
					throw this.toScriptError(result.error);
				}
				return result.value;
			}
			if (state.failure !== undefined) {
				throw state.failure;
			}
			if (this.runtime.hasPendingJob()) {
				continue;
			}
			if (this.hostOperations > 0) {
				await this.waitForHostActivity(signal);
				continue;
			}
			throw new RuntimeScriptError("Promise resolution is still pending but the event loop has already resolved");
		}
	}

	/**
	 * Run every queued engine job
	 */
	drainJobs(): void {
		const result = this.runtime.executePendingJobs();
		if (result.error) {
			throw this.toScriptError(result.error);
		}
	}

	/**
	 * Track a host-side operation whose settlement feeds the engine.
	 * Pending settles wait on these instead of treating the engine as idle.
	 */
	trackHostOperation(operation: Promise<void>): void {
		this.hostOperations++;
		const done = () => {
			this.hostOperations--;
			const waiters = this.hostActivityWaiters;
			this.hostActivityWaiters = [];
			for (const wake of waiters) {
				wake();
			}
		};
		operation.then(done, (error: unknown) => {
			this.logger.error("[ExecutionCoordinator] Host operation failed:", error);
			done();
		});
	}

	/**
	 * Borrow the export namespace of an evaluated module
	 */
	getNamespace(moduleId: number): QuickJSHandle | undefined {
		return this.namespaces.get(moduleId);
	}

	/**
	 * Convert a thrown engine value into a host error. Takes ownership of `handle`.
	 */
	toScriptError(handle: QuickJSHandle): RuntimeScriptError {
		try {
			return new RuntimeScriptError(this.bridge.describeError(handle));
		} finally {
			handle.dispose();
		}
	}

	dispose(): void {
		for (const namespace of this.namespaces.values()) {
			if (namespace.alive) {
				namespace.dispose();
			}
		}
		this.namespaces.clear();
		this.runtime.removeInterruptHandler();
	}

	private async evaluateModule(module: Module, signal: AbortSignal): Promise<LoadedModule> {
		const specifier = this.loader.resolve(module.filename, ROOT_REFERRER);
		const code = this.transpiler(specifier, module.contents);

		this.loader.register(specifier.href, code);
		await this.loader.prepare(specifier, code, signal);

		const engineSource = this.loader.getEngineSource(specifier.href) ?? code;
		const result = this.vm.evalCode(engineSource, specifier.href, { type: "module" });
		if (result.error) {
			throw this.toScriptError(result.error);
		}

		let namespace: QuickJSHandle;
		try {
			namespace = this.bridge.isPromiseLike(result.value)
				? await this.settle(result.value, signal)
				: result.value.dup();
		} finally {
			result.value.dispose();
		}
		this.drainJobs();

		const id = this.nextModuleId++;
		this.namespaces.set(id, namespace);
		this.logger.debug(`[ExecutionCoordinator] Evaluated module ${id}: ${specifier.href}`);

		return { module, id, specifier: specifier.href };
	}

	private invoke(moduleId: number | null, fn: QuickJSHandle, args: FunctionArguments): QuickJSHandle {
		const namespace = moduleId === null ? undefined : this.namespaces.get(moduleId);
		const argHandles: QuickJSHandle[] = [];
		try {
			for (const arg of args) {
				argHandles.push(this.bridge.encode(arg));
			}
			const result = this.vm.callFunction(fn, namespace ?? this.vm.undefined, ...argHandles);
			if (result.error) {
				throw this.toScriptError(result.error);
			}
			return result.value;
		} finally {
			for (const handle of argHandles) {
				handle.dispose();
			}
		}
	}

	private async settleAndDecode(value: QuickJSHandle, signal: AbortSignal): Promise<unknown> {
		if (!this.bridge.isPromiseLike(value)) {
			this.drainJobs();
			return this.bridge.decode(value);
		}
		const settled = await this.settle(value, signal);
		try {
			return this.bridge.decode(settled);
		} finally {
			settled.dispose();
		}
	}

	/**
	 * Resolves when a tracked host operation finishes, or when `signal` aborts
	 */
	private waitForHostActivity(signal?: AbortSignal): Promise<void> {
		return new Promise((resolve) => {
			if (signal?.aborted) {
				resolve();
				return;
			}
			signal?.addEventListener("abort", () => resolve(), { once: true });
			this.hostActivityWaiters.push(resolve);
		});
	}
}

function disposeResult(result: { error?: QuickJSHandle; value?: QuickJSHandle }): void {
	if (result.error) {
		result.error.dispose();
	} else if (result.value?.alive) {
		result.value.dispose();
	}
}

function yieldToHost(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}
