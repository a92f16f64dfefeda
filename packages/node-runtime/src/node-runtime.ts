import { resolve } from "node:path";
import {
	ModuleRuntime,
	ModuleWrapper,
	type RuntimeOptions,
} from "@modhost/runtime-core";
import { ConsoleLogger } from "./console-logger";
import { loadModuleFile } from "./module-files";
import { createDefaultFetchers } from "./module-fetchers";

/**
 * Fill in Node defaults: file and web fetchers and a console logger
 */
export function withNodeDefaults(options: RuntimeOptions = {}): RuntimeOptions {
	return {
		...options,
		fetchers: options.fetchers ?? createDefaultFetchers(),
		logger: options.logger ?? new ConsoleLogger(),
	};
}

/**
 * Create a runtime that can import modules from disk and, when allowed, the web
 */
export function createNodeRuntime(options?: RuntimeOptions): Promise<ModuleRuntime> {
	return ModuleRuntime.create(withNodeDefaults(options));
}

/**
 * Read a module file and load it into its own runtime
 *
 * @example
 * ```ts
 * const tool = await importModule("./tools/greet.ts", { timeoutMs: 1000 });
 * await tool.call("greet", ["ada"]);
 * tool.dispose();
 * ```
 */
export async function importModule(path: string, options: RuntimeOptions = {}): Promise<ModuleWrapper> {
	const absolutePath = resolve(options.cwd ?? process.cwd(), path);
	const module = await loadModuleFile(absolutePath);
	return ModuleWrapper.fromModule(module, withNodeDefaults(options));
}
