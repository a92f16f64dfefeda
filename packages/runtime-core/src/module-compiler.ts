import { transform } from "sucrase";
import { ModuleLoadError } from "./errors";
import type { ModuleType } from "./module-cache";
import type { Transpiler } from "./types";

/**
 * Source flavour, derived from the specifier's path
 */
export type ModuleLoaderType = "js" | "ts" | "json";

interface CompiledModuleCacheEntry {
	source: string;
	code: string;
}

/**
 * Strips TypeScript syntax from module sources, keeping ES module syntax intact.
 * Uses Sucrase for fast compilation without type checking.
 */
export class ModuleCompiler {
	private cache: Map<string, CompiledModuleCacheEntry> = new Map();

	/**
	 * Compile a module source to JavaScript
	 * @param specifier - Resolved module specifier (used as cache key and to pick the loader)
	 * @param source - Module source code
	 * @returns Compiled JavaScript code, or the source unchanged for js and json
	 */
	compile(specifier: URL, source: string): string {
		const loader = getLoaderType(specifier);
		if (loader !== "ts") {
			return source;
		}

		const cached = this.cache.get(specifier.href);
		if (cached && cached.source === source) {
			return cached.code;
		}

		let code: string;
		try {
			code = transform(source, {
				filePath: specifier.pathname,
				transforms: ["typescript"],
				disableESTransforms: true,
				keepUnusedImports: true,
			}).code;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new ModuleLoadError(specifier.href, `Failed to transpile ${specifier.href}: ${message}`, {
				cause: error,
			});
		}

		this.cache.set(specifier.href, { source, code });
		return code;
	}

	/**
	 * Invalidate cache entry for a specific specifier
	 */
	invalidate(specifier: string): void {
		this.cache.delete(specifier);
	}

	/**
	 * Clear all cached compiled modules
	 */
	clear(): void {
		this.cache.clear();
	}
}

/**
 * Build a transpiler backed by a compiler instance
 */
export function createTranspiler(compiler: ModuleCompiler = new ModuleCompiler()): Transpiler {
	return (specifier, source) => compiler.compile(specifier, source);
}

/**
 * Get the loader type for a specifier
 */
export function getLoaderType(specifier: URL): ModuleLoaderType {
	const lowerPath = specifier.pathname.toLowerCase();
	if (lowerPath.endsWith(".json")) {
		return "json";
	}
	if ((lowerPath.endsWith(".ts") || lowerPath.endsWith(".mts")) && !lowerPath.endsWith(".d.ts")) {
		return "ts";
	}
	return "js";
}

export function getModuleType(specifier: URL): ModuleType {
	return getLoaderType(specifier) === "json" ? "json" : "javascript";
}

/**
 * Wrap JSON text as an ES module with a default export
 */
export function wrapJsonModule(code: string): string {
	return `export default ${code.trim()};\n`;
}
