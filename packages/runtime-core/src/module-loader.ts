import { ImportType, initSync as initLexer, parse as lexModule, type ImportSpecifier } from "es-module-lexer";
import { ModuleLoadError, PermissionError, ResolutionError, isModuleRuntimeError } from "./errors";
import { getModuleType, wrapJsonModule } from "./module-compiler";
import { cloneModuleSource, type ModuleCacheProvider, type ModuleSource } from "./module-cache";
import { ROOT_REFERRER, resolveImport } from "./specifier";
import type { ImportPermissions, Logger, ModuleFetcher, ResolutionKind, Transpiler } from "./types";

export const EXTENSION_SCHEME = "ext:";

/**
 * Module exporting the function every rewritten dynamic import calls
 */
export const DYNAMIC_IMPORT_MODULE = `${EXTENSION_SCHEME}modhost/import.js`;
const DYNAMIC_IMPORT_BINDING = "__modhostImport";

/**
 * Options for creating a module loader
 */
export interface ModuleLoaderOptions {
	cache: ModuleCacheProvider;
	transpiler: Transpiler;
	logger: Logger;
	permissions?: ImportPermissions;
	fetchers?: readonly ModuleFetcher[];
	/** Base directory for plain paths loaded from the root */
	cwd?: string;
}

/**
 * Import specifiers found in a module's source
 */
export interface ModuleImports {
	static: string[];
	dynamic: string[];
}

/**
 * Resolves import specifiers under the import permission policy, fetches and caches
 * module sources, and prepares module graphs for the engine.
 *
 * Resolution rules:
 * - Modules requested by the host (referrer ".") are added to the whitelist
 * - Static imports from whitelisted modules join the whitelist (same top-level graph)
 * - http(s) imports require the remoteImports capability
 * - file imports require the fsImports capability or a whitelisted specifier
 * - ext: imports are always allowed
 */
export class ModuleLoader {
	private cache: ModuleCacheProvider;
	private transpiler: Transpiler;
	private logger: Logger;
	private permissions: Required<ImportPermissions>;
	private fetchers: Map<string, ModuleFetcher> = new Map();
	private cwd?: string;
	private whitelist: Set<string> = new Set();
	private prepared: Map<string, ModuleSource> = new Map();
	private moduleLoaders: Map<string, Promise<ModuleSource>> = new Map();

	constructor(options: ModuleLoaderOptions) {
		this.cache = options.cache;
		this.transpiler = options.transpiler;
		this.logger = options.logger;
		this.cwd = options.cwd;
		this.permissions = {
			remoteImports: options.permissions?.remoteImports ?? false,
			fsImports: options.permissions?.fsImports ?? false,
		};
		for (const fetcher of options.fetchers ?? []) {
			for (const scheme of fetcher.schemes) {
				this.fetchers.set(scheme, fetcher);
			}
		}
	}

	/**
	 * Resolve a specifier to a canonical URL, enforcing the import permission policy
	 * @throws ResolutionError for malformed specifiers or unrecognized schemes
	 * @throws PermissionError when the policy denies the import
	 */
	resolve(specifier: string, referrer: string, kind: ResolutionKind = "static"): URL {
		const url = resolveImport(specifier, referrer, this.cwd);
		if (referrer === ROOT_REFERRER) {
			this.whitelist.add(url.href);
		} else if (kind === "static" && this.whitelist.has(referrer)) {
			this.whitelist.add(url.href);
		}

		switch (url.protocol) {
			case "http:":
			case "https:":
				if (!this.permissions.remoteImports) {
					throw new PermissionError(url.href, `web imports are not allowed here: ${specifier}`);
				}
				break;
			case "file:":
				if (!this.permissions.fsImports && !this.whitelist.has(url.href)) {
					throw new PermissionError(url.href, `requested module is not loaded: ${specifier}`);
				}
				break;
			case EXTENSION_SCHEME:
				break;
			default:
				throw new ResolutionError(url.href, `unrecognized schema for module import: ${specifier}`);
		}

		return url;
	}

	/**
	 * Check whether a specifier was reached from the top-level module graph
	 */
	isWhitelisted(specifier: string): boolean {
		return this.whitelist.has(specifier);
	}

	/**
	 * Fetch a module source, consulting the cache first.
	 * Concurrent loads of the same specifier share one fetch.
	 */
	async load(specifier: URL, signal?: AbortSignal): Promise<ModuleSource> {
		const existing = this.moduleLoaders.get(specifier.href);
		if (existing) {
			return existing;
		}

		const loader = this.loadExternal(specifier, signal);
		this.moduleLoaders.set(specifier.href, loader);
		try {
			return await loader;
		} finally {
			this.moduleLoaders.delete(specifier.href);
		}
	}

	/**
	 * Register a module whose source the host supplied directly
	 */
	register(specifier: string, code: string): void {
		this.prepared.set(specifier, { moduleType: "javascript", code, specifier });
	}

	/**
	 * Register an ext: module provided by an extension
	 */
	registerExtensionModule(extensionName: string, file: string, code: string): string {
		const specifier = `${EXTENSION_SCHEME}${extensionName}/${file}`;
		this.register(specifier, code);
		return specifier;
	}

	/**
	 * Resolve, fetch and cache everything a module statically imports, recursively.
	 * Dynamic imports are prepared when they run, through prepareImport.
	 */
	async prepare(referrer: URL, code: string, signal?: AbortSignal): Promise<void> {
		for (const specifier of extractImports(code).static) {
			const resolved = this.resolve(specifier, referrer.href, "static");
			await this.prepareModule(resolved, signal);
		}
	}

	/**
	 * Resolve a dynamic import and prepare its graph so the engine can link it
	 * @returns The canonical URL the engine should import
	 * @throws ResolutionError when the referrer is the host root
	 */
	async prepareImport(specifier: string, referrer: string, signal?: AbortSignal): Promise<string> {
		if (referrer === ROOT_REFERRER) {
			throw new ResolutionError(specifier, `Dynamic import of ${specifier} needs a module referrer`);
		}
		const resolved = this.resolve(specifier, referrer, "dynamic");
		await this.prepareModule(resolved, signal);
		this.logger.debug(`[ModuleLoader] Prepared dynamic import '${specifier}' from ${referrer}`);
		return resolved.href;
	}

	/**
	 * Source text the engine should compile for a specifier, if it was prepared.
	 * Dynamic imports in script modules are routed through DYNAMIC_IMPORT_MODULE.
	 */
	getEngineSource(specifier: string): string | undefined {
		const source = this.prepared.get(specifier);
		if (!source) {
			return undefined;
		}
		if (source.moduleType === "json") {
			return wrapJsonModule(source.code);
		}
		return specifier.startsWith(EXTENSION_SCHEME) ? source.code : rewriteDynamicImports(source.code, specifier);
	}

	isPrepared(specifier: string): boolean {
		return this.prepared.has(specifier);
	}

	private async prepareModule(specifier: URL, signal?: AbortSignal): Promise<void> {
		if (this.prepared.has(specifier.href)) {
			return;
		}
		const source = await this.load(specifier, signal);
		if (this.prepared.has(specifier.href)) {
			return;
		}
		this.prepared.set(specifier.href, source);
		if (source.moduleType === "javascript") {
			await this.prepare(specifier, source.code, signal);
		}
	}

	private async loadExternal(specifier: URL, signal?: AbortSignal): Promise<ModuleSource> {
		const cached = await this.cache.get(specifier.href);
		if (cached) {
			this.logger.debug(`[ModuleLoader] Cache hit: ${specifier.href}`);
			return cached;
		}

		const fetcher = this.getFetcher(specifier);
		let raw: string;
		try {
			raw = await fetcher.fetch(specifier, signal);
		} catch (error) {
			if (isModuleRuntimeError(error)) {
				throw error;
			}
			const message = error instanceof Error ? error.message : String(error);
			throw new ModuleLoadError(specifier.href, `Failed to fetch ${specifier.href}: ${message}`, { cause: error });
		}

		const moduleType = getModuleType(specifier);
		const code = moduleType === "json" ? raw : this.transpiler(specifier, raw);
		const source: ModuleSource = { moduleType, code, specifier: specifier.href };

		const clone = this.cache.cloneSource?.(specifier.href, source) ?? cloneModuleSource(specifier.href, source);
		await this.cache.set(specifier.href, clone);
		this.logger.debug(`[ModuleLoader] Loaded: ${specifier.href}`);

		return source;
	}

	private getFetcher(specifier: URL): ModuleFetcher {
		const scheme = specifier.protocol;
		const remote = scheme === "http:" || scheme === "https:";
		const fetcher = this.fetchers.get(scheme);
		if (!fetcher || (remote && !this.permissions.remoteImports)) {
			throw new ModuleLoadError(
				specifier.href,
				`${scheme.slice(0, -1)} imports are not allowed here: ${specifier.href}`
			);
		}
		return fetcher;
	}
}

let lexerReady = false;

/**
 * Lex a module's import statements. Source the lexer rejects yields no imports;
 * the engine reports the syntax error when it compiles the module.
 */
function lexImports(code: string): readonly ImportSpecifier[] {
	if (!lexerReady) {
		initLexer();
		lexerReady = true;
	}
	try {
		const [imports] = lexModule(code);
		return imports;
	} catch {
		return [];
	}
}

/**
 * Extract import specifiers from ES module source.
 * Text inside strings, template literals, regular expressions and comments is never
 * mistaken for an import; dynamic imports are listed only when their argument is a
 * string literal.
 */
export function extractImports(code: string): ModuleImports {
	const imports: ModuleImports = { static: [], dynamic: [] };
	for (const entry of lexImports(code)) {
		const list =
			entry.t === ImportType.Static ? imports.static : entry.t === ImportType.Dynamic ? imports.dynamic : undefined;
		if (list && entry.n !== undefined && !list.includes(entry.n)) {
			list.push(entry.n);
		}
	}
	return imports;
}

/**
 * Replace every `import(expr)` with a call that prepares the target on the host first.
 * Line breaks are kept so error locations still point at the original lines.
 */
export function rewriteDynamicImports(code: string, referrer: string): string {
	const dynamicImports = lexImports(code)
		.filter((entry) => entry.t === ImportType.Dynamic)
		.sort((a, b) => b.ss - a.ss);
	if (dynamicImports.length === 0) {
		return code;
	}

	let rewritten = code;
	for (const entry of dynamicImports) {
		const replaced = rewritten.slice(entry.ss, entry.s);
		const lineBreaks = replaced.replace(/[^\n]/g, "");
		rewritten =
			rewritten.slice(0, entry.ss) +
			`${DYNAMIC_IMPORT_BINDING}(${JSON.stringify(referrer)}, ${lineBreaks}` +
			rewritten.slice(entry.s);
	}
	return `import { dynamicImport as ${DYNAMIC_IMPORT_BINDING} } from "${DYNAMIC_IMPORT_MODULE}"; ${rewritten}`;
}
