export type ModuleType = "javascript" | "json";

/**
 * Fetched and transpiled payload associated with a resolved specifier
 */
export interface ModuleSource {
	readonly moduleType: ModuleType;
	/** Transpiled source text (raw JSON text for json modules) */
	readonly code: string;
	/** Canonical specifier the source was fetched from */
	readonly specifier: string;
	readonly cacheMetadata?: Readonly<Record<string, string>>;
}

/**
 * Cache of module sources keyed by resolved specifier.
 * Implement this to provide a custom cache; the default never stores anything.
 */
export interface ModuleCacheProvider {
	set(specifier: string, source: ModuleSource): Promise<void>;
	get(specifier: string): Promise<ModuleSource | undefined>;
	/**
	 * Produce an independent copy of a source. Defaults to cloneModuleSource.
	 */
	cloneSource?(specifier: string, source: ModuleSource): ModuleSource;
}

/**
 * Copy a source so that the copy shares no mutable state with the original
 */
export function cloneModuleSource(specifier: string, source: ModuleSource): ModuleSource {
	const clone: ModuleSource = {
		moduleType: source.moduleType,
		code: source.code,
		specifier,
		...(source.cacheMetadata ? { cacheMetadata: Object.freeze({ ...source.cacheMetadata }) } : {}),
	};
	return Object.freeze(clone);
}

/**
 * Cache that never stores. Every read is a miss.
 */
export class NullModuleCache implements ModuleCacheProvider {
	async set(_specifier: string, _source: ModuleSource): Promise<void> {
		// Nothing is stored
	}

	async get(_specifier: string): Promise<ModuleSource | undefined> {
		return undefined;
	}
}

/**
 * In-memory cache. Entries are replaced wholesale and reads return copies.
 */
export class MemoryModuleCache implements ModuleCacheProvider {
	private entries: Map<string, ModuleSource> = new Map();

	async set(specifier: string, source: ModuleSource): Promise<void> {
		this.entries.set(specifier, cloneModuleSource(specifier, source));
	}

	async get(specifier: string): Promise<ModuleSource | undefined> {
		const source = this.entries.get(specifier);
		if (!source) {
			return undefined;
		}
		return cloneModuleSource(specifier, source);
	}

	has(specifier: string): boolean {
		return this.entries.has(specifier);
	}

	/**
	 * Remove a single entry
	 */
	invalidate(specifier: string): void {
		this.entries.delete(specifier);
	}

	clear(): void {
		this.entries.clear();
	}

	get size(): number {
		return this.entries.size;
	}
}
