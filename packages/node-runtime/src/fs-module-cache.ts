import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import {
	CacheError,
	MemoryModuleCache,
	cloneModuleSource,
	getModuleType,
	type ModuleCacheProvider,
	type ModuleSource,
} from "@modhost/runtime-core";

const entryMetadataSchema = z.object({
	specifier: z.string(),
	cacheMetadata: z.record(z.string(), z.string()).optional(),
});

type EntryMetadata = z.infer<typeof entryMetadataSchema>;

/** Suffix of the file recording which specifier an entry belongs to */
const METADATA_SUFFIX = "#meta";

/**
 * Write-through module cache persisted under a root directory.
 *
 * Each specifier's code is stored verbatim at `<root>/<scheme>/<host>/<path>#`, next to
 * a `#meta` file naming the specifier it came from. `#` never appears unescaped in a
 * URL path, so it marks what a path segment could otherwise collide with: entry files
 * (kept apart from directories of the same name), ports, queries and fragments.
 * Reads and writes of the same specifier are serialised; a missing file, or one that
 * records a different specifier, is a miss.
 */
export class FsModuleCache implements ModuleCacheProvider {
	private memory = new MemoryModuleCache();
	private queues: Map<string, Promise<unknown>> = new Map();

	constructor(readonly root: string) {}

	async set(specifier: string, source: ModuleSource): Promise<void> {
		const stored = cloneModuleSource(specifier, source);
		const metadata: EntryMetadata = {
			specifier,
			...(stored.cacheMetadata ? { cacheMetadata: { ...stored.cacheMetadata } } : {}),
		};
		await this.enqueue(specifier, async () => {
			const path = this.pathFor(specifier);
			try {
				await mkdir(dirname(path), { recursive: true });
				await writeFile(path, stored.code, "utf8");
				await writeFile(path + METADATA_SUFFIX, JSON.stringify(metadata), "utf8");
			} catch (error) {
				throw this.cacheError(specifier, "write", error);
			}
			await this.memory.set(specifier, stored);
		});
	}

	async get(specifier: string): Promise<ModuleSource | undefined> {
		return this.enqueue(specifier, async () => {
			const cached = await this.memory.get(specifier);
			if (cached) {
				return cached;
			}

			const path = this.pathFor(specifier);
			const metadataText = await this.readEntryFile(specifier, path + METADATA_SUFFIX);
			if (metadataText === undefined) {
				return undefined;
			}
			const metadata = this.parseMetadata(specifier, metadataText);
			if (metadata.specifier !== specifier) {
				return undefined;
			}
			const code = await this.readEntryFile(specifier, path);
			if (code === undefined) {
				return undefined;
			}

			const source: ModuleSource = {
				moduleType: getModuleType(new URL(specifier)),
				code,
				specifier,
				...(metadata.cacheMetadata ? { cacheMetadata: metadata.cacheMetadata } : {}),
			};
			await this.memory.set(specifier, source);
			return cloneModuleSource(specifier, source);
		});
	}

	/**
	 * Remove a specifier from memory and disk
	 */
	async invalidate(specifier: string): Promise<void> {
		await this.enqueue(specifier, async () => {
			this.memory.invalidate(specifier);
			const path = this.pathFor(specifier);
			try {
				await rm(path + METADATA_SUFFIX, { force: true });
				await rm(path, { force: true });
			} catch (error) {
				throw this.cacheError(specifier, "remove", error);
			}
		});
	}

	/**
	 * File that holds a specifier's cached code. Distinct specifiers map to distinct files.
	 */
	pathFor(specifier: string): string {
		let url: URL;
		try {
			url = new URL(specifier);
		} catch (error) {
			throw new CacheError(specifier, `Cannot cache non-URL specifier: ${specifier}`, { cause: error });
		}

		const scheme = url.protocol.slice(0, -1);
		const host = url.host ? url.host.replaceAll(":", "#") : "#";
		const opaque = !url.pathname.startsWith("/");
		const segments = (opaque ? url.pathname : url.pathname.slice(1)).split("/");
		const file = segments.pop() ?? "";

		let name = `${file}#`;
		if (url.search) {
			name += `q=${encodeURIComponent(url.search.slice(1))}`;
		}
		if (url.hash) {
			name += `#f=${encodeURIComponent(url.hash.slice(1))}`;
		}

		const directories = segments.map(directoryName);
		if (opaque) {
			directories.unshift("#opaque");
		}
		return join(this.root, scheme, host, ...directories, name);
	}

	private async readEntryFile(specifier: string, path: string): Promise<string | undefined> {
		try {
			return await readFile(path, "utf8");
		} catch (error) {
			if (isNotFound(error)) {
				return undefined;
			}
			throw this.cacheError(specifier, "read", error);
		}
	}

	private parseMetadata(specifier: string, text: string): EntryMetadata {
		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (error) {
			throw new CacheError(specifier, `Corrupt cache entry for ${specifier}: invalid JSON`, { cause: error });
		}
		const parsed = entryMetadataSchema.safeParse(json);
		if (!parsed.success) {
			throw new CacheError(specifier, `Corrupt cache entry for ${specifier}: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
				cause: parsed.error,
			});
		}
		return parsed.data;
	}

	private enqueue<T>(specifier: string, operation: () => Promise<T>): Promise<T> {
		const previous = this.queues.get(specifier) ?? Promise.resolve();
		const next = previous.then(operation, operation);
		const tail = next.then(
			() => undefined,
			() => undefined
		);
		this.queues.set(specifier, tail);
		void tail.then(() => {
			if (this.queues.get(specifier) === tail) {
				this.queues.delete(specifier);
			}
		});
		return next;
	}

	private cacheError(specifier: string, action: string, error: unknown): CacheError {
		const message = error instanceof Error ? error.message : String(error);
		return new CacheError(specifier, `Failed to ${action} cache entry for ${specifier}: ${message}`, { cause: error });
	}
}

function directoryName(segment: string): string {
	if (segment === "") {
		return "#empty";
	}
	return segment === "." || segment === ".." ? `#${segment}` : segment;
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
