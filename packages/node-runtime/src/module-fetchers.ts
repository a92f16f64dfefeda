import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ModuleLoadError, type ModuleFetcher } from "@modhost/runtime-core";

/**
 * Reads file: modules from the local filesystem
 */
export class FileModuleFetcher implements ModuleFetcher {
	readonly schemes = ["file:"] as const;

	async fetch(specifier: URL, signal?: AbortSignal): Promise<string> {
		return readFile(fileURLToPath(specifier), { encoding: "utf8", signal });
	}
}

/**
 * Downloads http: and https: modules with the global fetch
 */
export class HttpModuleFetcher implements ModuleFetcher {
	readonly schemes = ["http:", "https:"] as const;

	constructor(private headers: Record<string, string> = {}) {}

	async fetch(specifier: URL, signal?: AbortSignal): Promise<string> {
		const response = await fetch(specifier, { headers: this.headers, signal, redirect: "follow" });
		if (!response.ok) {
			throw new ModuleLoadError(
				specifier.href,
				`Failed to fetch ${specifier.href}: ${response.status} ${response.statusText}`.trimEnd()
			);
		}
		return response.text();
	}
}

/**
 * File and web fetchers. Web imports still need the remoteImports permission.
 */
export function createDefaultFetchers(): ModuleFetcher[] {
	return [new FileModuleFetcher(), new HttpModuleFetcher()];
}
