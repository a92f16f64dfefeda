import { ConfigurationError, type RuntimeOptions } from "@modhost/runtime-core";
import { FsModuleCache } from "./fs-module-cache";

type Environment = Record<string, string | undefined>;

/**
 * Runtime options loaded from environment variables
 *
 * - MODHOST_TIMEOUT_MS: deadline for loads and calls
 * - MODHOST_DEFAULT_ENTRYPOINT: export used when no entrypoint is registered
 * - MODHOST_CACHE_DIR: directory for the persistent module cache
 * - MODHOST_ALLOW_REMOTE_IMPORTS, MODHOST_ALLOW_FS_IMPORTS: import capabilities
 */
export function loadRuntimeOptionsFromEnv(environment: Environment = process.env): RuntimeOptions {
	const options: RuntimeOptions = {
		permissions: {
			remoteImports: boolEnv(environment, "MODHOST_ALLOW_REMOTE_IMPORTS", false),
			fsImports: boolEnv(environment, "MODHOST_ALLOW_FS_IMPORTS", false),
		},
	};

	const timeoutMs = intEnv(environment, "MODHOST_TIMEOUT_MS");
	if (timeoutMs !== undefined) {
		options.timeoutMs = timeoutMs;
	}

	const defaultEntrypoint = env(environment, "MODHOST_DEFAULT_ENTRYPOINT");
	if (defaultEntrypoint) {
		options.defaultEntrypoint = defaultEntrypoint;
	}

	const cacheDir = env(environment, "MODHOST_CACHE_DIR");
	if (cacheDir) {
		options.moduleCache = new FsModuleCache(cacheDir);
	}

	return options;
}

function env(environment: Environment, key: string): string | undefined {
	const value = environment[key]?.trim();
	return value ? value : undefined;
}

function intEnv(environment: Environment, key: string): number | undefined {
	const value = env(environment, key);
	if (value === undefined) return undefined;
	const parsed = parseInt(value, 10);
	if (isNaN(parsed) || String(parsed) !== value) {
		throw new ConfigurationError(`Environment variable ${key} must be a number`);
	}
	return parsed;
}

function boolEnv(environment: Environment, key: string, defaultValue: boolean): boolean {
	const value = env(environment, key)?.toLowerCase();
	if (value === undefined) return defaultValue;
	if (value === "1" || value === "true" || value === "yes") return true;
	if (value === "0" || value === "false" || value === "no") return false;
	throw new ConfigurationError(`Environment variable ${key} must be true or false`);
}
