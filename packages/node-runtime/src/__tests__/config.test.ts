import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@modhost/runtime-core";
import { loadRuntimeOptionsFromEnv } from "../config";
import { FsModuleCache } from "../fs-module-cache";

describe("loadRuntimeOptionsFromEnv - Desired Behavior", () => {
	it("should leave unset variables at their defaults", () => {
		expect(loadRuntimeOptionsFromEnv({})).toEqual({
			permissions: { remoteImports: false, fsImports: false },
		});
	});

	it("should read every variable", () => {
		const options = loadRuntimeOptionsFromEnv({
			MODHOST_TIMEOUT_MS: "1500",
			MODHOST_DEFAULT_ENTRYPOINT: "main",
			MODHOST_CACHE_DIR: "/tmp/modhost-cache",
			MODHOST_ALLOW_REMOTE_IMPORTS: "true",
			MODHOST_ALLOW_FS_IMPORTS: "1",
		});

		expect(options.timeoutMs).toBe(1500);
		expect(options.defaultEntrypoint).toBe("main");
		expect(options.permissions).toEqual({ remoteImports: true, fsImports: true });
		expect(options.moduleCache).toBeInstanceOf(FsModuleCache);
		expect(options.moduleCache instanceof FsModuleCache ? options.moduleCache.root : "").toBe("/tmp/modhost-cache");
	});

	it("should reject malformed numbers", () => {
		expect(() => loadRuntimeOptionsFromEnv({ MODHOST_TIMEOUT_MS: "soon" })).toThrow(
			new ConfigurationError("Environment variable MODHOST_TIMEOUT_MS must be a number")
		);
		expect(() => loadRuntimeOptionsFromEnv({ MODHOST_TIMEOUT_MS: "10ms" })).toThrow(ConfigurationError);
	});

	it("should reject malformed flags", () => {
		expect(() => loadRuntimeOptionsFromEnv({ MODHOST_ALLOW_FS_IMPORTS: "maybe" })).toThrow(
			"Environment variable MODHOST_ALLOW_FS_IMPORTS must be true or false"
		);
	});
});
