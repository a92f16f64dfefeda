// ============================================================================
// Node adapters
// ============================================================================

/**
 * Runtime creation with Node fetchers and logging
 */
export { createNodeRuntime, importModule, withNodeDefaults } from "./node-runtime";

/**
 * Fetch strategies for file: and http(s): modules
 */
export { FileModuleFetcher, HttpModuleFetcher, createDefaultFetchers } from "./module-fetchers";

/**
 * Persistent module cache
 */
export { FsModuleCache } from "./fs-module-cache";

export { ConsoleLogger } from "./console-logger";
export { loadModuleFile, loadModuleDir } from "./module-files";

// ============================================================================
// Configuration
// ============================================================================

export { loadRuntimeOptionsFromEnv } from "./config";
