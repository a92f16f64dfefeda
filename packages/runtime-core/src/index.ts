// ============================================================================
// Core Classes
// ============================================================================

/**
 * Script engine instance: loads modules, calls functions, reads values
 */
export { ModuleRuntime } from "./runtime";

/**
 * Runtime dedicated to a single module
 */
export { ModuleWrapper } from "./module-wrapper";

/**
 * Named unit of module source
 */
export { Module } from "./module";

/**
 * Import resolution, permission policy and module fetching
 */
export { ModuleLoader, EXTENSION_SCHEME, DYNAMIC_IMPORT_MODULE, extractImports, rewriteDynamicImports } from "./module-loader";

/**
 * TypeScript stripping with caching
 */
export { ModuleCompiler, createTranspiler, getLoaderType, getModuleType, wrapJsonModule } from "./module-compiler";

/**
 * Module source caches
 */
export { NullModuleCache, MemoryModuleCache, cloneModuleSource } from "./module-cache";

/**
 * Deadline enforcement and engine job draining
 */
export { ExecutionCoordinator } from "./execution-coordinator";

/**
 * Entrypoint selection after a load
 */
export { EntrypointResolver } from "./entrypoint";

/**
 * Host/engine value conversion
 */
export { ValueBridge, parseStackLocation } from "./value-bridge";

/**
 * Callable values held across calls
 */
export { StoredFunction, FunctionTable } from "./stored-function";

export { RuntimeState } from "./runtime-state";
export { createModuleHandle } from "./module-handle";
export { BUILTIN_EXTENSION_NAME } from "./extensions";
export { getEngineModule } from "./engine";

// ============================================================================
// Configuration
// ============================================================================

export {
	resolveRuntimeOptions,
	DEFAULT_MEMORY_LIMIT_BYTES,
	DEFAULT_MAX_STACK_BYTES,
} from "./runtime-options";
export type { RuntimeOptions, ResolvedRuntimeOptions } from "./runtime-options";

// ============================================================================
// Utilities
// ============================================================================

export { evaluate, validate, resolvePath } from "./utilities";
export { toModuleSpecifier, resolveImport, ROOT_REFERRER } from "./specifier";
export { parseValue } from "./value-schema";

// ============================================================================
// Errors
// ============================================================================

export {
	ModuleRuntimeError,
	ValueNotFoundError,
	ValueNotCallableError,
	MissingEntrypointError,
	TimeoutError,
	RuntimeScriptError,
	PermissionError,
	ResolutionError,
	ModuleLoadError,
	CacheError,
	SerializationError,
	DeserializationError,
	InvalidFunctionError,
	DisposedError,
	ConfigurationError,
	isModuleRuntimeError,
} from "./errors";
export type { ModuleRuntimeErrorKind } from "./errors";

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Abstract interfaces for platform adaptation
 */
export { NOOP_LOGGER } from "./types";
export type {
	Logger,
	ModuleFetcher,
	Transpiler,
	ImportPermissions,
	ResolutionKind,
	Extension,
	ExtensionCallContext,
	HostFunction,
	FunctionArguments,
} from "./types";

export type { ModuleHandle } from "./module-handle";
export type { ModuleSource, ModuleType, ModuleCacheProvider } from "./module-cache";
export type { ModuleLoaderOptions, ModuleImports } from "./module-loader";
export type { ModuleLoaderType } from "./module-compiler";
export type { AsyncTask, LoadedModule, ExecutionCoordinatorOptions } from "./execution-coordinator";
export type { ErrorLocation } from "./value-bridge";
export type { ValueSchema } from "./value-schema";
