import type { RuntimeState } from "./runtime-state";

/**
 * Abstract interface for logging.
 * Platform-specific implementations handle log output.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that drops everything. Used when the host does not provide one.
 */
export const NOOP_LOGGER: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

/**
 * Capabilities controlling which imports the loader allows
 */
export interface ImportPermissions {
	/** Allow http: and https: imports */
	remoteImports?: boolean;
	/** Allow file: imports that were never reached from a top-level module */
	fsImports?: boolean;
}

/**
 * How a specifier is being resolved.
 * "static" imports extend the top-level module graph; "dynamic" ones never do.
 */
export type ResolutionKind = "static" | "dynamic";

/**
 * Fetch strategy for one or more URL schemes.
 * Platform-specific implementations read files or perform network requests.
 */
export interface ModuleFetcher {
	/** Schemes served by this fetcher, including the trailing colon ("file:") */
	readonly schemes: readonly string[];
	/**
	 * Fetch the raw source text of a module
	 */
	fetch(specifier: URL, signal?: AbortSignal): Promise<string>;
}

/**
 * Source-to-source transform applied to every fetched or host-provided module
 */
export type Transpiler = (specifier: URL, source: string) => string;

/**
 * Context handed to extension host functions
 */
export interface ExtensionCallContext {
	/** Host-side state shared with the runtime */
	state: RuntimeState;
	logger: Logger;
}

/**
 * Native function exposed to scripts.
 * Arguments arrive decoded; the return value (or resolved promise value) is encoded back.
 */
export type HostFunction = (context: ExtensionCallContext, ...args: unknown[]) => unknown;

/**
 * A set of host capabilities injected into the engine.
 */
export interface Extension {
	/** Global namespace the functions are installed under, and the ext: module prefix */
	name: string;
	/** Functions installed on a frozen globalThis[name] object */
	functions?: Record<string, HostFunction>;
	/** ES module sources importable as ext:<name>/<file> */
	modules?: Record<string, string>;
	/** Called once after installation, before any module loads */
	setup?(context: ExtensionCallContext): void;
}

/**
 * Arguments passed to script functions
 */
export type FunctionArguments = readonly unknown[];
