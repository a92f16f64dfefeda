import type { Module } from "./module";

export type ModuleRuntimeErrorKind =
	| "ValueNotFound"
	| "ValueNotCallable"
	| "MissingEntrypoint"
	| "Timeout"
	| "Runtime"
	| "Permission"
	| "Resolution"
	| "ModuleLoad"
	| "Cache"
	| "Serialization"
	| "Deserialization"
	| "InvalidFunction"
	| "Disposed"
	| "Configuration";

/**
 * Base class for every failure raised by the runtime.
 * `kind` discriminates the failure without instanceof checks.
 */
export class ModuleRuntimeError extends Error {
	constructor(
		public readonly kind: ModuleRuntimeErrorKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "ModuleRuntimeError";
	}
}

export class ValueNotFoundError extends ModuleRuntimeError {
	constructor(public readonly valueName: string) {
		super("ValueNotFound", `Value not found: ${valueName}`);
		this.name = "ValueNotFoundError";
	}
}

export class ValueNotCallableError extends ModuleRuntimeError {
	constructor(public readonly valueName: string) {
		super("ValueNotCallable", `Value is not callable: ${valueName}`);
		this.name = "ValueNotCallableError";
	}
}

export class MissingEntrypointError extends ModuleRuntimeError {
	constructor(public readonly module: Module) {
		super("MissingEntrypoint", `Module has no entrypoint: ${module.filename}`);
		this.name = "MissingEntrypointError";
	}
}

export class TimeoutError extends ModuleRuntimeError {
	constructor(message: string = "Task timed out") {
		super("Timeout", message);
		this.name = "TimeoutError";
	}
}

/**
 * Uncaught exception raised by script code
 */
export class RuntimeScriptError extends ModuleRuntimeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("Runtime", message, options);
		this.name = "RuntimeScriptError";
	}
}

export class PermissionError extends ModuleRuntimeError {
	constructor(public readonly specifier: string, message: string) {
		super("Permission", message);
		this.name = "PermissionError";
	}
}

export class ResolutionError extends ModuleRuntimeError {
	constructor(public readonly specifier: string, message: string) {
		super("Resolution", message);
		this.name = "ResolutionError";
	}
}

export class ModuleLoadError extends ModuleRuntimeError {
	constructor(public readonly specifier: string, message: string, options?: { cause?: unknown }) {
		super("ModuleLoad", message, options);
		this.name = "ModuleLoadError";
	}
}

export class CacheError extends ModuleRuntimeError {
	constructor(public readonly specifier: string, message: string, options?: { cause?: unknown }) {
		super("Cache", message, options);
		this.name = "CacheError";
	}
}

export class SerializationError extends ModuleRuntimeError {
	constructor(message: string) {
		super("Serialization", message);
		this.name = "SerializationError";
	}
}

export class DeserializationError extends ModuleRuntimeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("Deserialization", message, options);
		this.name = "DeserializationError";
	}
}

/**
 * A stored function was used against the wrong runtime, or after release
 */
export class InvalidFunctionError extends ModuleRuntimeError {
	constructor(message: string) {
		super("InvalidFunction", message);
		this.name = "InvalidFunctionError";
	}
}

export class DisposedError extends ModuleRuntimeError {
	constructor() {
		super("Disposed", "Runtime has been disposed");
		this.name = "DisposedError";
	}
}

export class ConfigurationError extends ModuleRuntimeError {
	constructor(message: string) {
		super("Configuration", message);
		this.name = "ConfigurationError";
	}
}

/**
 * Narrow an unknown error to a runtime error, optionally of one kind
 */
export function isModuleRuntimeError(
	error: unknown,
	kind?: ModuleRuntimeErrorKind
): error is ModuleRuntimeError {
	if (!(error instanceof ModuleRuntimeError)) {
		return false;
	}
	return kind === undefined || error.kind === kind;
}
