import { z } from "zod";
import { ConfigurationError } from "./errors";
import { NullModuleCache, type ModuleCacheProvider } from "./module-cache";
import { createTranspiler } from "./module-compiler";
import { NOOP_LOGGER, type Extension, type ImportPermissions, type Logger, type ModuleFetcher, type Transpiler } from "./types";

/** 64 MB */
export const DEFAULT_MEMORY_LIMIT_BYTES = 64 * 1024 * 1024;
/** 512 KB */
export const DEFAULT_MAX_STACK_BYTES = 512 * 1024;

/**
 * Options accepted when creating a runtime
 */
export interface RuntimeOptions {
	/** Host capability sets injected into the engine */
	extensions?: readonly Extension[];
	/** Export called when no entrypoint was registered by the script */
	defaultEntrypoint?: string;
	/** Deadline for every load and call, in milliseconds */
	timeoutMs?: number;
	moduleCache?: ModuleCacheProvider;
	permissions?: ImportPermissions;
	fetchers?: readonly ModuleFetcher[];
	transpiler?: Transpiler;
	logger?: Logger;
	/** Base directory for relative module filenames */
	cwd?: string;
	memoryLimitBytes?: number;
	maxStackBytes?: number;
}

/**
 * Runtime options with every default applied
 */
export interface ResolvedRuntimeOptions {
	extensions: readonly Extension[];
	defaultEntrypoint: string | undefined;
	timeoutMs: number;
	moduleCache: ModuleCacheProvider;
	permissions: Required<ImportPermissions>;
	fetchers: readonly ModuleFetcher[];
	transpiler: Transpiler;
	logger: Logger;
	cwd: string;
	memoryLimitBytes: number;
	maxStackBytes: number;
}

const EXTENSION_NAME = /^[A-Za-z_$][\w$]*$/;

const extensionSchema = z.object({
	name: z.string().regex(EXTENSION_NAME, "must be a valid identifier"),
	functions: z.record(z.string(), z.function()).optional(),
	modules: z.record(z.string(), z.string()).optional(),
});

const runtimeOptionsSchema = z.object({
	extensions: z.array(extensionSchema).optional(),
	defaultEntrypoint: z.string().min(1).optional(),
	timeoutMs: z.number().positive().optional(),
	permissions: z
		.object({
			remoteImports: z.boolean().optional(),
			fsImports: z.boolean().optional(),
		})
		.optional(),
	cwd: z.string().min(1).optional(),
	memoryLimitBytes: z.number().int().positive().optional(),
	maxStackBytes: z.number().int().positive().optional(),
});

/**
 * Validate runtime options and fill in defaults
 * @throws ConfigurationError when a value is out of range
 */
export function resolveRuntimeOptions(options: RuntimeOptions = {}): ResolvedRuntimeOptions {
	const parsed = runtimeOptionsSchema.safeParse({
		extensions: options.extensions?.map((extension) => ({
			name: extension.name,
			functions: extension.functions,
			modules: extension.modules,
		})),
		defaultEntrypoint: options.defaultEntrypoint,
		timeoutMs: options.timeoutMs,
		permissions: options.permissions,
		cwd: options.cwd,
		memoryLimitBytes: options.memoryLimitBytes,
		maxStackBytes: options.maxStackBytes,
	});
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid runtime options: ${formatIssues(parsed.error)}`);
	}

	const names = new Set<string>();
	for (const extension of options.extensions ?? []) {
		if (names.has(extension.name)) {
			throw new ConfigurationError(`Invalid runtime options: duplicate extension '${extension.name}'`);
		}
		names.add(extension.name);
	}

	return {
		extensions: options.extensions ?? [],
		defaultEntrypoint: options.defaultEntrypoint,
		timeoutMs: options.timeoutMs ?? Infinity,
		moduleCache: options.moduleCache ?? new NullModuleCache(),
		permissions: {
			remoteImports: options.permissions?.remoteImports ?? false,
			fsImports: options.permissions?.fsImports ?? false,
		},
		fetchers: options.fetchers ?? [],
		transpiler: options.transpiler ?? createTranspiler(),
		logger: options.logger ?? NOOP_LOGGER,
		cwd: options.cwd ?? process.cwd(),
		memoryLimitBytes: options.memoryLimitBytes ?? DEFAULT_MEMORY_LIMIT_BYTES,
		maxStackBytes: options.maxStackBytes ?? DEFAULT_MAX_STACK_BYTES,
	};
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}
