import { isModuleRuntimeError } from "./errors";
import { Module } from "./module";
import { ModuleRuntime } from "./runtime";
import type { RuntimeOptions } from "./runtime-options";
import type { ValueSchema } from "./value-schema";

export { resolvePath } from "./specifier";

/**
 * Evaluate a single expression in a throwaway runtime
 *
 * @example
 * ```ts
 * await evaluate("5 + 5"); // 10
 * ```
 */
export function evaluate(expression: string, options?: RuntimeOptions): Promise<unknown>;
export function evaluate<T>(expression: string, options: RuntimeOptions | undefined, schema: ValueSchema<T>): Promise<T>;
export async function evaluate<T>(
	expression: string,
	options: RuntimeOptions = {},
	schema?: ValueSchema<T>
): Promise<unknown> {
	const runtime = await ModuleRuntime.create(options);
	try {
		return schema ? await runtime.eval(expression, schema) : await runtime.eval(expression);
	} finally {
		runtime.dispose();
	}
}

/**
 * Check whether module source loads without error.
 * Syntax errors and exceptions thrown while evaluating give false; other failures reject.
 */
export async function validate(source: string, options: RuntimeOptions = {}): Promise<boolean> {
	const runtime = await ModuleRuntime.create(options);
	try {
		await runtime.loadModule(new Module("validate.js", source));
		return true;
	} catch (error) {
		if (isModuleRuntimeError(error, "Runtime")) {
			return false;
		}
		throw error;
	} finally {
		runtime.dispose();
	}
}
