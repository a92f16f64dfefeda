import type { z } from "zod";
import { DeserializationError } from "./errors";

/**
 * Schema that validates a decoded script value into T
 */
export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Validate a decoded value against a schema
 * @throws DeserializationError when the value does not match
 */
export function parseValue<T>(schema: ValueSchema<T>, value: unknown, label: string): T {
	const result = schema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
			.join("; ");
		throw new DeserializationError(`${label} does not match the expected type: ${issues}`, {
			cause: result.error,
		});
	}
	return result.data;
}
