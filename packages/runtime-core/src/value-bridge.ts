import type { QuickJSContext, QuickJSHandle } from "quickjs-emscripten";
import { DeserializationError, SerializationError } from "./errors";
import { FunctionTable, StoredFunction } from "./stored-function";

const MAX_DEPTH = 64;

/**
 * Location of a script error, parsed from its stack
 */
export interface ErrorLocation {
	file: string;
	line: number;
}

/**
 * Converts between host values and engine values.
 *
 * Supported values: undefined, null, booleans, numbers, bigints, strings, arrays and
 * plain objects. Engine functions decode to StoredFunction references held in the
 * runtime's function table; encoding a StoredFunction hands the engine its function back.
 */
export class ValueBridge {
	private vm: QuickJSContext;
	private functions: FunctionTable;
	private kindOf: QuickJSHandle;
	private keysOf: QuickJSHandle;
	private freezeFn: QuickJSHandle;

	constructor(vm: QuickJSContext, functions: FunctionTable) {
		this.vm = vm;
		this.functions = functions;
		const helpers = this.evalHelpers();
		this.kindOf = vm.getProp(helpers, "kindOf");
		this.keysOf = vm.getProp(helpers, "keysOf");
		this.freezeFn = vm.getProp(helpers, "freeze");
		helpers.dispose();
	}

	/**
	 * Encode a host value as a new engine handle owned by the caller
	 */
	encode(value: unknown, depth: number = 0): QuickJSHandle {
		const vm = this.vm;
		if (depth > MAX_DEPTH) {
			throw new SerializationError(`Value is nested deeper than ${MAX_DEPTH} levels`);
		}

		switch (typeof value) {
			case "undefined":
				return vm.undefined;
			case "boolean":
				return value ? vm.true : vm.false;
			case "number":
				return vm.newNumber(value);
			case "bigint":
				return vm.newBigInt(value);
			case "string":
				return vm.newString(value);
			case "symbol":
				throw new SerializationError("Symbols cannot be passed to scripts");
			case "function":
				throw new SerializationError("Host functions cannot be passed to scripts; use an extension instead");
		}

		if (value === null) {
			return vm.null;
		}
		if (value instanceof StoredFunction) {
			return this.functions.get(value).dup();
		}
		if (value instanceof Date) {
			return vm.newString(value.toISOString());
		}
		if (typeof value !== "object") {
			throw new SerializationError(`Unsupported value type '${typeof value}'`);
		}

		if (Array.isArray(value)) {
			const array = vm.newArray();
			try {
				value.forEach((item: unknown, index) => {
					const itemHandle = this.encode(item, depth + 1);
					vm.setProp(array, index, itemHandle);
					itemHandle.dispose();
				});
			} catch (error) {
				array.dispose();
				throw error;
			}
			return array;
		}

		const prototype: unknown = Object.getPrototypeOf(value);
		if (prototype !== Object.prototype && prototype !== null) {
			throw new SerializationError(
				`Unsupported object type '${value.constructor.name || "anonymous"}'; only plain objects can be passed to scripts`
			);
		}

		const object = vm.newObject();
		try {
			for (const [key, item] of Object.entries(value)) {
				const itemHandle = this.encode(item, depth + 1);
				vm.setProp(object, key, itemHandle);
				itemHandle.dispose();
			}
		} catch (error) {
			object.dispose();
			throw error;
		}
		return object;
	}

	/**
	 * Decode an engine value into a host value. Does not take ownership of `handle`.
	 */
	decode(handle: QuickJSHandle, path: string = "value", depth: number = 0): unknown {
		const vm = this.vm;
		if (depth > MAX_DEPTH) {
			throw new DeserializationError(`${path} is nested deeper than ${MAX_DEPTH} levels`);
		}

		const type = vm.typeof(handle);
		switch (type) {
			case "undefined":
				return undefined;
			case "string":
				return vm.getString(handle);
			case "number":
				return vm.getNumber(handle);
			case "boolean":
			case "bigint": {
				const primitive: unknown = vm.dump(handle);
				return primitive;
			}
			case "function":
				return this.functions.store(handle.dup(), this.readString(handle, "name") ?? "");
			case "object":
				break;
			default:
				throw new DeserializationError(`${path} has unsupported type '${type}'`);
		}

		const kind = this.callHelper(this.kindOf, handle);
		if (kind === "null") {
			return null;
		}

		if (kind === "array") {
			const length = this.readNumber(handle, "length") ?? 0;
			const items: unknown[] = [];
			for (let index = 0; index < length; index++) {
				const itemHandle = vm.getProp(handle, index);
				try {
					items.push(this.decode(itemHandle, `${path}[${index}]`, depth + 1));
				} finally {
					itemHandle.dispose();
				}
			}
			return items;
		}

		const keys = this.callHelper(this.keysOf, handle);
		if (!Array.isArray(keys)) {
			throw new DeserializationError(`${path} has no enumerable keys`);
		}
		const result: Record<string, unknown> = {};
		for (const key of keys) {
			if (typeof key !== "string") {
				continue;
			}
			const itemHandle = vm.getProp(handle, key);
			try {
				result[key] = this.decode(itemHandle, `${path}.${key}`, depth + 1);
			} finally {
				itemHandle.dispose();
			}
		}
		return result;
	}

	isCallable(handle: QuickJSHandle): boolean {
		return this.vm.typeof(handle) === "function";
	}

	/**
	 * True for null and undefined
	 */
	isNullish(handle: QuickJSHandle): boolean {
		return this.vm.typeof(handle) === "undefined" || this.isNull(handle);
	}

	/**
	 * True when the value is an object or function with a callable `then`
	 */
	isPromiseLike(handle: QuickJSHandle): boolean {
		const type = this.vm.typeof(handle);
		if ((type !== "object" && type !== "function") || this.isNull(handle)) {
			return false;
		}
		const then = this.vm.getProp(handle, "then");
		try {
			return this.vm.typeof(then) === "function";
		} finally {
			then.dispose();
		}
	}

	/**
	 * Format a thrown engine value as "<file>:<line>: <Name>: <message>".
	 * Without location metadata only the error text is returned.
	 */
	describeError(handle: QuickJSHandle): string {
		const type = this.vm.typeof(handle);
		if (type !== "object" || this.isNull(handle)) {
			return String(this.vm.dump(handle));
		}

		const name = this.readString(handle, "name");
		const message = this.readString(handle, "message") ?? "";
		const text = name ? `${name}: ${message}` : message || "Unknown error during function execution";

		const location = this.locate(handle);
		return location ? `${location.file}:${location.line}: ${text}` : text;
	}

	/**
	 * Find where an engine error was thrown
	 */
	locate(handle: QuickJSHandle): ErrorLocation | undefined {
		const fromStack = parseStackLocation(this.readString(handle, "stack") ?? "");
		if (fromStack) {
			return fromStack;
		}
		const file = this.readString(handle, "fileName");
		const line = this.readNumber(handle, "lineNumber");
		if (file && line !== undefined) {
			return { file, line };
		}
		return undefined;
	}

	/**
	 * Own enumerable string keys of an engine object
	 */
	keys(handle: QuickJSHandle): string[] {
		const keys = this.callHelper(this.keysOf, handle);
		if (!Array.isArray(keys)) {
			return [];
		}
		return keys.filter((key): key is string => typeof key === "string");
	}

	/**
	 * Freeze an engine object in place
	 */
	freeze(handle: QuickJSHandle): void {
		this.callHelper(this.freezeFn, handle);
	}

	dispose(): void {
		this.kindOf.dispose();
		this.keysOf.dispose();
		this.freezeFn.dispose();
	}

	private isNull(handle: QuickJSHandle): boolean {
		return this.vm.typeof(handle) === "object" && this.callHelper(this.kindOf, handle) === "null";
	}

	private callHelper(helper: QuickJSHandle, argument: QuickJSHandle): unknown {
		const result = this.vm.callFunction(helper, this.vm.undefined, argument);
		if (result.error) {
			const message = this.describeError(result.error);
			result.error.dispose();
			throw new DeserializationError(`Cannot inspect value: ${message}`);
		}
		try {
			const value: unknown = this.vm.dump(result.value);
			return value;
		} finally {
			result.value.dispose();
		}
	}

	private readString(handle: QuickJSHandle, key: string): string | undefined {
		const property = this.vm.getProp(handle, key);
		try {
			return this.vm.typeof(property) === "string" ? this.vm.getString(property) : undefined;
		} finally {
			property.dispose();
		}
	}

	private readNumber(handle: QuickJSHandle, key: string): number | undefined {
		const property = this.vm.getProp(handle, key);
		try {
			return this.vm.typeof(property) === "number" ? this.vm.getNumber(property) : undefined;
		} finally {
			property.dispose();
		}
	}

	/**
	 * Captures Array.isArray, Object.keys and Object.freeze before any script can replace them
	 */
	private evalHelpers(): QuickJSHandle {
		const result = this.vm.evalCode(HELPERS_SOURCE, "<modhost:bridge>");
		if (result.error) {
			const message = String(this.vm.dump(result.error));
			result.error.dispose();
			throw new DeserializationError(`Cannot initialize value bridge: ${message}`);
		}
		return result.value;
	}
}

const HELPERS_SOURCE = `(() => {
	const isArray = Array.isArray;
	const keys = Object.keys;
	const freeze = Object.freeze;
	return {
		kindOf: (value) => value === null ? "null" : isArray(value) ? "array" : typeof value,
		keysOf: (value) => keys(value),
		freeze: (value) => {
			freeze(value);
		},
	};
})()`;

const STACK_FRAME = /^at\s+(?:.*?\s+\()?(.+?):(\d+)(?::\d+)?\)?$/;

/**
 * Parse the innermost "file:line" frame out of an engine stack trace
 */
export function parseStackLocation(stack: string): ErrorLocation | undefined {
	for (const rawLine of stack.split("\n")) {
		const match = STACK_FRAME.exec(rawLine.trim());
		if (match?.[1] && match[2]) {
			return { file: match[1], line: Number(match[2]) };
		}
	}
	return undefined;
}
