import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import {
	DeserializationError,
	DisposedError,
	InvalidFunctionError,
	MissingEntrypointError,
	ResolutionError,
	RuntimeScriptError,
	SerializationError,
	TimeoutError,
	ValueNotCallableError,
	ValueNotFoundError,
} from "../errors";
import { Module } from "../module";
import { MemoryModuleCache } from "../module-cache";
import { ModuleRuntime } from "../runtime";
import type { RuntimeOptions } from "../runtime-options";
import { StoredFunction } from "../stored-function";
import { MockFetcher, MockLogger, captureError } from "./test-helpers";

/**
 * ModuleRuntime Tests
 *
 * Test Philosophy: Drive the runtime the way a host application would: load
 * modules, read values, call functions, and check that every failure comes
 * back as the matching typed error.
 */

describe("ModuleRuntime - Desired Behavior", () => {
	let runtime: ModuleRuntime;
	let logger: MockLogger;
	let fetcher: MockFetcher;

	async function createRuntime(options: RuntimeOptions = {}): Promise<ModuleRuntime> {
		runtime = await ModuleRuntime.create({ cwd: "/work", logger, fetchers: [fetcher], ...options });
		return runtime;
	}

	beforeEach(() => {
		logger = new MockLogger();
		fetcher = new MockFetcher();
	});

	afterEach(() => {
		runtime.dispose();
	});

	describe("Value Access Contract", () => {
		it("should read exported values and call exported functions", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module(
					"books.js",
					`
					const books = [];
					export const MY_FAVOURITE_FOOD = "saskatoons";
					export function addBook(title) {
						books.push(title);
						return books.length;
					}
					export function listBooks() {
						return books;
					}
				`
				)
			);

			expect(await runtime.getValue(handle, "MY_FAVOURITE_FOOD")).toBe("saskatoons");
			expect(await runtime.callFunction(handle, "addBook", ["Dune"])).toBe(1);
			expect(await runtime.callFunction(handle, "addBook", ["Emma"])).toBe(2);
			expect(await runtime.callFunction(handle, "listBooks")).toEqual(["Dune", "Emma"]);
		});

		it("should prefer globals over exports of the same name", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("shadow.js", 'globalThis.value = "global"; export const value = "export";')
			);

			expect(await runtime.getValue(handle, "value")).toBe("global");
		});

		it("should read globals without a module handle", async () => {
			await createRuntime();
			await runtime.loadModule(new Module("globals.js", "globalThis.answer = 42;"));

			expect(await runtime.getValue(undefined, "answer")).toBe(42);
		});

		it("should treat null, undefined and missing values as not found", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("empty.js", "export const nothing = null; export const unset = undefined;")
			);

			await expect(runtime.getValue(handle, "nothing")).rejects.toThrow(new ValueNotFoundError("nothing"));
			await expect(runtime.getValue(handle, "unset")).rejects.toBeInstanceOf(ValueNotFoundError);
			await expect(runtime.getValue(handle, "missing")).rejects.toThrow("Value not found: missing");
		});

		it("should await promise values", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("pending.js", "export const later = Promise.resolve(7);"));

			expect(await runtime.getValue(handle, "later")).toBe(7);
		});

		it("should validate values against a schema", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("typed.js", 'export const config = { name: "app", retries: 3 }; export const count = "three";')
			);

			const config = await runtime.getValue(handle, "config", z.object({ name: z.string(), retries: z.number() }));
			expect(config.retries).toBe(3);

			const error = await captureError(runtime.getValue(handle, "count", z.number()));
			expect(error).toBeInstanceOf(DeserializationError);
			expect(error instanceof Error ? error.message : "").toBe(
				"count does not match the expected type: Expected number, received string"
			);
		});

		it("should list a module's exports", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("keys.js", "export const b = 1; export function a() {}"));

			expect(runtime.keys(handle).sort()).toEqual(["a", "b"]);
		});

		it("should evaluate expressions in the global scope", async () => {
			await createRuntime();

			expect(await runtime.eval("5+5")).toBe(10);
			expect(await runtime.eval("Promise.resolve('async')", z.string())).toBe("async");
		});
	});

	describe("Function Call Contract", () => {
		it("should refuse to call values that are not functions", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("values.js", "export const notFn = 5;"));

			await expect(runtime.callFunction(handle, "notFn")).rejects.toThrow(new ValueNotCallableError("notFn"));
			expect(runtime.isCallable(handle, "notFn")).toBe(false);
			expect(runtime.isCallable(handle, "missing")).toBe(false);
			expect(() => runtime.getFunction(handle, "notFn")).toThrow(ValueNotCallableError);
		});

		it("should bind the module namespace as this", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("self.js", 'export const label = "self"; export function whoami() { return this.label; }')
			);

			expect(await runtime.callFunction(handle, "whoami")).toBe("self");
		});

		it("should settle async functions", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("async.js", "export async function double(x) { await null; return x * 2; }")
			);

			expect(await runtime.callFunction(handle, "double", [21], z.number())).toBe(42);
		});

		it("should report script exceptions with their location", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("throws.js", 'export function fail() { throw new Error("boom"); }')
			);

			const error = await captureError(runtime.callFunction(handle, "fail"));

			expect(error).toBeInstanceOf(RuntimeScriptError);
			expect(error instanceof Error ? error.message : "").toBe("file:///work/throws.js:1: Error: boom");
		});

		it("should refuse arguments that cannot cross into the engine", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("args.js", "export const id = (x) => x;"));

			await expect(runtime.callFunction(handle, "id", [Symbol("nope")])).rejects.toBeInstanceOf(SerializationError);
		});
	});

	describe("Stored Function Contract", () => {
		it("should call functions captured by name", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("math.js", "export const add = (a, b) => a + b;"));

			const add = runtime.getFunction(handle, "add");

			expect(add).toBeInstanceOf(StoredFunction);
			expect(await runtime.callStoredFunction(handle, add, [2, 3])).toBe(5);
		});

		it("should keep closures alive between calls", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("counter.js", "export function makeCounter() { let n = 0; return () => ++n; }")
			);

			const counter = await runtime.callFunction(handle, "makeCounter", [], z.instanceof(StoredFunction));

			expect(await runtime.callStoredFunction(handle, counter)).toBe(1);
			expect(await runtime.callStoredFunction(handle, counter)).toBe(2);
		});

		it("should decode functions nested in returned data", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("api.js", 'export function api() { return { name: "calc", add: (a, b) => a + b }; }')
			);

			const api = await runtime.callFunction(
				handle,
				"api",
				[],
				z.object({ name: z.string(), add: z.instanceof(StoredFunction) })
			);

			expect(api.name).toBe("calc");
			expect(await runtime.callStoredFunction(handle, api.add, [4, 5])).toBe(9);
		});

		it("should pass stored functions back into scripts", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("apply.js", "export const square = (x) => x * x; export const apply = (fn, x) => fn(x);")
			);

			const square = runtime.getFunction(handle, "square");

			expect(await runtime.callFunction(handle, "apply", [square, 6])).toBe(36);
		});

		it("should refuse released functions", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("release.js", "export const f = () => 1;"));
			const f = runtime.getFunction(handle, "f");

			runtime.releaseFunction(f);

			await expect(runtime.callStoredFunction(handle, f)).rejects.toBeInstanceOf(InvalidFunctionError);
		});

		it("should refuse functions from another runtime", async () => {
			await createRuntime();
			const other = await ModuleRuntime.create({ cwd: "/work" });
			try {
				const foreignHandle = await other.loadModule(new Module("other.js", "export const f = () => 1;"));
				const foreign = other.getFunction(foreignHandle, "f");

				const error = await captureError(runtime.callStoredFunction(undefined, foreign));

				expect(error).toBeInstanceOf(InvalidFunctionError);
				expect(error instanceof Error ? error.message : "").toBe(
					`[StoredFunction f#${other.id}:${foreign.slot}] belongs to runtime ${other.id}, not runtime ${runtime.id}`
				);
			} finally {
				other.dispose();
			}
		});
	});

	describe("Entrypoint Contract", () => {
		it("should call a registered entrypoint", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("entry.js", "modhost.registerEntrypoint(() => 2);"));

			expect(handle.entrypoint).toBeInstanceOf(StoredFunction);
			expect(await runtime.callEntrypoint(handle)).toBe(2);
		});

		it("should keep the last registration", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("twice.js", 'modhost.registerEntrypoint(() => "first"); modhost.registerEntrypoint(() => "second");')
			);

			expect(await runtime.callEntrypoint(handle)).toBe("second");
		});

		it("should prefer a registered entrypoint over the default export", async () => {
			await createRuntime({ defaultEntrypoint: "main" });
			const handle = await runtime.loadModule(
				new Module(
					"both.js",
					'export function main() { return "default"; } modhost.registerEntrypoint(() => "registered");'
				)
			);

			expect(await runtime.callEntrypoint(handle)).toBe("registered");
		});

		it("should fall back to the default entrypoint export", async () => {
			await createRuntime({ defaultEntrypoint: "main" });
			const handle = await runtime.loadModule(
				new Module("default.js", "export function main(name) { return `hello ${name}`; }")
			);

			expect(await runtime.callEntrypoint(handle, ["ada"], z.string())).toBe("hello ada");
		});

		it("should fail when a module has no entrypoint", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(new Module("none.js", "export const x = 1;"));

			expect(handle.entrypoint).toBeUndefined();
			await expect(runtime.callEntrypoint(handle)).rejects.toThrow(new MissingEntrypointError(handle.module));
			await expect(runtime.callEntrypoint(handle)).rejects.toThrow("Module has no entrypoint: none.js");
		});

		it("should reject non-function registrations inside the script", async () => {
			await createRuntime();

			const error = await captureError(runtime.loadModule(new Module("bad.js", "modhost.registerEntrypoint(42);")));

			expect(error).toBeInstanceOf(RuntimeScriptError);
			expect(error instanceof Error ? error.message : "").toContain("TypeError: registerEntrypoint expects a function");
		});

		it("should run a module in a throwaway runtime", async () => {
			runtime = await ModuleRuntime.create({ cwd: "/work" });

			const result = await ModuleRuntime.executeModule(
				new Module("sum.js", "modhost.registerEntrypoint((a, b) => a + b);"),
				[],
				{ cwd: "/work" },
				[2, 3],
				z.number()
			);

			expect(result).toBe(5);
		});
	});

	describe("Module Graph Contract", () => {
		it("should let the main module import side modules", async () => {
			await createRuntime();
			const handle = await runtime.loadModules(new Module("main.js", 'import { greeting } from "./lib.js"; export const message = greeting + "!";'), [
				new Module("lib.js", 'export const greeting = "hi";'),
			]);

			expect(handle.module.filename).toBe("main.js");
			expect(await runtime.getValue(handle, "message")).toBe("hi!");
		});

		it("should fetch and cache imported modules", async () => {
			const moduleCache = new MemoryModuleCache();
			fetcher.setFile("file:///work/util.js", "export const twice = (x) => x * 2;");
			await createRuntime({ moduleCache });

			const handle = await runtime.loadModule(
				new Module("uses-util.js", 'import { twice } from "./util.js"; export const result = twice(4);')
			);

			expect(await runtime.getValue(handle, "result")).toBe(8);
			expect(moduleCache.has("file:///work/util.js")).toBe(true);
		});

		it("should import JSON modules as a default export", async () => {
			fetcher.setFile("file:///work/data.json", '{"name":"modhost"}');
			await createRuntime();

			const handle = await runtime.loadModule(
				new Module("reads-json.js", 'import data from "./data.json"; export const name = data.name;')
			);

			expect(await runtime.getValue(handle, "name")).toBe("modhost");
		});

		it("should strip types from TypeScript modules", async () => {
			await createRuntime();

			const handle = await runtime.loadModule(new Module("typed.ts", "export const n: number = 41 + 1;"));

			expect(await runtime.getValue(handle, "n")).toBe(42);
		});

		it("should deny dynamic imports outside the loaded graph", async () => {
			fetcher.setFile("file:///work/hidden.js", "export const value = 42;");
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("dynamic.js", 'export async function load() { return (await import("./hidden.js")).value; }')
			);

			const error = await captureError(runtime.callFunction(handle, "load"));

			expect(error).toBeInstanceOf(RuntimeScriptError);
			expect(error instanceof Error ? error.message : "").toContain("requested module is not loaded: ./hidden.js");
		});

		it("should allow dynamic imports with the filesystem capability", async () => {
			fetcher.setFile("file:///work/hidden.js", "export const value = 42;");
			await createRuntime({ permissions: { fsImports: true } });
			const handle = await runtime.loadModule(
				new Module("dynamic.js", 'export async function load() { return (await import("./hidden.js")).value; }')
			);

			expect(await runtime.callFunction(handle, "load")).toBe(42);
		});

		it("should load modules that mention imports in strings and comments", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module(
					"doc.js",
					[
						"export const usage = 'import { a } from \"pkg\"';",
						'// you could also import "./missing.js"',
						"export const x = 1;",
					].join("\n")
				)
			);

			expect(await runtime.getValue(handle, "usage")).toBe('import { a } from "pkg"');
			expect(await runtime.getValue(handle, "x")).toBe(1);
			expect(fetcher.fetched).toEqual([]);
		});

		it("should import a computed specifier with the filesystem capability", async () => {
			fetcher.setFile("file:///work/lib.js", 'import { base } from "./base.js"; export const value = base + 1;');
			fetcher.setFile("file:///work/base.js", "export const base = 6;");
			await createRuntime({ permissions: { fsImports: true } });
			const handle = await runtime.loadModule(
				new Module(
					"computed.js",
					'const name = "./lib" + ".js";\nexport async function load() { return (await import(name)).value; }'
				)
			);

			expect(fetcher.fetched).toEqual([]);
			expect(await runtime.callFunction(handle, "load")).toBe(7);
		});

		it("should deny a computed specifier outside the loaded graph", async () => {
			fetcher.setFile("file:///work/lib.js", "export const value = 7;");
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module("computed.js", 'export async function load() { const name = "./lib" + ".js"; return import(name); }')
			);

			const error = await captureError(runtime.callFunction(handle, "load"));

			expect(error).toBeInstanceOf(RuntimeScriptError);
			expect(error instanceof Error ? error.message : "").toContain("requested module is not loaded: ./lib.js");
			expect(fetcher.fetched).toEqual([]);
		});

		it("should import the runtime helpers module", async () => {
			await createRuntime();
			const handle = await runtime.loadModule(
				new Module(
					"helpers.js",
					'import { applyToGlobal, readOnly } from "ext:modhost/runtime.js"; applyToGlobal({ VERSION: readOnly("1.0") });'
				)
			);

			expect(await runtime.getValue(handle, "VERSION")).toBe("1.0");
			expect(await runtime.eval('(() => { "use strict"; try { VERSION = "2"; return "changed"; } catch { return VERSION; } })()')).toBe("1.0");
		});

		it("should reject imports with unrecognized schemes", async () => {
			await createRuntime();

			const error = await captureError(
				runtime.loadModule(new Module("data.js", 'import x from "data:text/javascript,export default 1";'))
			);

			expect(error).toBeInstanceOf(ResolutionError);
			expect(error instanceof Error ? error.message : "").toBe(
				"unrecognized schema for module import: data:text/javascript,export default 1"
			);
		});

		it("should keep side modules loaded before a failing main module", async () => {
			await createRuntime();

			await expect(
				runtime.loadModules(new Module("broken.js", 'throw new Error("main failed");'), [
					new Module("side.js", "globalThis.sideLoaded = true;"),
				])
			).rejects.toThrow("Error: main failed");

			expect(await runtime.eval("globalThis.sideLoaded")).toBe(true);
		});

		it("should refuse to load nothing", async () => {
			await createRuntime();

			await expect(runtime.loadModules(null, [])).rejects.toThrow("Internal error: attempt to load no modules");
		});
	});

	describe("Deadline Contract", () => {
		it("should time out module evaluation that never finishes", async () => {
			await createRuntime({ timeoutMs: 50 });

			await expect(runtime.loadModule(new Module("spin.js", "while (true) {}"))).rejects.toThrow(new TimeoutError());
			expect(await runtime.eval("1 + 1")).toBe(2);
		});

		it("should time out calls waiting on host work", async () => {
			await createRuntime({
				timeoutMs: 50,
				extensions: [{ name: "host", functions: { never: () => new Promise<never>(() => undefined) } }],
			});
			const handle = await runtime.loadModule(new Module("wait.js", "export async function wait() { await host.never(); }"));

			await expect(runtime.callFunction(handle, "wait")).rejects.toBeInstanceOf(TimeoutError);
		});
	});

	describe("Extension Contract", () => {
		it("should expose host functions on a frozen global namespace", async () => {
			await createRuntime({
				extensions: [
					{
						name: "host",
						functions: {
							greet: (_context, name) => `hello ${String(name)}`,
							lookup: async (_context, key) => ({ key, found: true }),
						},
					},
				],
			});
			const handle = await runtime.loadModule(
				new Module(
					"uses-host.js",
					'export const greeting = host.greet("bob"); export async function find() { return await host.lookup("k"); }'
				)
			);

			expect(await runtime.getValue(handle, "greeting")).toBe("hello bob");
			expect(await runtime.callFunction(handle, "find")).toEqual({ key: "k", found: true });
			expect(await runtime.eval("Object.isFrozen(host)")).toBe(true);
		});

		it("should surface host function failures as script exceptions", async () => {
			await createRuntime({
				extensions: [
					{
						name: "host",
						functions: {
							fail: () => {
								throw new RangeError("out of range");
							},
						},
					},
				],
			});

			expect(await runtime.eval("(() => { try { host.fail(); } catch (e) { return e.name + ': ' + e.message; } })()")).toBe(
				"RangeError: out of range"
			);
		});

		it("should share host state with extensions", async () => {
			await createRuntime({
				extensions: [
					{
						name: "store",
						functions: {
							read: (context, key) => context.state.get(String(key)),
							write: (context, key, value) => {
								context.state.put(String(key), value);
							},
						},
					},
				],
			});
			runtime.put("user", "ada");

			expect(await runtime.eval('store.read("user")')).toBe("ada");
			await runtime.eval('store.write("result", [1, 2])');
			expect(runtime.take("result")).toEqual([1, 2]);
			expect(runtime.take("result")).toBeUndefined();
		});

		it("should register extension modules and run setup", async () => {
			let setupCalls = 0;
			await createRuntime({
				extensions: [
					{
						name: "tools",
						modules: { "index.js": "export const toolName = 'hammer';" },
						setup: () => {
							setupCalls++;
						},
					},
				],
			});

			const handle = await runtime.loadModule(
				new Module("uses-tools.js", 'import { toolName } from "ext:tools/index.js"; export const tool = toolName;')
			);

			expect(setupCalls).toBe(1);
			expect(await runtime.getValue(handle, "tool")).toBe("hammer");
		});

		it("should forward script console output to the logger", async () => {
			await createRuntime();

			await runtime.eval('console.log("loaded", 1, { a: 1 }); console.warn("careful")');

			expect(logger.messages("info")).toContain('[script] loaded 1 {"a":1}');
			expect(logger.messages("warn")).toContain("[script] careful");
		});

		it("should reserve the built-in namespace", async () => {
			await expect(ModuleRuntime.create({ extensions: [{ name: "modhost" }] })).rejects.toThrow(
				"Invalid runtime options: extension name 'modhost' is reserved"
			);
			runtime = await ModuleRuntime.create();
		});
	});

	describe("Lifecycle Contract", () => {
		it("should refuse calls after dispose", async () => {
			await createRuntime();
			runtime.dispose();

			expect(runtime.isDisposed).toBe(true);
			await expect(runtime.eval("1")).rejects.toBeInstanceOf(DisposedError);
			await expect(runtime.loadModule(new Module("late.js", ""))).rejects.toThrow("Runtime has been disposed");
		});

		it("should give each runtime its own id", async () => {
			await createRuntime();
			const other = await ModuleRuntime.create();

			expect(other.id).not.toBe(runtime.id);
			other.dispose();
		});
	});
});
