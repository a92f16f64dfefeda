import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import type { QuickJSContext, QuickJSWASMModule } from "quickjs-emscripten";
import { getEngineModule } from "../engine";
import { InvalidFunctionError } from "../errors";
import { FunctionTable, StoredFunction } from "../stored-function";

/**
 * FunctionTable Tests
 *
 * Test Philosophy: Stored functions are plain ids. The table owns the engine
 * handles behind them and refuses ids it did not issue or already released.
 */

describe("FunctionTable - Desired Behavior", () => {
	let engine: QuickJSWASMModule;
	let vm: QuickJSContext;
	let table: FunctionTable;

	beforeAll(async () => {
		engine = await getEngineModule();
	});

	beforeEach(() => {
		vm = engine.newContext();
		table = new FunctionTable(7);
	});

	afterEach(() => {
		table.close();
		vm.dispose();
	});

	it("should issue increasing slots tagged with the runtime id", () => {
		const first = table.store(vm.newObject(), "first");
		const second = table.store(vm.newObject(), "second");

		expect(first.runtimeId).toBe(7);
		expect(first.slot).toBe(1);
		expect(second.slot).toBe(2);
		expect(first.toString()).toBe("[StoredFunction first#7:1]");
		expect(table.size).toBe(2);
	});

	it("should return the stored handle", () => {
		const handle = vm.newObject();

		const fn = table.store(handle, "fn");

		expect(table.get(fn)).toBe(handle);
		expect(table.has(fn)).toBe(true);
	});

	it("should refuse functions from another runtime", () => {
		const foreign = new StoredFunction(2, 1, "foreign");

		expect(() => table.get(foreign)).toThrow(
			new InvalidFunctionError("[StoredFunction foreign#2:1] belongs to runtime 2, not runtime 7")
		);
		expect(table.has(foreign)).toBe(false);
	});

	it("should dispose the handle on release and refuse later use", () => {
		const handle = vm.newObject();
		const fn = table.store(handle, "");

		table.release(fn);

		expect(handle.alive).toBe(false);
		expect(() => table.get(fn)).toThrow("[StoredFunction anonymous#7:1] has been released");
		expect(table.size).toBe(0);
	});

	it("should dispose everything on close and refuse new functions", () => {
		const a = vm.newObject();
		const b = vm.newObject();
		table.store(a, "a");
		table.store(b, "b");

		table.close();
		const late = vm.newObject();

		expect(a.alive).toBe(false);
		expect(b.alive).toBe(false);
		expect(() => table.store(late, "late")).toThrow(InvalidFunctionError);
		expect(late.alive).toBe(false);
	});

	it("should freeze stored function references", () => {
		expect(Object.isFrozen(new StoredFunction(1, 1, "fn"))).toBe(true);
	});
});
