import { getQuickJS, type QuickJSWASMModule } from "quickjs-emscripten";

/** Cached WASM module promise, shared by every runtime in the process */
let modulePromise: Promise<QuickJSWASMModule> | null = null;

/**
 * Load the QuickJS WASM module once and reuse it
 */
export function getEngineModule(): Promise<QuickJSWASMModule> {
	if (!modulePromise) {
		modulePromise = getQuickJS();
	}
	return modulePromise;
}
