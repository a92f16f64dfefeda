import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { Module } from "@modhost/runtime-core";

const MODULE_EXTENSIONS = new Set([".js", ".ts"]);

/**
 * Read a module from disk. The filename is kept as given.
 */
export async function loadModuleFile(path: string): Promise<Module> {
	const contents = await readFile(path, "utf8");
	return new Module(path, contents);
}

/**
 * Read every .js and .ts file directly inside a directory, sorted by name.
 * Any read failure rejects.
 */
export async function loadModuleDir(dir: string): Promise<Module[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	const files = entries
		.filter((entry) => entry.isFile() && MODULE_EXTENSIONS.has(extname(entry.name)))
		.map((entry) => entry.name)
		.sort();
	return Promise.all(files.map((name) => loadModuleFile(join(dir, name))));
}
