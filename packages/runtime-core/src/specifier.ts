import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ResolutionError } from "./errors";

/**
 * Referrer used for modules the host asks to load directly
 */
export const ROOT_REFERRER = ".";

const URL_SCHEME = /^[a-zA-Z][a-zA-Z\d+\-.]*:/;
const WINDOWS_DRIVE = /^[a-zA-Z]:[\\/]/;

/**
 * Turn a host-supplied filename or URL into an absolute locator.
 * Plain paths are resolved against `cwd`.
 */
export function toModuleSpecifier(filename: string, cwd: string = process.cwd()): URL {
	if (URL_SCHEME.test(filename) && !WINDOWS_DRIVE.test(filename)) {
		try {
			return new URL(filename);
		} catch {
			throw new ResolutionError(filename, `Invalid module URL: ${filename}`);
		}
	}

	const absolutePath = isAbsolute(filename) ? filename : resolve(cwd, filename);
	return pathToFileURL(absolutePath);
}

/**
 * Canonicalize an import specifier against its referrer
 */
export function resolveImport(specifier: string, referrer: string, cwd?: string): URL {
	if (referrer === ROOT_REFERRER) {
		return toModuleSpecifier(specifier, cwd);
	}

	if (URL_SCHEME.test(specifier)) {
		try {
			return new URL(specifier);
		} catch {
			throw new ResolutionError(specifier, `Invalid module URL: ${specifier}`);
		}
	}

	if (!isRelativeSpecifier(specifier)) {
		throw new ResolutionError(
			specifier,
			`Relative import path "${specifier}" not prefixed with / or ./ or ../ (from ${referrer})`
		);
	}

	try {
		return new URL(specifier, referrer);
	} catch {
		throw new ResolutionError(specifier, `Cannot resolve "${specifier}" from ${referrer}`);
	}
}

/**
 * Resolve a path to its absolute file: URL string
 */
export function resolvePath(path: string, cwd?: string): string {
	return toModuleSpecifier(path, cwd).href;
}

function isRelativeSpecifier(specifier: string): boolean {
	return specifier.startsWith("./") || specifier.startsWith("../") || specifier.startsWith("/");
}
