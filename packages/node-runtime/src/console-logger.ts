import type { Logger } from "@modhost/runtime-core";

/**
 * Node implementation of Logger interface.
 * Uses console with a prefix for easy filtering.
 */
export class ConsoleLogger implements Logger {
	private prefix: string;
	private verbose: boolean;

	/**
	 * @param verbose - Print debug messages too
	 */
	constructor(prefix: string = "[modhost]", verbose: boolean = false) {
		this.prefix = prefix;
		this.verbose = verbose;
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.verbose) {
			console.debug(this.prefix, message, ...args);
		}
	}

	info(message: string, ...args: unknown[]): void {
		console.info(this.prefix, message, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		console.warn(this.prefix, message, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		console.error(this.prefix, message, ...args);
	}
}
