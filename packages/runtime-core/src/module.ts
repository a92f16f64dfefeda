/**
 * A named unit of ECMAScript-module source.
 * The filename may be relative; it is resolved against the runtime's cwd at load time
 * and is only read from disk when loaded through a file helper.
 */
export class Module {
	readonly filename: string;
	readonly contents: string;

	constructor(filename: string, contents: string) {
		this.filename = filename;
		this.contents = contents;
		Object.freeze(this);
	}

	equals(other: Module): boolean {
		return this.filename === other.filename && this.contents === other.contents;
	}

	toString(): string {
		return this.filename;
	}
}
