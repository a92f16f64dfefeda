/**
 * Host-side key/value state owned by one runtime.
 * Extensions use it to share values with the host; one value per key.
 */
export class RuntimeState {
	private values: Map<string, unknown> = new Map();

	put(key: string, value: unknown): void {
		this.values.set(key, value);
	}

	get(key: string): unknown {
		return this.values.get(key);
	}

	/**
	 * Remove and return a value
	 */
	take(key: string): unknown {
		const value = this.values.get(key);
		this.values.delete(key);
		return value;
	}

	has(key: string): boolean {
		return this.values.has(key);
	}

	clear(): void {
		this.values.clear();
	}
}
