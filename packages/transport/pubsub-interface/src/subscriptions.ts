import { validatePattern } from "./topic.js";

/**
 * Reference counted set of subscription patterns. Several consumers may share
 * one connection and subscribe to the same pattern.
 */
export class Subscriptions {
	private counts: Map<string, number> = new Map();

	/**
	 * @returns true if this is the first subscriber of the pattern
	 */
	add(pattern: string): boolean {
		validatePattern(pattern);
		const count = this.counts.get(pattern) ?? 0;
		this.counts.set(pattern, count + 1);
		return count === 0;
	}

	/**
	 * @returns true if the last subscriber of the pattern left
	 */
	remove(pattern: string): boolean {
		const count = this.counts.get(pattern);
		if (count == null) {
			return false;
		}
		if (count <= 1) {
			this.counts.delete(pattern);
			return true;
		}
		this.counts.set(pattern, count - 1);
		return false;
	}

	has(pattern: string): boolean {
		return this.counts.has(pattern);
	}

	patterns(): string[] {
		return [...this.counts.keys()];
	}

	clear() {
		this.counts.clear();
	}

	get size(): number {
		return this.counts.size;
	}
}
