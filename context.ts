/**
 * @file context.ts
 * @description The key/value store accumulated across a single pipeline run.
 */

/**
 * Shared, mutable values for one run. Seeded from a copy of the caller's
 * initial values and merged with every successful node's output; a later
 * write to a key replaces the earlier value.
 */
export class ExecutionContext {
  readonly #values = new Map<string, unknown>();

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    this.merge(initial);
  }

  has(key: string): boolean {
    return this.#values.has(key);
  }

  get(key: string): unknown {
    return this.#values.get(key);
  }

  /**
   * Keys in first-write order.
   */
  keys(): string[] {
    return Array.from(this.#values.keys());
  }

  get size(): number {
    return this.#values.size;
  }

  /**
   * Writes every entry of `values`, overwriting existing keys.
   */
  merge(values: Readonly<Record<string, unknown>>): this {
    for (const [key, value] of Object.entries(values)) {
      this.#values.set(key, value);
    }
    return this;
  }

  /**
   * Plain-object copy of the current values.
   */
  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.#values);
  }

  toJSON(): Record<string, unknown> {
    return this.snapshot();
  }
}
