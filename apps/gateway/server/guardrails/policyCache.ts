import type { GuardrailPolicy } from "./types.js";

type Entry = {
  value: Promise<GuardrailPolicy>;
  expiresAt: number;
};

/**
 * Compiled policies keyed by source. Concurrent first lookups of one key share
 * a single compile; a compile that fails is dropped so the next lookup retries.
 */
export class PolicyCache {
  private entries = new Map<string, Entry>();
  private ttlMs: number;
  private now: () => number;

  constructor(opts: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = opts.ttlMs ?? Number.POSITIVE_INFINITY;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  getOrCompile(key: string, compile: () => Promise<GuardrailPolicy>): Promise<GuardrailPolicy> {
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > this.now()) return hit.value;

    const value = Promise.resolve().then(compile);
    const entry: Entry = { value, expiresAt: this.now() + this.ttlMs };
    this.entries.set(key, entry);

    void value.catch(() => {
      if (this.entries.get(key) === entry) this.entries.delete(key);
    });
    return value;
  }

  /** Drop one key, or everything. */
  invalidate(key?: string) {
    if (key === undefined) this.entries.clear();
    else this.entries.delete(key);
  }
}
