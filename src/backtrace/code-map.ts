import type { CodeAddress } from './addresses.js';

export const DEFAULT_CODE_MAP_CAPACITY = 4096;

/**
 * Address -> function name table, filled by the call-site walker as it meets code.
 *
 * Plays the part of a JIT's perf map: the symbolizer only ever sees an address,
 * and this is where the name for that address was written down. Bounded; once
 * full, the oldest entry makes room for the new one.
 */
export class CodeMap {
  private readonly names = new Map<CodeAddress, string>();

  constructor(readonly capacity: number = DEFAULT_CODE_MAP_CAPACITY) {}

  record(address: CodeAddress, name: string): void {
    if (this.names.has(address)) return;
    if (this.names.size >= this.capacity) {
      const oldest = this.names.keys().next();
      if (!oldest.done) this.names.delete(oldest.value);
    }
    this.names.set(address, name);
  }

  lookup(address: CodeAddress): string | undefined {
    return this.names.get(address);
  }

  get size(): number {
    return this.names.size;
  }
}
