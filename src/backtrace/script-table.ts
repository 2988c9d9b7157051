import { fileURLToPath } from 'url';
import { MAX_SCRIPT_SLOT } from './addresses.js';

/**
 * Fixed-capacity intern table of script names.
 *
 * Slot 0 is reserved for code without a script name. Once full, unseen scripts
 * also land in slot 0: their frames keep a line/column but lose the file.
 */
export class ScriptTable {
  private readonly names: string[] = [''];
  private readonly slots = new Map<string, number>();
  readonly capacity: number;

  constructor(capacity: number = MAX_SCRIPT_SLOT) {
    this.capacity = Math.max(1, Math.min(capacity, MAX_SCRIPT_SLOT));
  }

  intern(script: string | undefined): number {
    if (!script) return 0;
    const name = normalizeScriptName(script);
    const known = this.slots.get(name);
    if (known !== undefined) return known;
    if (this.names.length > this.capacity) return 0;

    const slot = this.names.length;
    this.names.push(name);
    this.slots.set(name, slot);
    return slot;
  }

  /** Script name for a slot, or undefined for slot 0 and unknown slots. */
  nameOf(slot: number): string | undefined {
    if (slot <= 0) return undefined;
    return this.names[slot];
  }

  get size(): number {
    return this.names.length - 1;
  }
}

/**
 * ESM frames report `file://` URLs, CommonJS frames report paths. Both intern as paths.
 */
export function normalizeScriptName(script: string): string {
  if (script.startsWith('file://')) {
    try {
      return fileURLToPath(script);
    } catch {
      return script;
    }
  }
  return script;
}
