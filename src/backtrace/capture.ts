import { SymbolBuffer } from './symbol.js';
import type { StackEntry } from './call-sites.js';
import type { FrameNames, StackWalker } from './stack-walkers.js';

export const DEFAULT_MAX_STACK_DEPTH = 64;

/**
 * Buffers for one trace, sized once: instruction addresses, stack addresses,
 * the names the call-site walker saw at each level, and the symbol buffer.
 * Nothing on the capture/resolve path grows them.
 */
export class StackArena {
  readonly instructionPointers: Float64Array;
  readonly stackPointers: Float64Array;
  readonly frameNames: FrameNames;
  readonly symbol: SymbolBuffer;

  constructor(readonly maxDepth: number, symbolBufferSize: number) {
    this.instructionPointers = new Float64Array(maxDepth);
    this.stackPointers = new Float64Array(maxDepth);
    this.frameNames = new Array<string | undefined>(maxDepth).fill(undefined);
    this.symbol = new SymbolBuffer(symbolBufferSize);
  }

  reset(): void {
    this.instructionPointers.fill(Number.NaN);
    this.stackPointers.fill(Number.NaN);
    this.frameNames.fill(undefined);
    this.symbol.clear();
  }
}

export interface StackWalkers {
  readonly instructions: StackWalker;
  readonly frames: StackWalker;
}

/**
 * Run both walkers into the arena and return the depth usable for pairing:
 * the shorter of the two walks. Cannot fail; an empty walk yields 0.
 */
export function captureStack(arena: StackArena, walkers: StackWalkers, entry: StackEntry): number {
  arena.reset();
  const ipDepth = walkers.instructions.walk(arena.instructionPointers, entry, arena.frameNames);
  const spDepth = walkers.frames.walk(arena.stackPointers, entry);
  return Math.max(0, Math.min(ipDepth, spDepth, arena.maxDepth));
}
