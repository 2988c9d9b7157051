import { toCodeAddress } from './addresses.js';
import type { StackEntry } from './call-sites.js';
import type { StackWalkers } from './capture.js';
import { StackArena, captureStack } from './capture.js';
import type { Frame, FrameVisitor } from './frame.js';
import { FrameSymbol } from './symbol.js';
import type { Symbolizer } from './symbolizer.js';

export interface BacktracerOptions {
  readonly walkers: StackWalkers;
  readonly symbolizer: Symbolizer;
  readonly maxDepth: number;
  readonly symbolBufferSize: number;
}

/**
 * Captures the calling thread's stack and hands it to a visitor one frame at a time.
 *
 * Frames are built lazily: a frame's symbol is resolved right before its visitor
 * call, and a visitor that stops early saves the resolution work for the rest.
 */
export class Backtracer {
  private readonly arena: StackArena;
  private busy = false;

  constructor(private readonly options: BacktracerOptions) {
    this.arena = new StackArena(options.maxDepth, options.symbolBufferSize);
  }

  get maxDepth(): number {
    return this.options.maxDepth;
  }

  /**
   * Walk the stack below this call. Returns the effective depth, whether or not
   * the visitor stopped early.
   */
  trace(visitor: FrameVisitor): number {
    return this.traceBelow(Backtracer.prototype.trace, visitor);
  }

  /**
   * Walk the stack below `entry`'s frame. Wrappers pass themselves so that their
   * own frame is the one skipped.
   */
  traceBelow(entry: StackEntry, visitor: FrameVisitor): number {
    // A visitor that traces again gets its own scratch arena instead of clobbering ours.
    if (this.busy) {
      return this.run(new StackArena(this.options.maxDepth, this.options.symbolBufferSize), entry, visitor);
    }

    this.busy = true;
    try {
      return this.run(this.arena, entry, visitor);
    } finally {
      this.busy = false;
    }
  }

  private run(arena: StackArena, entry: StackEntry, visitor: FrameVisitor): number {
    const depth = captureStack(arena, this.options.walkers, entry);
    const symbol = new FrameSymbol(arena.symbol);

    for (let i = 0; i < depth; i++) {
      const level = depth - 1 - i;
      const ip = toCodeAddress(arena.instructionPointers[level]);
      const sp = toCodeAddress(arena.stackPointers[level]);

      arena.symbol.clear();
      const resolved =
        ip !== undefined && this.options.symbolizer.symbolize(ip, arena.symbol, arena.frameNames[level]);

      const frame: Frame = { ip, sp, symbol: resolved ? symbol : undefined };
      if (visitor(frame, depth - i)) break;
    }

    return depth;
  }
}
