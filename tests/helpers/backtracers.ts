import { Backtracer } from '../../src/backtrace/backtracer.js';
import { CodeMap } from '../../src/backtrace/code-map.js';
import { SourceMapRegistry } from '../../src/backtrace/source-maps.js';
import { ScriptTable } from '../../src/backtrace/script-table.js';
import { CallSiteWalker, TextualStackWalker } from '../../src/backtrace/stack-walkers.js';
import { CodeMapSymbolizer } from '../../src/backtrace/symbolizer.js';
import { FixedStackWalker } from '../fakes/fixed-stack-walker.js';
import { RecordingSymbolizer } from '../fakes/recording-symbolizer.js';
import { silentLogger } from './logging.js';

export interface FakeStack {
  readonly ips: readonly number[];
  readonly sps: readonly number[];
  readonly names?: ReadonlyMap<number, string>;
  readonly maxDepth?: number;
  readonly symbolBufferSize?: number;
}

export function createFakeBacktracer(stack: FakeStack): { backtracer: Backtracer; symbolizer: RecordingSymbolizer } {
  const symbolizer = new RecordingSymbolizer(stack.names ?? new Map<number, string>());
  const backtracer = new Backtracer({
    walkers: {
      instructions: new FixedStackWalker(stack.ips),
      frames: new FixedStackWalker(stack.sps),
    },
    symbolizer,
    maxDepth: stack.maxDepth ?? 64,
    symbolBufferSize: stack.symbolBufferSize ?? 256,
  });
  return { backtracer, symbolizer };
}

/**
 * Backtracer over the real V8 walkers, as the container builds it.
 */
export function createV8Backtracer(maxDepth = 64, codeMap: CodeMap = new CodeMap()): Backtracer {
  const scripts = new ScriptTable();
  return new Backtracer({
    walkers: {
      instructions: new CallSiteWalker(scripts, codeMap),
      frames: new TextualStackWalker(scripts),
    },
    symbolizer: new CodeMapSymbolizer(scripts, codeMap, new SourceMapRegistry(silentLogger())),
    maxDepth,
    symbolBufferSize: 1024,
  });
}
