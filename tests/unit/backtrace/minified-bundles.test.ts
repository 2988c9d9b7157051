import vm from 'vm';
import { describe, expect, it } from 'vitest';
import { decodeAddress, toCodeAddress } from '../../../src/backtrace/addresses.js';
import { CodeMap } from '../../../src/backtrace/code-map.js';
import { ScriptTable } from '../../../src/backtrace/script-table.js';
import { SourceMapRegistry } from '../../../src/backtrace/source-maps.js';
import type { FrameNames } from '../../../src/backtrace/stack-walkers.js';
import { CallSiteWalker } from '../../../src/backtrace/stack-walkers.js';
import { SymbolBuffer } from '../../../src/backtrace/symbol.js';
import { CodeMapSymbolizer } from '../../../src/backtrace/symbolizer.js';
import { createV8Backtracer } from '../../helpers/backtracers.js';
import { silentLogger } from '../../helpers/logging.js';

const BUNDLE = '/srv/app/bundle.min.js';
const LAST_COLUMN = 2 ** 20 - 1;
const PAD = ' '.repeat(1_500_000);

/**
 * Evaluates a one-line bundle whose `parse` and `draw` both call `onCall` from
 * columns past the last one an address can hold.
 */
function runBundle(onCall: (label: string) => void): void {
  const source =
    `(function (onCall) {${PAD}function parse() { return onCall('parse'); }` +
    `${PAD}function draw() { return onCall('draw'); } parse(); draw(); })`;
  const factory: unknown = vm.runInThisContext(source, { filename: BUNDLE });
  if (typeof factory !== 'function') throw new Error('bundle did not evaluate to a function');
  Reflect.apply(factory, undefined, [onCall]);
}

describe('frames on very long lines', () => {
  it('share one clamped address and stay out of the code map', () => {
    const scripts = new ScriptTable();
    const codeMap = new CodeMap();
    const walker = new CallSiteWalker(scripts, codeMap);
    const seen = new Map<string, { address: number; name: string | undefined }>();

    function record(label: string): void {
      const out = new Float64Array(1);
      const names: FrameNames = [undefined];
      walker.walk(out, record, names);
      seen.set(label, { address: out[0], name: names[0] });
    }
    runBundle(record);

    const parse = toCodeAddress(seen.get('parse')?.address ?? Number.NaN);
    const draw = toCodeAddress(seen.get('draw')?.address ?? Number.NaN);
    expect(parse).toBeDefined();
    expect(draw).toBe(parse);
    expect(seen.get('parse')?.name).toBe('parse');
    expect(seen.get('draw')?.name).toBe('draw');
    if (draw === undefined) return;

    expect(decodeAddress(draw).column).toBe(LAST_COLUMN);
    expect(codeMap.lookup(draw)).toBeUndefined();

    const buffer = new SymbolBuffer(128);
    const symbolizer = new CodeMapSymbolizer(scripts, codeMap, new SourceMapRegistry(silentLogger()));
    expect(symbolizer.symbolize(draw, buffer)).toBe(true);
    expect(buffer.text()).toBe(`<anonymous> (${BUNDLE}:1:${LAST_COLUMN})`);
  });

  it('still carry their own names through a trace', () => {
    const backtracer = createV8Backtracer();
    const symbols = new Map<string, string | undefined>();

    function record(label: string): void {
      backtracer.traceBelow(record, (frame, index) => {
        if (index === 1) symbols.set(label, frame.symbol?.raw());
        return false;
      });
    }
    runBundle(record);

    expect(symbols.get('parse')).toBe(`parse (${BUNDLE}:1:${LAST_COLUMN})`);
    expect(symbols.get('draw')).toBe(`draw (${BUNDLE}:1:${LAST_COLUMN})`);
  });
});
