import type { CodeAddress } from './addresses.js';
import { decodeAddress } from './addresses.js';
import type { CodeMap } from './code-map.js';
import type { ScriptTable } from './script-table.js';
import type { SourceMapRegistry } from './source-maps.js';
import type { SymbolBuffer } from './symbol.js';

/**
 * Best-effort address -> name translation into a caller-owned buffer.
 * `name` is what the capture itself saw at this level, when it saw anything.
 * Returns false when nothing useful could be written; the caller treats that as
 * "no symbol" for this frame and carries on.
 */
export interface Symbolizer {
  symbolize(address: CodeAddress, out: SymbolBuffer, name?: string): boolean;
}

/**
 * Takes the capture's own name first, then the code map. Positions come from the
 * script table, mapped through a preloaded source map when the script has one:
 *
 *   Worker.run (src/worker.ts:42:7)
 */
export class CodeMapSymbolizer implements Symbolizer {
  constructor(
    private readonly scripts: ScriptTable,
    private readonly codeMap: CodeMap,
    private readonly sourceMaps: SourceMapRegistry,
  ) {}

  symbolize(address: CodeAddress, out: SymbolBuffer, captured?: string): boolean {
    const { slot, line, column } = decodeAddress(address);
    const name = captured ?? this.codeMap.lookup(address);
    const script = this.scripts.nameOf(slot);

    if (name === undefined && script === undefined) return false;

    out.write(name ?? '<anonymous>');
    if (script === undefined) return true;

    const original = this.sourceMaps.lookup(script, line, column);
    if (original) {
      out.write(` (${original.source}:${original.line}:${original.column})`);
    } else {
      out.write(` (${script}:${line}:${column})`);
    }
    return true;
  }
}
