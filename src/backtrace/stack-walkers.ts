import { encodeAddress, fitsAddress, NO_ADDRESS } from './addresses.js';
import type { CodeMap } from './code-map.js';
import type { ScriptTable } from './script-table.js';
import type { StackEntry } from './call-sites.js';
import { captureCallSites, captureStackText, describeCallSite } from './call-sites.js';

/** Per-level function names of one capture, parallel to the address buffer. */
export type FrameNames = (string | undefined)[];

/**
 * One stack-walking facility.
 *
 * `walk` fills `out` innermost first with the addresses of the frames below
 * `entry` (NaN for a level without a position) and returns how many levels it
 * wrote, never more than `out.length`. Walkers that know function names write
 * them into `names` at the same index.
 */
export interface StackWalker {
  walk(out: Float64Array, entry: StackEntry, names?: FrameNames): number;
}

/**
 * Walks V8's structured call sites. Writes instruction addresses and each frame's
 * display name. Names also go into the code map, but only for addresses that
 * stand for exactly one position: a clamped column or a script that found the
 * script table full would share its address with unrelated code.
 */
export class CallSiteWalker implements StackWalker {
  constructor(
    private readonly scripts: ScriptTable,
    private readonly codeMap: CodeMap,
  ) {}

  walk(out: Float64Array, entry: StackEntry, names?: FrameNames): number {
    const sites = captureCallSites(out.length, entry);
    let depth = 0;

    for (const site of sites) {
      if (depth >= out.length) break;
      const line = site.getLineNumber();
      const column = site.getColumnNumber();

      if (line === null || column === null) {
        out[depth++] = NO_ADDRESS;
        continue;
      }

      const script = site.getFileName() || undefined;
      const position = { slot: this.scripts.intern(script), line, column };
      const address = encodeAddress(position);
      const name = describeCallSite(site);

      if (names) names[depth] = name;
      out[depth++] = address;

      const overflowed = script !== undefined && position.slot === 0;
      if (name && !overflowed && fitsAddress(position)) {
        this.codeMap.record(address, name);
      }
    }

    return depth;
  }
}

export interface ParsedStackLine {
  readonly name?: string;
  readonly script?: string;
  readonly line?: number;
  readonly column?: number;
}

const FRAME_PREFIX = /^\s*at\s+/;
const LOCATION = /^(.*):(\d+):(\d+)$/;

/**
 * Parse one line of V8's formatted stack.
 *
 *   at fn (/path/file.js:10:5)
 *   at /path/file.js:10:5
 *   at async fn (file:///path/file.mjs:3:1)
 *   at Array.map (<anonymous>)
 *
 * Returns undefined for lines that are not frames (the error header, message lines).
 */
export function parseStackLine(text: string): ParsedStackLine | undefined {
  if (!FRAME_PREFIX.test(text)) return undefined;
  const body = text.replace(FRAME_PREFIX, '').trim();

  const open = body.endsWith(')') ? body.indexOf(' (') : -1;
  const name = open === -1 ? undefined : body.slice(0, open);
  const where = open === -1 ? body : body.slice(open + 2, -1);

  // eval frames nest the eval origin: "eval at f (file:1:2), <anonymous>:1:1"
  const outermost = where.includes(', ') ? where.slice(where.lastIndexOf(', ') + 2) : where;
  const match = LOCATION.exec(outermost);

  if (!match) {
    return name === undefined ? { name: body } : { name };
  }

  const [, script, line, column] = match;
  return {
    name,
    script: script === '<anonymous>' ? undefined : script,
    line: Number(line),
    column: Number(column),
  };
}

/**
 * Walks the formatted stack text. Independent of the call-site walker: different
 * V8 entry point, different representation, its own depth.
 */
export class TextualStackWalker implements StackWalker {
  constructor(private readonly scripts: ScriptTable) {}

  walk(out: Float64Array, entry: StackEntry): number {
    const text = captureStackText(out.length, entry);
    let depth = 0;

    for (const raw of text.split('\n')) {
      if (depth >= out.length) break;
      const frame = parseStackLine(raw);
      if (!frame) continue;

      out[depth++] =
        frame.line === undefined || frame.column === undefined
          ? NO_ADDRESS
          : encodeAddress({
              slot: this.scripts.intern(frame.script),
              line: frame.line,
              column: frame.column,
            });
    }

    return depth;
  }
}
