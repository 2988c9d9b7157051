import type { Brand } from '../runtime/brand.js';

/**
 * A code address: one V8 code position packed into a safe integer.
 *
 *   address = (slot * 2^20 + line) * 2^20 + column
 *
 * `slot` indexes the script table (0 = script without a name), `line` and
 * `column` are V8's 1-based values. Packing keeps capture buffers as plain
 * `Float64Array`s and lets reports print positions as hex addresses.
 */
export type CodeAddress = Brand<number, 'CodeAddress'>;

export interface CodePosition {
  readonly slot: number;
  readonly line: number;
  readonly column: number;
}

const FIELD_SPAN = 2 ** 20;
const FIELD_MAX = FIELD_SPAN - 1;

/** Highest script slot that still encodes below 2^53. */
export const MAX_SCRIPT_SLOT = 2 ** 13 - 1;

/** Marker stored in capture buffers for a level with no position (native frames). */
export const NO_ADDRESS = Number.NaN;

export function encodeAddress(position: CodePosition): CodeAddress {
  const slot = clamp(position.slot, MAX_SCRIPT_SLOT);
  const line = clamp(position.line, FIELD_MAX);
  const column = clamp(position.column, FIELD_MAX);
  return ((slot * FIELD_SPAN + line) * FIELD_SPAN + column) as CodeAddress;
}

/**
 * True when every field fits without clamping. Only such addresses identify a
 * single code position; clamped ones may be shared by unrelated code.
 */
export function fitsAddress(position: CodePosition): boolean {
  return (
    inRange(position.slot, MAX_SCRIPT_SLOT) &&
    inRange(position.line, FIELD_MAX) &&
    inRange(position.column, FIELD_MAX)
  );
}

export function decodeAddress(address: CodeAddress): CodePosition {
  const column = address % FIELD_SPAN;
  const rest = (address - column) / FIELD_SPAN;
  const line = rest % FIELD_SPAN;
  const slot = (rest - line) / FIELD_SPAN;
  return { slot, line, column };
}

/**
 * Narrow a raw buffer cell to an address. NaN, negatives and fractions are "no address".
 */
export function toCodeAddress(raw: number): CodeAddress | undefined {
  return Number.isSafeInteger(raw) && raw >= 0 ? (raw as CodeAddress) : undefined;
}

export function formatAddress(address: CodeAddress): string {
  return `0x${address.toString(16)}`;
}

function inRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

function clamp(value: number, max: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(Math.trunc(value), max);
}
