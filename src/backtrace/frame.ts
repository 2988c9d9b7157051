import type { CodeAddress } from './addresses.js';
import type { FrameSymbol } from './symbol.js';

/**
 * One stack level, built fresh for a single visitor call.
 *
 * `ip` comes from the call-site walker, `sp` from the frame walker; either is
 * absent for levels the walker reported without a position.
 */
export interface Frame {
  readonly ip?: CodeAddress;
  readonly sp?: CodeAddress;
  readonly symbol?: FrameSymbol;
}

/**
 * Receives frames outermost first. `displayIndex` counts down to 1, the level
 * nearest the trace call. Return `true` to stop the walk.
 */
export type FrameVisitor = (frame: Frame, displayIndex: number) => boolean;
