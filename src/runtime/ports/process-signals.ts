import type { Result } from 'neverthrow';

/**
 * Listener shape Node uses for signal events.
 */
export type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Port over the process's signal listener table.
 * This abstracts `process.on`/`process.listeners` so routing logic stays testable without real signals.
 */
export interface ProcessSignals {
  /** Listeners currently installed for `signal`, in installation order. */
  listeners(signal: NodeJS.Signals): readonly SignalListener[];

  /**
   * Replace every listener for `signal` with `listeners`.
   * Returns the listeners that were removed; passing them to `replace` again restores them.
   * On failure the previous listeners are back in place.
   */
  replace(signal: NodeJS.Signals, listeners: readonly SignalListener[]): Result<readonly SignalListener[], unknown>;
}
