import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ProcessSignals, SignalListener } from '../ports/process-signals.js';

export interface InMemoryProcessSignalsOptions {
  /** Signals whose registration is refused, the way the OS refuses SIGKILL. */
  readonly rejecting?: readonly NodeJS.Signals[];
}

/**
 * In-memory ProcessSignals implementation.
 * Used in test mode: nothing reaches the real process, and `emit` stands in for delivery.
 */
export class InMemoryProcessSignals implements ProcessSignals {
  private readonly table = new Map<NodeJS.Signals, readonly SignalListener[]>();
  private readonly rejecting: ReadonlySet<NodeJS.Signals>;

  constructor(options: InMemoryProcessSignalsOptions = {}) {
    this.rejecting = new Set(options.rejecting ?? []);
  }

  listeners(signal: NodeJS.Signals): readonly SignalListener[] {
    return this.table.get(signal) ?? [];
  }

  replace(signal: NodeJS.Signals, listeners: readonly SignalListener[]): Result<readonly SignalListener[], unknown> {
    if (this.rejecting.has(signal)) {
      return err(new Error(`registration refused for ${signal}`));
    }
    const previous = this.listeners(signal);
    this.table.set(signal, [...listeners]);
    return ok(previous);
  }

  /** Install an extra listener next to the existing ones (a foreign library's handler). */
  add(signal: NodeJS.Signals, listener: SignalListener): void {
    this.table.set(signal, [...this.listeners(signal), listener]);
  }

  emit(signal: NodeJS.Signals): void {
    for (const listener of this.listeners(signal)) {
      listener(signal);
    }
  }
}
