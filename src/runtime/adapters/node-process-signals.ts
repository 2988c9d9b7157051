import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ProcessSignals, SignalListener } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 *
 * Reads go through `process.rawListeners`, so `once` listeners keep their wrapper.
 * Listeners installed through `replace` read back as themselves. Any other raw
 * function is wrapped once and cached; handing a wrapper back to `replace`
 * reinstalls the raw function itself, so `process.removeListener` with the original
 * still finds it and a `once` listener still fires a single time.
 */
export class NodeProcessSignals implements ProcessSignals {
  private readonly wrappers = new WeakMap<Function, SignalListener>();
  private readonly originals = new WeakMap<SignalListener, Function>();

  listeners(signal: NodeJS.Signals): readonly SignalListener[] {
    return process.rawListeners(signal).map((raw) => this.adopt(raw));
  }

  replace(signal: NodeJS.Signals, listeners: readonly SignalListener[]): Result<readonly SignalListener[], unknown> {
    const previous = process.rawListeners(signal);
    process.removeAllListeners(signal);

    try {
      for (const listener of listeners) {
        const raw = this.originals.get(listener);
        if (raw === undefined) this.wrappers.set(listener, listener);
        this.install(signal, raw ?? listener);
      }
    } catch (error) {
      process.removeAllListeners(signal);
      for (const raw of previous) {
        this.install(signal, raw);
      }
      return err(error);
    }

    return ok(previous.map((raw) => this.adopt(raw)));
  }

  private install(signal: NodeJS.Signals, raw: Function): void {
    Reflect.apply(process.on, process, [signal, raw]);
  }

  private adopt(raw: Function): SignalListener {
    const known = this.wrappers.get(raw);
    if (known) return known;

    const wrapper: SignalListener = (signal) => {
      Reflect.apply(raw, process, [signal]);
    };
    this.wrappers.set(raw, wrapper);
    this.originals.set(wrapper, raw);
    return wrapper;
  }
}
