import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { SignalError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { CrashReporter } from '../reporting/crash-reporter.js';
import type { ProcessSignals, SignalListener } from '../runtime/ports/process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { FatalSignal } from './fatal-signals.js';
import { FATAL_SIGNAL_DIAGNOSTICS, toFatalSignal } from './fatal-signals.js';

/**
 * What was installed for a signal before `handleSignal` replaced it.
 * Reinstall `listeners` through the same ProcessSignals to restore it.
 */
export type SignalDisposition =
  | { readonly kind: 'default' }
  | { readonly kind: 'handler'; readonly listeners: readonly SignalListener[] };

export interface InstalledSignal {
  readonly signal: FatalSignal;
  readonly previous: SignalDisposition;
}

export interface SignalRouterDeps {
  readonly signals: ProcessSignals;
  readonly reporter: CrashReporter;
  readonly terminator: ProcessTerminator;
  readonly logger: Logger;
}

/**
 * Routes the fatal signals to a crash report followed by abort.
 *
 * Per signal: unregistered until the first successful `handleSignal`, registered
 * from then on. There is no unregister; a later `handleSignal` (or reinstalling a
 * returned disposition) overwrites.
 */
export class SignalRouter {
  /** The one listener this router installs for every fatal signal. */
  readonly fatalSignalHandler: SignalListener = (signal) => this.onFatalSignal(signal);

  constructor(private readonly deps: SignalRouterDeps) {}

  /**
   * Install the fatal handler for `signal`, replacing whatever was there.
   *
   * The handler only sees signals raised with kill(2) or `process.kill`. A real
   * SIGSEGV, SIGILL or SIGFPE from native code can hang the process once a JS
   * listener is installed: libuv's handler returns to the faulting instruction,
   * which faults again before JavaScript ever runs.
   */
  handleSignal(signal: number | string): Result<SignalDisposition, SignalError> {
    const fatal = toFatalSignal(signal);
    if (fatal === undefined) {
      return err(Err.unknownSignal(signal));
    }

    const replaced = this.deps.signals.replace(fatal, [this.fatalSignalHandler]);
    if (replaced.isErr()) {
      this.deps.logger.warn({ signal: fatal, err: replaced.error }, 'Fatal signal handler registration rejected');
      return err(Err.signalRegistration(fatal, replaced.error));
    }

    const previous = replaced.value;
    this.deps.logger.debug({ signal: fatal, replaced: previous.length }, 'Installed fatal signal handler');
    return ok(previous.length === 0 ? { kind: 'default' } : { kind: 'handler', listeners: previous });
  }

  /**
   * `handleSignal` for each signal, stopping at the first failure.
   */
  installAll(signals: readonly FatalSignal[]): Result<readonly InstalledSignal[], SignalError> {
    const installed: InstalledSignal[] = [];
    for (const signal of signals) {
      const result = this.handleSignal(signal);
      if (result.isErr()) return err(result.error);
      installed.push({ signal, previous: result.value });
    }
    return ok(installed);
  }

  private onFatalSignal(signal: NodeJS.Signals): never {
    const fatal = toFatalSignal(signal);
    this.deps.reporter.writeDiagnostic(
      fatal ? FATAL_SIGNAL_DIAGNOSTICS[fatal] : `Received '${signal}' signal.`
    );
    this.deps.reporter.printBacktrace();
    return this.deps.terminator.terminate({ kind: 'abort' });
  }
}
