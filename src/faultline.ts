import type { Result } from 'neverthrow';
import { DI } from './di/tokens.js';
import { resolve } from './di/container.js';
import type { Backtracer } from './backtrace/backtracer.js';
import type { FrameVisitor } from './backtrace/frame.js';
import { SourceLocation } from './backtrace/source-location.js';
import type { SourceMapLoadResult, SourceMapRegistry } from './backtrace/source-maps.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { SignalError } from './errors/app-error.js';
import type { CrashReporter } from './reporting/crash-reporter.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { InstalledSignal, SignalDisposition, SignalRouter } from './signals/signal-router.js';

/**
 * Walk the caller's stack, outermost frame first. See `Backtracer.trace`.
 */
export function trace(visitor: FrameVisitor): number {
  return resolve<Backtracer>(DI.Backtrace.Tracer).traceBelow(trace, visitor);
}

/**
 * Write the caller's backtrace to stderr. Returns the number of frames written.
 */
export function printBacktrace(): number {
  return resolve<CrashReporter>(DI.Crash.Reporter).printBacktrace(printBacktrace);
}

/**
 * Route a fatal signal (number or name) to a crash report followed by abort.
 *
 * Covers signals sent with kill(2) or `process.kill`. A genuine native fault with
 * this listener installed can hang the process instead of crashing it, since
 * libuv returns to the faulting instruction and JavaScript never runs.
 */
export function handleSignal(signal: number | string): Result<SignalDisposition, SignalError> {
  return resolve<SignalRouter>(DI.Crash.SignalRouter).handleSignal(signal);
}

/**
 * `handleSignal` for every signal listed in FAULTLINE_SIGNALS (all three by default).
 * The same caveat applies: only sent signals are reported, and a native fault
 * in this process may hang rather than abort.
 */
export function installFatalSignalHandlers(): Result<readonly InstalledSignal[], SignalError> {
  const config = resolve<ValidatedConfig>(DI.Config.App);
  return resolve<SignalRouter>(DI.Crash.SignalRouter).installAll(config.signals.install);
}

/**
 * Preload the source map of a script so crash reports show original positions.
 */
export function loadSourceMap(scriptPath: string): Promise<SourceMapLoadResult> {
  return resolve<SourceMapRegistry>(DI.Backtrace.SourceMaps).loadForScript(scriptPath);
}

/**
 * Report `message` at `location` (default: the caller of `panic`) with a backtrace,
 * then abort. For error-propagation libraries whose unwrap has nothing left to return.
 */
export function panic(message: string, location: SourceLocation = SourceLocation.callerOf(panic)): never {
  resolve<CrashReporter>(DI.Crash.Reporter).reportPanic(message, location, panic);
  const terminator = resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  return terminator.terminate({ kind: 'abort' });
}
