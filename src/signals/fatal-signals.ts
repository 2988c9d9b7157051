import { constants } from 'os';

export type FatalSignal = 'SIGSEGV' | 'SIGILL' | 'SIGFPE';

export const FATAL_SIGNALS: readonly FatalSignal[] = ['SIGSEGV', 'SIGILL', 'SIGFPE'];

/**
 * The line printed before the backtrace when a fatal signal arrives.
 */
export const FATAL_SIGNAL_DIAGNOSTICS: Readonly<Record<FatalSignal, string>> = {
  SIGSEGV: "Received 'SIGSEGV' signal. Invalid memory access occurred (segmentation fault).",
  SIGILL: "Received 'SIGILL' signal. Invalid program image (illegal or invalid instruction).",
  SIGFPE: "Received 'SIGFPE' signal. Erroneous arithmetic operation (e.g. integer division by zero).",
};

export function isFatalSignal(value: string): value is FatalSignal {
  return FATAL_SIGNALS.some((signal) => signal === value);
}

/**
 * Map a signal number or name onto the fatal set. Numbers follow this platform's
 * `os.constants.signals`.
 */
export function toFatalSignal(signal: number | string): FatalSignal | undefined {
  if (typeof signal === 'string') {
    return isFatalSignal(signal) ? signal : undefined;
  }
  return FATAL_SIGNALS.find((name) => constants.signals[name] === signal);
}
