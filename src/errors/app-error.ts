import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * Requested signal is outside the fatal set (SIGSEGV, SIGILL, SIGFPE). Nothing was installed.
 */
export type UnknownSignalError = Readonly<{
  readonly _tag: 'Unknown';
  readonly signal: number | string;
  readonly message: string;
}>;

/**
 * The process refused the handler registration. The previous listeners are still in place.
 */
export type SignalRegistrationError = Readonly<{
  readonly _tag: 'SigErr';
  readonly signal: NodeJS.Signals;
  readonly message: string;
  readonly cause: unknown;
}>;

export type SignalError = UnknownSignalError | SignalRegistrationError;

export type SourceMapLoadFailedError = Readonly<{
  readonly _tag: 'SourceMapLoadFailed';
  readonly script: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type AppError = ConfigInvalidError | SignalError | SourceMapLoadFailedError;

/**
 * Branded error type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
