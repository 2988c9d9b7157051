import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  SignalRegistrationError,
  SourceMapLoadFailedError,
  UnknownSignalError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  unknownSignal: (signal: number | string): UnknownSignalError => ({
    _tag: 'Unknown',
    signal,
    message: `Signal ${signal} is not a supported fatal signal (SIGSEGV, SIGILL, SIGFPE)`,
  }),

  signalRegistration: (signal: NodeJS.Signals, cause: unknown): SignalRegistrationError => ({
    _tag: 'SigErr',
    signal,
    message: `Registering a handler for ${signal} was rejected`,
    cause,
  }),

  sourceMapLoadFailed: (script: string, message: string, cause?: unknown): SourceMapLoadFailedError => ({
    _tag: 'SourceMapLoadFailed',
    script,
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
