// Crash path API
export {
  trace,
  printBacktrace,
  handleSignal,
  installFatalSignalHandlers,
  loadSourceMap,
  panic,
} from './faultline.js';

// Backtrace building blocks
export type { CodeAddress, CodePosition } from './backtrace/addresses.js';
export { encodeAddress, decodeAddress, formatAddress } from './backtrace/addresses.js';
export type { Frame, FrameVisitor } from './backtrace/frame.js';
export { FrameSymbol, SymbolBuffer } from './backtrace/symbol.js';
export type { StackEntry } from './backtrace/call-sites.js';
export type { StackWalker } from './backtrace/stack-walkers.js';
export { CallSiteWalker, TextualStackWalker, parseStackLine } from './backtrace/stack-walkers.js';
export { StackArena, captureStack, DEFAULT_MAX_STACK_DEPTH } from './backtrace/capture.js';
export type { Symbolizer } from './backtrace/symbolizer.js';
export { CodeMapSymbolizer } from './backtrace/symbolizer.js';
export type { OriginalPosition } from './backtrace/source-maps.js';
export { SourceMapRegistry } from './backtrace/source-maps.js';
export { ScriptTable } from './backtrace/script-table.js';
export { CodeMap } from './backtrace/code-map.js';
export { Backtracer } from './backtrace/backtracer.js';
export { SourceLocation } from './backtrace/source-location.js';

// Reporting + signals
export { CrashReporter, formatFrameLine } from './reporting/crash-reporter.js';
export type { SignalDisposition, InstalledSignal } from './signals/signal-router.js';
export { SignalRouter } from './signals/signal-router.js';
export type { FatalSignal } from './signals/fatal-signals.js';
export { FATAL_SIGNALS } from './signals/fatal-signals.js';

// Errors + config
export type { AppError, SignalError } from './errors/index.js';
export { formatAppError } from './errors/index.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export { loadConfig } from './config/app-config.js';

// Runtime ports (for custom adapters)
export type { ProcessSignals, SignalListener } from './runtime/ports/process-signals.js';
export type { ProcessTerminator, ExitCode } from './runtime/ports/process-terminator.js';
export type { ErrorSink } from './runtime/ports/error-sink.js';

// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
