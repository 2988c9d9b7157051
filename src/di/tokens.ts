/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // BACKTRACE (capture + symbolization)
  // ═══════════════════════════════════════════════════════════════════
  Backtrace: {
    /** Interned script names shared by both walkers and the symbolizer */
    ScriptTable: Symbol('Backtrace.ScriptTable'),
    /** Address -> function name table filled by the call-site walker */
    CodeMap: Symbol('Backtrace.CodeMap'),
    /** Preloaded source maps */
    SourceMaps: Symbol('Backtrace.SourceMaps'),
    /** Address -> symbol text */
    Symbolizer: Symbol('Backtrace.Symbolizer'),
    /** Frame sequence producer */
    Tracer: Symbol('Backtrace.Tracer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CRASH PATH (reporting + signal routing)
  // ═══════════════════════════════════════════════════════════════════
  Crash: {
    /** Unbuffered error stream */
    ErrorSink: Symbol('Crash.ErrorSink'),
    /** Backtrace/panic report writer */
    Reporter: Symbol('Crash.Reporter'),
    /** Fatal signal router */
    SignalRouter: Symbol('Crash.SignalRouter'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** pino logger factory */
    LoggerFactory: Symbol('Infra.LoggerFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Whether real signal handlers may be installed */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal listener table */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Process terminator */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete library configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;
