import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { InMemoryProcessSignals } from '../runtime/adapters/in-memory-process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ErrorSink } from '../runtime/ports/error-sink.js';
import { StderrErrorSink } from '../runtime/adapters/stderr-error-sink.js';
import { MemoryErrorSink } from '../runtime/adapters/memory-error-sink.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import { ScriptTable } from '../backtrace/script-table.js';
import { CodeMap } from '../backtrace/code-map.js';
import { SourceMapRegistry } from '../backtrace/source-maps.js';
import type { Symbolizer } from '../backtrace/symbolizer.js';
import { CodeMapSymbolizer } from '../backtrace/symbolizer.js';
import { CallSiteWalker, TextualStackWalker } from '../backtrace/stack-walkers.js';
import { Backtracer } from '../backtrace/backtracer.js';
import { CrashReporter } from '../reporting/crash-reporter.js';
import { SignalRouter } from '../signals/signal-router.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment to read configuration from. Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

/**
 * Tests may register any runtime port before initialization; those registrations win.
 */
function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  if (!container.isRegistered(DI.Runtime.ProcessLifecyclePolicy)) {
    container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, {
      useValue: toProcessLifecyclePolicy(mode),
    });
  }

  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const policy = container.resolve<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy);
    const signals: ProcessSignals =
      policy.kind === 'no_signal_handlers' ? new InMemoryProcessSignals() : new NodeProcessSignals();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }

  if (!container.isRegistered(DI.Crash.ErrorSink)) {
    const sink: ErrorSink = mode.kind === 'test' ? new MemoryErrorSink() : new StderrErrorSink();
    container.register<ErrorSink>(DI.Crash.ErrorSink, { useValue: sink });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests may inject a validated config before initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: options.env ?? process.env });

  if (configResult.isErr()) {
    createBootstrapLogger('container').error({ issues: configResult.error.issues }, 'Invalid configuration');
    container.resolve<ErrorSink>(DI.Crash.ErrorSink).write(`${formatAppError(configResult.error)}\n`);
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerLogging(): void {
  if (container.isRegistered(DI.Infra.LoggerFactory)) return;
  container.register<ILoggerFactory>(DI.Infra.LoggerFactory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

/**
 * Dependency levels:
 * - Level 1: tables (ScriptTable, CodeMap, SourceMaps) - no deps
 * - Level 2: Symbolizer, Backtracer - depend on Level 1 + config
 * - Level 3: CrashReporter, SignalRouter - depend on Level 2 + runtime ports
 */
function registerBacktrace(): void {
  container.register(DI.Backtrace.ScriptTable, {
    useFactory: instanceCachingFactory(() => new ScriptTable()),
  });
  container.register(DI.Backtrace.CodeMap, {
    useFactory: instanceCachingFactory(() => new CodeMap()),
  });
  container.register(DI.Backtrace.SourceMaps, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const loggers = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
      return new SourceMapRegistry(loggers.create('SourceMaps'));
    }),
  });
  container.register(DI.Backtrace.Symbolizer, {
    useFactory: instanceCachingFactory((c: DependencyContainer): Symbolizer => {
      return new CodeMapSymbolizer(
        c.resolve<ScriptTable>(DI.Backtrace.ScriptTable),
        c.resolve<CodeMap>(DI.Backtrace.CodeMap),
        c.resolve<SourceMapRegistry>(DI.Backtrace.SourceMaps),
      );
    }),
  });
  container.register(DI.Backtrace.Tracer, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      const scripts = c.resolve<ScriptTable>(DI.Backtrace.ScriptTable);
      return new Backtracer({
        walkers: {
          instructions: new CallSiteWalker(scripts, c.resolve<CodeMap>(DI.Backtrace.CodeMap)),
          frames: new TextualStackWalker(scripts),
        },
        symbolizer: c.resolve<Symbolizer>(DI.Backtrace.Symbolizer),
        maxDepth: config.backtrace.maxDepth,
        symbolBufferSize: config.backtrace.symbolBufferSize,
      });
    }),
  });
}

function registerCrashPath(): void {
  container.register(DI.Crash.Reporter, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      return new CrashReporter(c.resolve<Backtracer>(DI.Backtrace.Tracer), c.resolve<ErrorSink>(DI.Crash.ErrorSink));
    }),
  });
  container.register(DI.Crash.SignalRouter, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      return new SignalRouter({
        signals: c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
        reporter: c.resolve<CrashReporter>(DI.Crash.Reporter),
        terminator: c.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
        logger: c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory).create('SignalRouter'),
      });
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Synchronous on purpose: the first `trace()` may happen inside a crash handler,
 * where nothing can be awaited. Idempotent.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerLogging();
  registerBacktrace();
  registerCrashPath();
  initialized = true;

  const mode = container.resolve<RuntimeMode>(DI.Runtime.Mode);
  container.resolve<ILoggerFactory>(DI.Infra.LoggerFactory).create('container').debug({ mode: mode.kind }, 'Container initialized');
}

/**
 * Resolve a token, initializing the container on first use.
 */
export function resolve<T>(token: symbol): T {
  if (!initialized) initializeContainer();
  return container.resolve<T>(token);
}

/**
 * Reset container (for testing). Source map consumers hold wasm memory and are released.
 */
export function resetContainer(): void {
  if (initialized) {
    container.resolve<SourceMapRegistry>(DI.Backtrace.SourceMaps).dispose();
  }
  container.reset();
  initialized = false;
}

// Export container for direct access when needed
export { container };
