import { constants } from 'os';
import { describe, expect, it } from 'vitest';
import { CrashReporter } from '../../../src/reporting/crash-reporter.js';
import { InMemoryProcessSignals } from '../../../src/runtime/adapters/in-memory-process-signals.js';
import type { InMemoryProcessSignalsOptions } from '../../../src/runtime/adapters/in-memory-process-signals.js';
import { MemoryErrorSink } from '../../../src/runtime/adapters/memory-error-sink.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';
import type { SignalListener } from '../../../src/runtime/ports/process-signals.js';
import { FATAL_SIGNALS } from '../../../src/signals/fatal-signals.js';
import { SignalRouter } from '../../../src/signals/signal-router.js';
import { createFakeBacktracer } from '../../helpers/backtracers.js';
import { silentLogger } from '../../helpers/logging.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function createRouter(options: InMemoryProcessSignalsOptions = {}) {
  const signals = new InMemoryProcessSignals(options);
  const sink = new MemoryErrorSink();
  const terminator = new ThrowingProcessTerminator();
  const { backtracer } = createFakeBacktracer({ ips: [0x10], sps: [0x30], names: new Map([[0x10, 'faultingCode']]) });
  const router = new SignalRouter({
    signals,
    reporter: new CrashReporter(backtracer, sink),
    terminator,
    logger: silentLogger(),
  });
  return { router, signals, sink, terminator };
}

const foreign: SignalListener = () => {};

describe('SignalRouter', () => {
  describe('handleSignal', () => {
    it.each(FATAL_SIGNALS)('installs the fatal handler for %s by number', (signal) => {
      const { router, signals } = createRouter();

      const previous = expectOk(router.handleSignal(constants.signals[signal]), 'handleSignal');

      expect(previous).toEqual({ kind: 'default' });
      expect(signals.listeners(signal)).toEqual([router.fatalSignalHandler]);
    });

    it('accepts signal names', () => {
      const { router, signals } = createRouter();

      expect(expectOk(router.handleSignal('SIGFPE'), 'handleSignal')).toEqual({ kind: 'default' });
      expect(signals.listeners('SIGFPE')).toEqual([router.fatalSignalHandler]);
    });

    it('returns its own handler as the previous one on a second call', () => {
      const { router, signals } = createRouter();
      expectOk(router.handleSignal('SIGSEGV'), 'first handleSignal');

      const previous = expectOk(router.handleSignal('SIGSEGV'), 'second handleSignal');

      expect(previous).toEqual({ kind: 'handler', listeners: [router.fatalSignalHandler] });
      expect(signals.listeners('SIGSEGV')).toEqual([router.fatalSignalHandler]);
    });

    it('replaces foreign listeners and hands them back for restoring', () => {
      const { router, signals } = createRouter();
      signals.add('SIGILL', foreign);

      const previous = expectOk(router.handleSignal('SIGILL'), 'handleSignal');

      expect(previous).toEqual({ kind: 'handler', listeners: [foreign] });
      expect(signals.listeners('SIGILL')).toEqual([router.fatalSignalHandler]);

      if (previous.kind === 'handler') expectOk(signals.replace('SIGILL', previous.listeners), 'restore');
      expect(signals.listeners('SIGILL')).toEqual([foreign]);
    });

    it.each([constants.signals.SIGTERM, 'SIGTERM', 9999])('rejects %s as Unknown and installs nothing', (signal) => {
      const { router, signals } = createRouter();
      signals.add('SIGTERM', foreign);

      const error = expectErr(router.handleSignal(signal), 'handleSignal');

      expect(error._tag).toBe('Unknown');
      expect(error.signal).toBe(signal);
      expect(signals.listeners('SIGTERM')).toEqual([foreign]);
    });

    it('reports a refused registration as SigErr and keeps the previous listeners', () => {
      const { router, signals } = createRouter({ rejecting: ['SIGILL'] });
      signals.add('SIGILL', foreign);

      const error = expectErr(router.handleSignal('SIGILL'), 'handleSignal');

      expect(error).toMatchObject({
        _tag: 'SigErr',
        signal: 'SIGILL',
        message: 'Registering a handler for SIGILL was rejected',
      });
      expect(signals.listeners('SIGILL')).toEqual([foreign]);
    });
  });

  describe('installAll', () => {
    it('installs every listed signal', () => {
      const { router, signals } = createRouter();

      const installed = expectOk(router.installAll(FATAL_SIGNALS), 'installAll');

      expect(installed).toEqual([
        { signal: 'SIGSEGV', previous: { kind: 'default' } },
        { signal: 'SIGILL', previous: { kind: 'default' } },
        { signal: 'SIGFPE', previous: { kind: 'default' } },
      ]);
      for (const signal of FATAL_SIGNALS) {
        expect(signals.listeners(signal)).toEqual([router.fatalSignalHandler]);
      }
    });

    it('stops at the first refused signal', () => {
      const { router, signals } = createRouter({ rejecting: ['SIGILL'] });

      const error = expectErr(router.installAll(FATAL_SIGNALS), 'installAll');

      expect(error._tag).toBe('SigErr');
      expect(signals.listeners('SIGSEGV')).toEqual([router.fatalSignalHandler]);
      expect(signals.listeners('SIGFPE')).toEqual([]);
    });
  });

  describe('on delivery', () => {
    it('writes the diagnostic and the backtrace, then aborts', () => {
      const { router, signals, sink, terminator } = createRouter();
      expectOk(router.handleSignal('SIGSEGV'), 'handleSignal');

      expect(() => signals.emit('SIGSEGV')).toThrow('[ProcessTerminator] terminate(abort)');

      expect(terminator.requested).toEqual([{ kind: 'abort' }]);
      expect(sink.text()).toBe(
        "\n\nReceived 'SIGSEGV' signal. Invalid memory access occurred (segmentation fault)." +
          '\n\nBacktrace:\nip: Instruction Pointer,  sp: Stack Pointer\n\n' +
          '#1\t\tfaultingCode\t (ip: 0x10, sp: 0x30)\n' +
          '\n'
      );
    });

    it.each([
      ['SIGILL', "Received 'SIGILL' signal. Invalid program image (illegal or invalid instruction)."],
      ['SIGFPE', "Received 'SIGFPE' signal. Erroneous arithmetic operation (e.g. integer division by zero)."],
    ] as const)('names %s in the diagnostic', (signal, diagnostic) => {
      const { router, signals, sink } = createRouter();
      expectOk(router.handleSignal(signal), 'handleSignal');

      expect(() => signals.emit(signal)).toThrow('[ProcessTerminator] terminate(abort)');

      expect(sink.text().startsWith(`\n\n${diagnostic}\n\nBacktrace:`)).toBe(true);
    });
  });
});
