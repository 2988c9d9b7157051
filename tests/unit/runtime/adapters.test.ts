import { describe, expect, it } from 'vitest';
import { InMemoryProcessSignals } from '../../../src/runtime/adapters/in-memory-process-signals.js';
import { MemoryErrorSink } from '../../../src/runtime/adapters/memory-error-sink.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';
import type { SignalListener } from '../../../src/runtime/ports/process-signals.js';

describe('InMemoryProcessSignals', () => {
  it('delivers emitted signals to every listener', () => {
    const signals = new InMemoryProcessSignals();
    const received: string[] = [];
    const first: SignalListener = (signal) => received.push(`first:${signal}`);
    const second: SignalListener = (signal) => received.push(`second:${signal}`);

    signals.add('SIGFPE', first);
    signals.add('SIGFPE', second);
    signals.emit('SIGFPE');

    expect(received).toEqual(['first:SIGFPE', 'second:SIGFPE']);
  });

  it('refuses registration for rejecting signals without changing them', () => {
    const signals = new InMemoryProcessSignals({ rejecting: ['SIGSEGV'] });
    const existing: SignalListener = () => {};
    signals.add('SIGSEGV', existing);

    expect(signals.replace('SIGSEGV', [() => {}]).isErr()).toBe(true);
    expect(signals.listeners('SIGSEGV')).toEqual([existing]);
  });
});

describe('ThrowingProcessTerminator', () => {
  it('records the request and throws instead of exiting', () => {
    const terminator = new ThrowingProcessTerminator();

    expect(() => terminator.terminate({ kind: 'failure' })).toThrow('[ProcessTerminator] terminate(failure)');
    expect(terminator.requested).toEqual([{ kind: 'failure' }]);
  });
});

describe('MemoryErrorSink', () => {
  it('joins writes and splits lines', () => {
    const sink = new MemoryErrorSink();

    sink.write('\n\nfirst');
    sink.write(' line\nsecond');

    expect(sink.text()).toBe('\n\nfirst line\nsecond');
    expect(sink.lines()).toEqual(['', '', 'first line', 'second']);

    sink.clear();
    expect(sink.text()).toBe('');
  });
});
