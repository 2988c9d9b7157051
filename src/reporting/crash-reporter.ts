import { formatAddress } from '../backtrace/addresses.js';
import type { Backtracer } from '../backtrace/backtracer.js';
import type { StackEntry } from '../backtrace/call-sites.js';
import type { Frame } from '../backtrace/frame.js';
import type { SourceLocation } from '../backtrace/source-location.js';
import type { ErrorSink } from '../runtime/ports/error-sink.js';

export const UNKNOWN_MARKER = '<unknown>';

export const BACKTRACE_PREAMBLE = '\n\nBacktrace:\nip: Instruction Pointer,  sp: Stack Pointer\n\n';

/**
 * One report line: `#3\t\tWorker.run (src/worker.ts:42:7)\t (ip: 0x..., sp: 0x...)`.
 */
export function formatFrameLine(frame: Frame, displayIndex: number): string {
  const symbol = frame.symbol?.raw() ?? UNKNOWN_MARKER;
  const ip = frame.ip === undefined ? UNKNOWN_MARKER : formatAddress(frame.ip);
  const sp = frame.sp === undefined ? UNKNOWN_MARKER : formatAddress(frame.sp);
  return `#${displayIndex}\t\t${symbol}\t (ip: ${ip}, sp: ${sp})\n`;
}

/**
 * Writes human-readable crash reports to the error sink.
 *
 * Every line goes out with its own synchronous write: the caller may abort the
 * process as soon as this returns.
 */
export class CrashReporter {
  constructor(
    private readonly backtracer: Backtracer,
    private readonly sink: ErrorSink,
  ) {}

  /**
   * Preamble plus one line per frame below the caller. Returns the frame count.
   */
  printBacktrace(entry: StackEntry = CrashReporter.prototype.printBacktrace): number {
    this.sink.write(BACKTRACE_PREAMBLE);
    const depth = this.backtracer.traceBelow(entry, (frame, displayIndex) => {
      this.sink.write(formatFrameLine(frame, displayIndex));
      return false;
    });
    this.sink.write('\n');
    return depth;
  }

  /** One diagnostic line, set off from whatever the program printed before. */
  writeDiagnostic(line: string): void {
    this.sink.write(`\n\n${line}`);
  }

  /**
   * Panic line with the failing call site, then the backtrace below `entry`.
   */
  reportPanic(
    message: string,
    location: SourceLocation,
    entry: StackEntry = CrashReporter.prototype.reportPanic,
  ): number {
    this.writeDiagnostic(`panic: ${message}\n  at ${location.toString()}`);
    return this.printBacktrace(entry);
  }
}
