import pino from 'pino';
import type { ErrorSink } from '../ports/error-sink.js';

/**
 * ErrorSink over fd 2.
 * Same synchronous pino destination the loggers use: every write is a blocking
 * `write(2)`, nothing is buffered across calls.
 */
export class StderrErrorSink implements ErrorSink {
  private readonly destination = pino.destination({ dest: 2, sync: true });

  write(text: string): void {
    this.destination.write(text);
  }
}
