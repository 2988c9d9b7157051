import type { ErrorSink } from '../ports/error-sink.js';

/**
 * Captures crash output in memory (test mode).
 */
export class MemoryErrorSink implements ErrorSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  text(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    return this.text().split('\n');
  }

  clear(): void {
    this.chunks.length = 0;
  }
}
