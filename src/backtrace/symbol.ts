const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const DEFAULT_SYMBOL_BUFFER_SIZE = 1024;

/**
 * Fixed-capacity, NUL-terminated UTF-8 buffer a symbolizer writes a name into.
 *
 * One buffer serves a whole trace. It is zeroed before every resolution attempt,
 * so a failed attempt can never expose the previous frame's text.
 */
export class SymbolBuffer {
  private readonly storage: Uint8Array;

  constructor(readonly capacity: number = DEFAULT_SYMBOL_BUFFER_SIZE) {
    this.storage = new Uint8Array(Math.max(2, capacity));
  }

  clear(): void {
    this.storage.fill(0);
  }

  /**
   * Append text after whatever is already written. Text past the capacity is
   * dropped (whole code points only); the last byte always stays NUL.
   * Returns the number of bytes written.
   */
  write(text: string): number {
    const start = this.length;
    const room = this.storage.subarray(start, this.storage.length - 1);
    return encoder.encodeInto(text, room).written;
  }

  /** Bytes up to the first NUL. */
  get length(): number {
    const end = this.storage.indexOf(0);
    return end === -1 ? this.storage.length : end;
  }

  isEmpty(): boolean {
    return this.storage[0] === 0;
  }

  view(): Uint8Array {
    return this.storage.subarray(0, this.length);
  }

  text(): string {
    return decoder.decode(this.view());
  }
}

/**
 * A resolved name, borrowed from the trace's symbol buffer.
 *
 * Valid until the next resolution attempt reuses the buffer. Call `raw()` to keep
 * the text past the visitor call that received the frame.
 */
export class FrameSymbol {
  constructor(private readonly buffer: SymbolBuffer) {}

  raw(): string {
    return this.buffer.text();
  }

  bytes(): Uint8Array {
    return this.buffer.view();
  }
}
