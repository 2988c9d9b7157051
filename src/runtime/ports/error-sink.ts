/**
 * Port for the unbuffered error stream crash reports are written to.
 * `write` must hand the text to the OS before returning: the process may abort right after.
 */
export interface ErrorSink {
  write(text: string): void;
}
