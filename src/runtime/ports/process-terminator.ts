/**
 * Port for terminating the current process.
 * `abort` is the abnormal-termination channel (SIGABRT, core dump where enabled),
 * never a regular exit code.
 */
export type ExitCode =
  | { kind: 'failure' }
  | { kind: 'abort' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
