import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * A crash handler that reaches it throws out to the test instead of aborting the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly requested: ExitCode[] = [];

  terminate(code: ExitCode): never {
    this.requested.push(code);
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
