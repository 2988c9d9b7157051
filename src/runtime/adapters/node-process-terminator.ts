import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'failure':
        process.exit(1);
      case 'abort':
        process.abort();
      default:
        return assertNever(code);
    }
  }
}
