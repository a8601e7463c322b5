import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Throws instead of exiting, so tests can assert on startup and command failures.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly calls: ExitCode[] = [];

  terminate(code: ExitCode): never {
    this.calls.push(code);
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
