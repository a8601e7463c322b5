import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/** sysexits.h EX_TEMPFAIL for temporary failures. */
const EXIT_STATUS: Readonly<Record<ExitCode['kind'], number>> = {
  success: 0,
  failure: 1,
  temporary_failure: 75,
};

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    process.exit(EXIT_STATUS[code.kind]);
  }
}
