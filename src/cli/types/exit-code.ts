import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Outcome classes of a CLI command.
 *
 * - general_error (1): the command ran and failed
 * - misuse (2): bad arguments; nothing was drawn
 * - depleted (75): a strict draw ran out of time or was cancelled; retry after feeding
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'general_error' }
  | { kind: 'misuse' }
  | { kind: 'depleted' };

const NUMERIC: Readonly<Record<ExitCode['kind'], number>> = {
  success: 0,
  general_error: 1,
  misuse: 2,
  depleted: 75,
};

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'depleted':
      return { kind: 'temporary_failure' };
    case 'general_error':
    case 'misuse':
      return { kind: 'failure' };
  }
}

/** For the entry point's last-resort handler, where no terminator is resolved yet. */
export function toNumericExitCode(exitCode: ExitCode): number {
  return NUMERIC[exitCode.kind];
}
