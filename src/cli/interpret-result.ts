/**
 * The one place a CliResult turns into output and an exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode, toProcessExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { OutputSink } from './output-formatter.js';
import { CONSOLE_SINK, printResult } from './output-formatter.js';

/**
 * Print, then terminate on failure. Success returns so the event loop can drain.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  sink: OutputSink = CONSOLE_SINK
): void {
  printResult(result, sink);
  if (result.kind === 'failure') {
    terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/**
 * Entry-point fallback for errors raised before the container could provide a terminator.
 */
export function interpretCliResultWithoutDI(result: CliResult, sink: OutputSink = CONSOLE_SINK): void {
  printResult(result, sink);
  if (result.kind === 'failure') {
    process.exit(toNumericExitCode(result.exitCode));
  }
}
