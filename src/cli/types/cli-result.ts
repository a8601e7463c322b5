/**
 * What a CLI command returns. Commands never print or exit; `interpretCliResult`
 * does both.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  /** Headline, e.g. "3 int samples (DIRECT)". */
  readonly message: string;
  /** Raw results, one per line and unstyled, so they can be piped. */
  readonly values?: readonly string[];
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export interface FailureOptions {
  readonly exitCode?: ExitCode;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export function failure(message: string, options: FailureOptions = {}): CliResult {
  return {
    kind: 'failure',
    exitCode: options.exitCode ?? { kind: 'general_error' },
    output: { message, details: options.details, suggestions: options.suggestions },
  };
}

/** Bad arguments: exit code 2. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return { kind: 'failure', exitCode: { kind: 'misuse' }, output: { message, suggestions } };
}
