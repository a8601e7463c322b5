/**
 * Ends the process. Held by composition roots only; the core never exits.
 *
 * `temporary_failure` marks runs that may succeed once the pool has been fed.
 */
export type ExitCode = { kind: 'success' } | { kind: 'failure' } | { kind: 'temporary_failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
