/**
 * How the process uses the container.
 *
 * - service: long-lived embedding; the collector runs every RESERVOIR_COLLECT_INTERVAL_MS
 * - cli: one command, then exit; collection only when the command asks for it
 * - test: like cli, and termination throws instead of exiting
 */
export type RuntimeMode = { kind: 'service' } | { kind: 'cli' } | { kind: 'test' };
