import type { ResultAsync } from 'neverthrow';
import type { StateStoreFailedError } from '../errors/app-error.js';
import type { PoolState } from '../pool/pool-state.js';

/**
 * Port: persistence of exported pool state.
 *
 * Purpose:
 * - Survive restarts without starting from an uncredited pool
 *
 * Guarantees:
 * - load() resolves to null when nothing was saved yet
 * - save() replaces any previous state
 *
 * Exported state is sensitive: anyone holding it predicts all extractions until the
 * next independent feed. Adapters must restrict access to the stored copy.
 */
export interface PoolStateStorePort {
  load(): ResultAsync<PoolState | null, StateStoreFailedError>;
  save(state: PoolState): ResultAsync<void, StateStoreFailedError>;
}
