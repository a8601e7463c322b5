/**
 * Save-State Command
 *
 * Runs one collection cycle, exports the pool and writes it to a file.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import type { PoolState } from '../../pool/pool-state.js';
import type { PoolStateStorePort } from '../../ports/pool-state-store.port.js';
import type { CollectionReport } from '../../collector/collector.js';

export interface SaveStateCommandDeps {
  readonly collectOnce: () => Promise<CollectionReport>;
  readonly exportState: () => PoolState;
  readonly openStore: (filePath: string) => PoolStateStorePort;
}

export async function executeSaveStateCommand(filePath: string, deps: SaveStateCommandDeps): Promise<CliResult> {
  const report = await deps.collectOnce();
  const state = deps.exportState();
  const saved = await deps.openStore(filePath).save(state);

  if (saved.isErr()) {
    return failure(saved.error.message, {
      suggestions: ['Check that the directory is writable'],
    });
  }

  return success({
    message: `Pool state saved to ${filePath}`,
    details: [`Credit: ${state.creditBits} bits`, `Fed this run: ${report.totalBitsFed} bits`],
    warnings: ['This file predicts all output until the next feed. Keep it private.'],
  });
}
