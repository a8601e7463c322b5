import * as fs from 'fs/promises';
import * as path from 'path';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { StateStoreFailedError } from '../../../errors/app-error.js';
import { Err } from '../../../errors/factories.js';
import type { PoolStateStorePort } from '../../../ports/pool-state-store.port.js';
import type { PoolState } from '../../../pool/pool-state.js';
import { decodePoolState, encodePoolState } from '../../../pool/pool-state.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (e) {
    if (nodeErrorCode(e) === 'ENOENT') return null;
    throw e;
  }
}

/**
 * JSON file holding one exported pool state (`{ v: 1, buffer, creditBits }`).
 *
 * Writes go to `<file>.tmp` with mode 0600 and are renamed into place.
 */
export class LocalPoolStateStore implements PoolStateStorePort {
  constructor(private readonly filePath: string) {}

  load(): ResultAsync<PoolState | null, StateStoreFailedError> {
    const filePath = this.filePath;
    return RA.fromPromise(readIfExists(filePath), (e) => Err.stateStoreFailed(filePath, 'load', describe(e))).andThen(
      (raw): ResultAsync<PoolState | null, StateStoreFailedError> => (raw === null ? okAsync(null) : this.parse(raw))
    );
  }

  save(state: PoolState): ResultAsync<void, StateStoreFailedError> {
    const filePath = this.filePath;
    const tmpPath = `${filePath}.tmp`;
    const body = `${JSON.stringify(encodePoolState(state))}\n`;

    return RA.fromPromise(
      (async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(tmpPath, body, { encoding: 'utf8', mode: 0o600 });
        // writeFile keeps the mode of an existing file
        await fs.chmod(tmpPath, 0o600);
        await fs.rename(tmpPath, filePath);
      })(),
      (e) => Err.stateStoreFailed(filePath, 'save', describe(e))
    );
  }

  private parse(raw: string): ResultAsync<PoolState, StateStoreFailedError> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return errAsync(Err.stateStoreFailed(this.filePath, 'load', 'file is not valid JSON'));
    }

    const decoded = decodePoolState(parsed);
    if (decoded.isErr()) {
      return errAsync(Err.stateStoreFailed(this.filePath, 'load', decoded.error.issue));
    }
    return okAsync(decoded.value);
  }
}
