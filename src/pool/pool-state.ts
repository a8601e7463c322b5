import { z } from 'zod';
import { Buffer } from 'node:buffer';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { PoolStateInvalidError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * Raw pool contents as exported for persistence.
 *
 * Sensitive: whoever holds this predicts every extraction until the next feed.
 */
export interface PoolState {
  readonly buffer: Uint8Array;
  readonly creditBits: number;
}

/**
 * On-disk form (v1): buffer as unpadded base64url.
 */
export const PoolStateFileV1Schema = z.object({
  v: z.literal(1),
  buffer: z.string().regex(/^[A-Za-z0-9_-]+$/, 'buffer must be base64url'),
  creditBits: z.number().finite().nonnegative(),
});

export type PoolStateFileV1 = z.infer<typeof PoolStateFileV1Schema>;

export function encodePoolState(state: PoolState): PoolStateFileV1 {
  return {
    v: 1,
    buffer: Buffer.from(state.buffer).toString('base64url'),
    creditBits: state.creditBits,
  };
}

export function decodePoolState(raw: unknown): Result<PoolState, PoolStateInvalidError> {
  const parsed = PoolStateFileV1Schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.errors[0];
    const where = first && first.path.length ? first.path.join('.') : '(root)';
    return err(Err.poolStateInvalid(`${where}: ${first?.message ?? 'unreadable state'}`));
  }

  const buffer = new Uint8Array(Buffer.from(parsed.data.buffer, 'base64url'));
  if (Buffer.from(buffer).toString('base64url') !== parsed.data.buffer) {
    return err(Err.poolStateInvalid('buffer: non-canonical base64url'));
  }

  return ok({ buffer, creditBits: parsed.data.creditBits });
}
