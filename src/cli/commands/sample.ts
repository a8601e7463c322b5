/**
 * Sample Command
 *
 * Draws typed values from the reservoir's active tap.
 * Pure function with dependency injection.
 */

import { z } from 'zod';
import { Buffer } from 'node:buffer';
import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import type { TapError } from '../../errors/app-error.js';
import type { Tap } from '../../tap/tap.js';
import type { Reservoir } from '../../reservoir.js';
import type { DepletionPolicy } from '../../pool/depletion-policy.js';
import type { CollectionReport } from '../../collector/collector.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const SAMPLE_KINDS = ['float', 'int', 'bool', 'bytes', 'gaussian', 'exponential', 'token'] as const;

export type SampleKind = (typeof SAMPLE_KINDS)[number];

export interface SampleCommandDeps {
  readonly reservoir: Tap & Pick<Reservoir, 'configure'>;
  /** Permissive when omitted. */
  readonly depletionPolicy?: DepletionPolicy;
  /** Run once before anything is drawn from a strict pool. */
  readonly collectOnce?: () => Promise<CollectionReport>;
}

/** Raw commander values; parsed here. */
export interface SampleCommandOptions {
  readonly count?: string;
  readonly low?: string;
  readonly high?: string;
  readonly mode?: string;
  readonly mu?: string;
  readonly sigma?: string;
  readonly rate?: string;
  readonly size?: string;
  readonly encoding?: string;
}

const MAX_COUNT = 10_000;

const finite = z.coerce.number().finite();

const SampleOptionsSchema = z.object({
  count: z.coerce.number().int().min(1).max(MAX_COUNT).default(1),
  low: finite.optional(),
  high: finite.optional(),
  mode: z
    .string()
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(['DIRECT', 'HYBRID']))
    .optional(),
  mu: finite.default(0),
  sigma: finite.default(1),
  rate: finite.default(1),
  size: z.coerce.number().int().min(1).max(4096).default(16),
  encoding: z.enum(['hex', 'base64url']).default('hex'),
});

type SampleOptions = z.infer<typeof SampleOptionsSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the sample command.
 */
export async function executeSampleCommand(
  kind: string,
  deps: SampleCommandDeps,
  options: SampleCommandOptions = {}
): Promise<CliResult> {
  const sampleKind = SAMPLE_KINDS.find((k) => k === kind);
  if (!sampleKind) {
    return misuse(`Unknown sample kind "${kind}"`, [`Use one of: ${SAMPLE_KINDS.join(', ')}`]);
  }

  const parsed = SampleOptionsSchema.safeParse(options);
  if (!parsed.success) {
    return misuse(
      'Invalid sample options',
      parsed.error.errors.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const opts = parsed.data;

  if (deps.depletionPolicy?.kind === 'strict' && deps.collectOnce) {
    await deps.collectOnce();
  }

  if (opts.mode) {
    const configured = await deps.reservoir.configure({ mode: opts.mode });
    if (configured.isErr()) return toFailure(configured.error);
  }

  const values: string[] = [];
  for (let i = 0; i < opts.count; i++) {
    const drawn = await drawOne(deps.reservoir, sampleKind, opts);
    if (drawn.isErr()) return toFailure(drawn.error);
    values.push(drawn.value);
  }

  return success({
    message: `${opts.count} ${sampleKind} sample${opts.count === 1 ? '' : 's'} (${deps.reservoir.mode})`,
    values,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// INTERNAL
// ═══════════════════════════════════════════════════════════════════════════

function drawOne(tap: Tap, kind: SampleKind, opts: SampleOptions): ResultAsync<string, TapError> {
  switch (kind) {
    case 'float':
      return opts.low !== undefined || opts.high !== undefined
        ? tap.uniform(opts.low ?? 0, opts.high ?? 1).map(String)
        : tap.uniformFloat().map(String);
    case 'int':
      return tap.uniformInt(opts.low ?? 1, opts.high ?? 100).map(String);
    case 'bool':
      return tap.boolean().map(String);
    case 'bytes':
      return tap.bytes(opts.size).map((b) => Buffer.from(b).toString('hex'));
    case 'gaussian':
      return tap.gaussian(opts.mu, opts.sigma).map(String);
    case 'exponential':
      return tap.exponential(opts.rate).map(String);
    case 'token':
      return tap.token(opts.size, opts.encoding);
  }
}

function toFailure(error: TapError): CliResult {
  switch (error._tag) {
    case 'InvalidParameter':
    case 'EmptyInput':
      return misuse(error.message);
    case 'DepletionTimeout':
    case 'ExtractionCancelled':
      return failure(error.message, {
        exitCode: { kind: 'depleted' },
        suggestions: ['Run "reservoir health --collect 5" to feed the pool, or use RESERVOIR_DEPLETION=permissive'],
      });
  }
}
