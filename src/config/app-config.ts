/**
 * Environment configuration - parse, don't validate.
 *
 * - Single source of truth for the RESERVOIR_* surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import type { DepletionPolicy } from '../pool/depletion-policy.js';
import { PERMISSIVE, strict } from '../pool/depletion-policy.js';
import type { HarvesterName } from '../harvesters/registry.js';
import { HARVESTER_NAMES, isHarvesterName } from '../harvesters/registry.js';
import { MIN_COLLECT_INTERVAL_MS } from '../collector/collector.js';
import type { ReservoirConfiguration } from './reservoir-config.js';
import { DEFAULT_RESERVOIR_CONFIGURATION } from './reservoir-config.js';

export interface AppConfig {
  readonly reservoir: ReservoirConfiguration;
  readonly pool: { readonly depletionPolicy: DepletionPolicy };
  readonly collector: {
    readonly intervalMs: number;
    readonly harvesters: readonly HarvesterName[];
  };
  /** Null when persistence is off. */
  readonly stateFile: string | null;
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const optionalInt = (min: number, message: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(z.number().int(`${message} must be an integer`).min(min, `${message} must be >= ${min}`).optional());

const EnvSchema = z.object({
  RESERVOIR_MODE: z
    .string()
    .optional()
    .transform((v) => v?.toUpperCase())
    .pipe(z.enum(['DIRECT', 'HYBRID']).default(DEFAULT_RESERVOIR_CONFIGURATION.mode)),

  RESERVOIR_HYBRID_RESEED_MS: optionalInt(1, 'RESERVOIR_HYBRID_RESEED_MS'),

  RESERVOIR_OFFLINE: z.enum(['0', '1']).default('0'),

  RESERVOIR_DEPLETION: z.enum(['permissive', 'strict']).default('permissive'),

  RESERVOIR_STRICT_TIMEOUT_MS: optionalInt(0, 'RESERVOIR_STRICT_TIMEOUT_MS'),

  RESERVOIR_COLLECT_INTERVAL_MS: optionalInt(MIN_COLLECT_INTERVAL_MS, 'RESERVOIR_COLLECT_INTERVAL_MS'),

  RESERVOIR_HARVESTERS: z
    .string()
    .optional()
    .transform((v) =>
      v === undefined
        ? [...HARVESTER_NAMES]
        : v
            .split(',')
            .map((s) => s.trim().toLowerCase())
            .filter((s) => s.length > 0)
    )
    .pipe(
      z
        .array(z.string().refine(isHarvesterName, (name) => ({ message: `Unknown harvester "${name}"` })))
        .min(1, 'RESERVOIR_HARVESTERS must name at least one harvester')
    ),

  RESERVOIR_STATE_FILE: z.string().trim().min(1, 'RESERVOIR_STATE_FILE cannot be empty').optional(),

  RESERVOIR_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export const DEFAULT_COLLECT_INTERVAL_MS = 1_000;

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const depletionPolicy: DepletionPolicy =
    env.RESERVOIR_DEPLETION === 'strict' ? strict(env.RESERVOIR_STRICT_TIMEOUT_MS ?? null) : PERMISSIVE;

  return {
    reservoir: {
      mode: env.RESERVOIR_MODE,
      hybridReseedIntervalMs: env.RESERVOIR_HYBRID_RESEED_MS ?? DEFAULT_RESERVOIR_CONFIGURATION.hybridReseedIntervalMs,
      offlineMode: env.RESERVOIR_OFFLINE === '1',
    },
    pool: { depletionPolicy },
    collector: {
      intervalMs: env.RESERVOIR_COLLECT_INTERVAL_MS ?? DEFAULT_COLLECT_INTERVAL_MS,
      harvesters: [...new Set(env.RESERVOIR_HARVESTERS)],
    },
    stateFile: env.RESERVOIR_STATE_FILE ?? null,
    logLevel: env.RESERVOIR_LOG_LEVEL,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
