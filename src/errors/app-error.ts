import type { Brand } from '../runtime/brand.js';

/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data, not exceptions. Every variant carries a `_tag` for exhaustive
 * switching and a human-readable `message`.
 */

// ============================================================================
// Tap / Pool Errors (returned from value-generation calls)
// ============================================================================

export type EmptyInputError = Readonly<{
  readonly _tag: 'EmptyInput';
  readonly operation: string;
  readonly message: string;
}>;

export type InvalidParameterError = Readonly<{
  readonly _tag: 'InvalidParameter';
  readonly operation: string;
  readonly parameter: string;
  readonly issue: string;
  readonly message: string;
}>;

export type DepletionTimeoutError = Readonly<{
  readonly _tag: 'DepletionTimeout';
  readonly requestedBits: number;
  readonly availableBits: number;
  readonly timeoutMs: number;
  readonly message: string;
}>;

export type ExtractionCancelledError = Readonly<{
  readonly _tag: 'ExtractionCancelled';
  readonly requestedBits: number;
  readonly message: string;
}>;

/** Strict-policy draw that could not be served. */
export type DepletionError = DepletionTimeoutError | ExtractionCancelledError;

/** Anything `pool.draw()` can fail with. */
export type DrawError = DepletionError | InvalidParameterError;

export type TapError = EmptyInputError | InvalidParameterError | DepletionError;

export type PoolStateInvalidError = Readonly<{
  readonly _tag: 'PoolStateInvalid';
  readonly issue: string;
  readonly message: string;
}>;

// ============================================================================
// Collaborator Errors (recorded, never raised into the core)
// ============================================================================

export type HarvesterFailure = Readonly<{
  readonly _tag: 'HarvesterFailure';
  readonly source: string;
  readonly message: string;
}>;

// ============================================================================
// Application Errors (composition root, persistence)
// ============================================================================

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type StateStoreFailedError = Readonly<{
  readonly _tag: 'StateStoreFailed';
  readonly path: string;
  readonly operation: 'load' | 'save';
  readonly message: string;
}>;

export type AppError =
  | ConfigInvalidError
  | StartupFailedError
  | UnexpectedError
  | StateStoreFailedError
  | PoolStateInvalidError
  | TapError;

/**
 * Branded error type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
