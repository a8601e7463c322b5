/**
 * Error Factories - Consistent Error Construction
 *
 * Err namespace for all error constructors, so every error of a kind carries the
 * same fields and message shape.
 */

import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DepletionTimeoutError,
  EmptyInputError,
  ExtractionCancelledError,
  HarvesterFailure,
  InvalidParameterError,
  PoolStateInvalidError,
  StartupFailedError,
  StateStoreFailedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  // ==========================================================================
  // Tap / Pool Errors
  // ==========================================================================

  emptyInput: (operation: string): EmptyInputError => ({
    _tag: 'EmptyInput',
    operation,
    message: `${operation}: cannot operate on an empty collection`,
  }),

  invalidParameter: (operation: string, parameter: string, issue: string): InvalidParameterError => ({
    _tag: 'InvalidParameter',
    operation,
    parameter,
    issue,
    message: `${operation}: invalid ${parameter} (${issue})`,
  }),

  depletionTimeout: (requestedBits: number, availableBits: number, timeoutMs: number): DepletionTimeoutError => ({
    _tag: 'DepletionTimeout',
    requestedBits,
    availableBits,
    timeoutMs,
    message: `Pool credit stayed below ${requestedBits} bits for ${timeoutMs}ms (available: ${availableBits})`,
  }),

  extractionCancelled: (requestedBits: number): ExtractionCancelledError => ({
    _tag: 'ExtractionCancelled',
    requestedBits,
    message: `Extraction of ${requestedBits} bits was cancelled while waiting for credit`,
  }),

  poolStateInvalid: (issue: string): PoolStateInvalidError => ({
    _tag: 'PoolStateInvalid',
    issue,
    message: `Pool state rejected: ${issue}`,
  }),

  // ==========================================================================
  // Collaborator Errors
  // ==========================================================================

  harvesterFailure: (source: string, message: string): HarvesterFailure => ({
    _tag: 'HarvesterFailure',
    source,
    message,
  }),

  // ==========================================================================
  // Application Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  startupFailed: (phase: string, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),

  stateStoreFailed: (path: string, operation: 'load' | 'save', message: string): StateStoreFailedError => ({
    _tag: 'StateStoreFailed',
    path,
    operation,
    message: `Could not ${operation} pool state at ${path}: ${message}`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError | HarvesterFailure>;
