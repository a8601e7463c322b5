export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DepletionError,
  DepletionTimeoutError,
  DrawError,
  EmptyInputError,
  ExtractionCancelledError,
  HarvesterFailure,
  InvalidParameterError,
  PoolStateInvalidError,
  StartupFailedError,
  StateStoreFailedError,
  TapError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
