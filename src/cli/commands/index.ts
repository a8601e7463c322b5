/**
 * CLI Commands - Public API
 */

export {
  executeSampleCommand,
  SAMPLE_KINDS,
  type SampleKind,
  type SampleCommandDeps,
  type SampleCommandOptions,
} from './sample.js';
export { executeHealthCommand, type HealthCommandDeps, type HealthCommandOptions } from './health.js';
export { executeSaveStateCommand, type SaveStateCommandDeps } from './save-state.js';
