import 'reflect-metadata';

// Facade
export {
  Reservoir,
  createReservoir,
  type ReservoirOptions,
  type ReservoirPorts,
  type ReservoirCreateError,
} from './reservoir.js';

// Pool
export { EntropyPool, DEFAULT_POOL_SIZE_BYTES, type EntropyPoolOptions, type PoolPorts } from './pool/entropy-pool.js';
export { PERMISSIVE, strict, type DepletionPolicy, type DrawOptions } from './pool/depletion-policy.js';
export { encodePoolState, decodePoolState, type PoolState, type PoolStateFileV1 } from './pool/pool-state.js';

// Taps
export { BaseTap, type Tap, type TapMode, type TokenEncoding } from './tap/tap.js';
export { DirectTap } from './tap/direct-tap.js';
export { HybridTap, DEFAULT_HYBRID_RESEED_INTERVAL_MS, type HybridTapOptions } from './tap/hybrid-tap.js';

// Health
export { SourceHistory, DEFAULT_HISTORY_WINDOW, type HarvestOutcome } from './health/source-history.js';
export {
  HealthModel,
  computeScore,
  statusForScore,
  recommendationFor,
  type HealthSnapshot,
  type HealthStatus,
  type SourceHealth,
} from './health/health-model.js';

// Collection
export { Collector, type CollectionReport, type HarvesterReport, type CollectorOptions } from './collector/collector.js';
export { harvestFailed, harvestSucceeded, type Harvester, type HarvestResult } from './harvesters/harvester.js';
export { TimingHarvester } from './harvesters/timing-harvester.js';
export { SystemHarvester, nodeSystemProbe, type SystemProbe } from './harvesters/system-harvester.js';
export { NetworkHarvester, tcpConnectProbe, type ConnectProbe, type NetworkTarget } from './harvesters/network-harvester.js';
export { HARVESTER_FACTORIES, HARVESTER_NAMES, createHarvesters, type HarvesterName } from './harvesters/registry.js';

// Configuration
export {
  DEFAULT_RESERVOIR_CONFIGURATION,
  resolveConfiguration,
  type ReservoirConfiguration,
} from './config/reservoir-config.js';
export { loadConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';

// Ports and local adapters
export type { Sha256Port } from './ports/sha256.port.js';
export { CHACHA20_KEY_BYTES, type ChaCha20Port, type Keystream, type KeystreamOptions } from './ports/chacha20.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { RandomEntropyPort } from './ports/random-entropy.port.js';
export type { PoolStateStorePort } from './ports/pool-state-store.port.js';
export {
  createNodePoolPorts,
  createNodeReservoirPorts,
  NodeChaCha20,
  NodeSha256,
  NodeTimeClock,
  NodeRandomEntropy,
  LocalPoolStateStore,
} from './infra/local/index.js';

// Errors
export * from './errors/index.js';

// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
