import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ExitCode, ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import type { ChaCha20Port } from '../ports/chacha20.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { PoolStateStorePort } from '../ports/pool-state-store.port.js';
import type { PoolState } from '../pool/pool-state.js';
import type { DepletionPolicy } from '../pool/depletion-policy.js';
import { strict } from '../pool/depletion-policy.js';
import { NodeSha256 } from '../infra/local/sha256/index.js';
import { NodeChaCha20 } from '../infra/local/chacha20/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { NodeRandomEntropy } from '../infra/local/random-entropy/index.js';
import { LocalPoolStateStore } from '../infra/local/pool-state-store/index.js';
import { Reservoir } from '../reservoir.js';
import type { Collector } from '../collector/collector.js';
import { createHarvesters } from '../harvesters/registry.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'service' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions = {}): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  // Tests may inject their own terminator before initialization.
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

/**
 * Print a startup error and stop through the registered terminator.
 */
function failStartup(error: AppError, code: ExitCode = { kind: 'failure' }): never {
  console.error(formatAppError(error));
  return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator).terminate(code);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Allow tests to inject config explicitly before container initialization.
  // This prevents the composition root from overwriting test-provided values.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) {
    failStartup(configResult.error);
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory(
      (c: DependencyContainer) => new PinoLoggerFactory(c.resolve<ValidatedConfig>(DI.Config.App).logLevel)
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORT REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerPorts(): void {
  // Each port can be pre-registered by tests (fakes); only fill in what is missing.
  if (!container.isRegistered(DI.Ports.Sha256)) {
    container.register<Sha256Port>(DI.Ports.Sha256, { useFactory: instanceCachingFactory(() => new NodeSha256()) });
  }
  if (!container.isRegistered(DI.Ports.ChaCha20)) {
    container.register<ChaCha20Port>(DI.Ports.ChaCha20, {
      useFactory: instanceCachingFactory(() => new NodeChaCha20()),
    });
  }
  if (!container.isRegistered(DI.Ports.TimeClock)) {
    container.register<TimeClockPort>(DI.Ports.TimeClock, {
      useFactory: instanceCachingFactory(() => new NodeTimeClock()),
    });
  }
  if (!container.isRegistered(DI.Ports.RandomEntropy)) {
    container.register<RandomEntropyPort>(DI.Ports.RandomEntropy, {
      useFactory: instanceCachingFactory(() => new NodeRandomEntropy()),
    });
  }

  const stateFile = container.resolve<ValidatedConfig>(DI.Config.App).stateFile;
  if (stateFile !== null && !container.isRegistered(DI.Ports.PoolStateStore)) {
    container.register<PoolStateStorePort>(DI.Ports.PoolStateStore, {
      useFactory: instanceCachingFactory(() => new LocalPoolStateStore(stateFile)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CORE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

/** Upper bound on a strict wait in a one-shot CLI run, which has no collector feeding the pool. */
export const CLI_STRICT_TIMEOUT_MS = 30_000;

function boundedForRuntime(policy: DepletionPolicy, mode: RuntimeMode): DepletionPolicy {
  if (mode.kind === 'cli' && policy.kind === 'strict' && policy.timeoutMs === null) {
    return strict(CLI_STRICT_TIMEOUT_MS);
  }
  return policy;
}

/**
 * Load saved state, build the reservoir on it (keying a HYBRID tap may wait on
 * the pool), then expose its parts under their own tokens.
 */
async function registerCore(): Promise<void> {
  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);
  const clock = container.resolve<TimeClockPort>(DI.Ports.TimeClock);
  const mode = container.resolve<RuntimeMode>(DI.Runtime.Mode);

  let state: PoolState | undefined;
  if (container.isRegistered(DI.Ports.PoolStateStore)) {
    const loaded = await container.resolve<PoolStateStorePort>(DI.Ports.PoolStateStore).load();
    if (loaded.isErr()) failStartup(loaded.error);
    state = loaded.value ?? undefined;
  }

  const created = await Reservoir.create({
    ports: {
      sha256: container.resolve<Sha256Port>(DI.Ports.Sha256),
      clock,
      entropy: container.resolve<RandomEntropyPort>(DI.Ports.RandomEntropy),
      chacha20: container.resolve<ChaCha20Port>(DI.Ports.ChaCha20),
    },
    pool: { depletionPolicy: boundedForRuntime(config.pool.depletionPolicy, mode) },
    state,
    configuration: config.reservoir,
    harvesters: createHarvesters(config.collector.harvesters, { clock }),
    logger: loggers.create('Reservoir'),
  });
  if (created.isErr()) {
    const error = created.error;
    if (error._tag === 'PoolStateInvalid') failStartup(error);
    // keying a HYBRID tap from a strict pool can succeed once the pool is fed
    const retryable = error._tag === 'DepletionTimeout' || error._tag === 'ExtractionCancelled';
    failStartup(
      Err.startupFailed('reservoir', error.message, error),
      retryable ? { kind: 'temporary_failure' } : { kind: 'failure' }
    );
  }
  const reservoir = created.value;

  container.register<Reservoir>(DI.Core.Reservoir, { useValue: reservoir });
  container.register(DI.Core.Pool, { useValue: reservoir.pool });
  container.register(DI.Core.History, { useValue: reservoir.history });
  container.register(DI.Core.Collector, { useValue: reservoir.collector });

  if (mode.kind === 'service') {
    reservoir.collector.start(config.collector.intervalMs);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Concurrent calls share one initialization; calls after it finished return at once.
 * Startup errors (bad config, unreadable state file) are printed and end the process
 * through the registered ProcessTerminator. In service mode the collector starts on
 * the configured interval.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return;
  if (initializationPromise) return initializationPromise;

  initializationPromise = (async () => {
    registerRuntime(options);
    registerConfig();
    registerLogging();
    registerPorts();
    await registerCore();
    initialized = true;
    createBootstrapLogger('di').debug('Container initialized');
  })();

  try {
    await initializationPromise;
  } finally {
    if (!initialized) initializationPromise = null;
  }
}

/**
 * Stop a running collector and drop every registration (for testing).
 */
export async function resetContainer(): Promise<void> {
  if (container.isRegistered(DI.Core.Collector)) {
    await container.resolve<Collector>(DI.Core.Collector).stop();
  }
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
