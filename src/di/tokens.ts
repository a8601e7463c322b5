/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Register it in container.ts with an explicit factory
 * 3. Resolve with container.resolve<Type>(DI.Namespace.Token)
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CORE (pool, taps, health, collection)
  // ═══════════════════════════════════════════════════════════════════
  Core: {
    /** Public facade: active tap, configure(), health() */
    Reservoir: Symbol('Core.Reservoir'),
    /** The reservoir's entropy pool */
    Pool: Symbol('Core.Pool'),
    /** Per-source harvest history */
    History: Symbol('Core.History'),
    /** Harvester scheduling and feeding */
    Collector: Symbol('Core.Collector'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (runtime seams)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    Sha256: Symbol('Ports.Sha256'),
    /** Keystream for the HYBRID tap */
    ChaCha20: Symbol('Ports.ChaCha20'),
    TimeClock: Symbol('Ports.TimeClock'),
    RandomEntropy: Symbol('Ports.RandomEntropy'),
    /** Only registered when RESERVOIR_STATE_FILE is set */
    PoolStateStore: Symbol('Ports.PoolStateStore'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (service/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

