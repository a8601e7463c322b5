#!/usr/bin/env node
/**
 * Reservoir CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { Reservoir } from './reservoir.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { LocalPoolStateStore } from './infra/local/pool-state-store/index.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { Err } from './errors/factories.js';
import { formatAppError } from './errors/formatter.js';
import {
  SAMPLE_KINDS,
  executeSampleCommand,
  executeHealthCommand,
  executeSaveStateCommand,
  type SampleCommandOptions,
  type HealthCommandOptions,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('reservoir')
  .description('Entropy pool with DIRECT and HYBRID taps, fed by local harvesters')
  .version('0.1.0');

async function resolveCore(): Promise<{ reservoir: Reservoir; terminator: ProcessTerminator }> {
  await initializeContainer({ runtimeMode: { kind: 'cli' } });
  return {
    reservoir: container.resolve<Reservoir>(DI.Core.Reservoir),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('sample <kind>')
  .description(`Draw random values (${SAMPLE_KINDS.join(' | ')})`)
  .option('-n, --count <n>', 'Number of values', '1')
  .option('--low <x>', 'Lower bound (int, float)')
  .option('--high <x>', 'Upper bound (int, float)')
  .option('-m, --mode <mode>', 'Tap mode for this run: DIRECT or HYBRID')
  .option('--mu <x>', 'Gaussian mean')
  .option('--sigma <x>', 'Gaussian standard deviation')
  .option('--rate <x>', 'Exponential rate')
  .option('--size <n>', 'Byte count (bytes, token)')
  .option('--encoding <enc>', 'Token encoding: hex or base64url')
  .action(async (kind: string, options: SampleCommandOptions) => {
    const { reservoir, terminator } = await resolveCore();
    const result = await executeSampleCommand(
      kind,
      {
        reservoir,
        depletionPolicy: reservoir.pool.depletionPolicy(),
        collectOnce: () => reservoir.collector.collectOnce(),
      },
      options
    );
    interpretCliResult(result, terminator);
  });

program
  .command('health')
  .description('Show the pool health snapshot')
  .option('-c, --collect <cycles>', 'Run collection cycles first')
  .action(async (options: HealthCommandOptions) => {
    const { reservoir, terminator } = await resolveCore();
    const result = await executeHealthCommand(
      {
        collectOnce: () => reservoir.collector.collectOnce(),
        health: () => reservoir.health(),
      },
      options
    );
    interpretCliResult(result, terminator);
  });

program
  .command('save-state <file>')
  .description('Collect once, then write the pool state to a file (mode 0600)')
  .action(async (filePath: string) => {
    const { reservoir, terminator } = await resolveCore();
    const result = await executeSaveStateCommand(filePath, {
      collectOnce: () => reservoir.collector.collectOnce(),
      exportState: () => reservoir.pool.exportState(),
      openStore: (target) => new LocalPoolStateStore(target),
    });
    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  interpretCliResultWithoutDI(failure(formatAppError(Err.unexpected('Command failed', error))));
});
