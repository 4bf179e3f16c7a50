/**
 * Wires configuration, command execution, the state file and the cleanup
 * trap into one provisioning run.
 */

import { join } from 'node:path';
import { FileProvisionStateStore, MemoryProvisionStateStore, type ProvisionStateStore } from '../state/provision-state.js';
import { ShellCommandRunner, type CommandRunner } from '../system/command-runner.js';
import type { ProvisionConfig } from '../types/provision-configuration.js';
import { installCleanupTrap, type CleanupHandler } from './cleanup-trap.js';
import { buildProvisioningPlan } from './plan.js';
import { ProvisionRunner, type ProvisionResult } from './provision-runner.js';

export interface RunProvisioningOptions {
  commandRunner?: CommandRunner;
  cleanup?: CleanupHandler;
}

export function createStateStore(config: ProvisionConfig): ProvisionStateStore {
  return config.stateFile === null
    ? new MemoryProvisionStateStore()
    : new FileProvisionStateStore(join(config.targetRoot, config.stateFile));
}

export async function runProvisioning(
  config: ProvisionConfig,
  options: RunProvisioningOptions = {}
): Promise<ProvisionResult> {
  // Established before any step runs
  const cleanupTrap = installCleanupTrap(options.cleanup);

  const runner = new ProvisionRunner({
    commandRunner: options.commandRunner ?? new ShellCommandRunner({ trace: config.trace }),
    stateStore: createStateStore(config),
    cleanupTrap
  });

  return runner.run(buildProvisioningPlan(config));
}
