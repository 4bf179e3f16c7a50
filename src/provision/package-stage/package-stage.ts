/**
 * Package Stage
 *
 * Runs apt-get operations in order, inside the target root. The first failing operation aborts the
 * stage with a CommandFailedError; nothing is retried.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { CommandRunner } from '../system/command-runner.js';
import { commandRunnerFor } from '../system/target-root.js';
import type { PackageOperation } from '../types/provisioning-step.js';

const log = createSubsystemLogger('provision/packages');

export const APT_ENV: Record<string, string> = {
  DEBIAN_FRONTEND: 'noninteractive'
};

export function aptArguments(operation: PackageOperation): string[] {
  switch (operation.kind) {
    case 'purge':
    case 'install':
      return ['-y', operation.kind, ...operation.packages];
    case 'update':
    case 'upgrade':
      return ['-y', operation.kind];
  }
}

/** Only purge removes state that a second run cannot restore */
export function isIdempotentOperation(operation: PackageOperation): boolean {
  return operation.kind !== 'purge';
}

export function describeOperation(operation: PackageOperation): string {
  switch (operation.kind) {
    case 'purge':
    case 'install':
      return `${operation.kind} ${operation.packages.join(' ')}`;
    case 'update':
    case 'upgrade':
      return operation.kind;
  }
}

export function runPackageOperation(operation: PackageOperation, runner: CommandRunner, targetRoot = '/'): void {
  log.info(`apt-get ${describeOperation(operation)}`, { targetRoot });
  commandRunnerFor(runner, targetRoot).run('apt-get', aptArguments(operation), { env: APT_ENV });
}
