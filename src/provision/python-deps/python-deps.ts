/**
 * Python Dependency Stage
 *
 * Installs the camera server's pinned requirements into the system Python.
 */

import { accessSync, constants } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { SourceMissingError } from '../errors/index.js';
import type { CommandRunner } from '../system/command-runner.js';
import { commandRunnerFor, pathInTarget } from '../system/target-root.js';
import type { PythonDependencies } from '../types/provisioning-step.js';

const log = createSubsystemLogger('provision/python');

export function pipArguments(dependencies: PythonDependencies, targetRoot = '/'): string[] {
  const args = ['install', '-r', pathInTarget(targetRoot, dependencies.manifestPath)];
  if (dependencies.breakSystemPackages) {
    // bookworm marks the system interpreter as externally managed
    args.push('--break-system-packages');
  }
  return args;
}

export function installPythonDependencies(
  dependencies: PythonDependencies,
  runner: CommandRunner,
  targetRoot = '/'
): void {
  try {
    accessSync(dependencies.manifestPath, constants.R_OK);
  } catch (error) {
    throw new SourceMissingError(dependencies.manifestPath, { cause: error });
  }

  log.info(`Installing Python requirements from ${dependencies.manifestPath}`);
  commandRunnerFor(runner, targetRoot).run('pip3', pipArguments(dependencies, targetRoot));
}
