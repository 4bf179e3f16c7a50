/**
 * Service Installer
 *
 * Moves systemd unit files into the service directory, makes them
 * world-readable and enables them. A failed enable leaves the moved file in
 * place; there is no rollback.
 */

import { chmodSync, copyFileSync, existsSync, renameSync, statSync, unlinkSync } from 'node:fs';
import { basename, join } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { DestinationParentMissingError, SourceMissingError } from '../errors/index.js';
import type { CommandRunner } from '../system/command-runner.js';
import { isHostRoot } from '../system/target-root.js';
import type { ServiceUnit } from '../types/provisioning-step.js';

const log = createSubsystemLogger('provision/services');

export const UNIT_FILE_MODE = 0o644;

export interface ServiceInstallOptions {
  /** Absolute service directory on the running filesystem */
  serviceDir: string;
  /** Root handed to systemctl --root when provisioning a mounted image */
  targetRoot: string;
}

export interface InstalledUnit {
  unitName: string;
  installedPath: string;
}

export function unitNameOf(unit: ServiceUnit): string {
  return unit.unitName ?? basename(unit.sourcePath);
}

export function systemctlEnableArguments(unitName: string, targetRoot: string): string[] {
  return isHostRoot(targetRoot) ? ['enable', unitName] : [`--root=${targetRoot}`, 'enable', unitName];
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Moves a file, falling back to copy and unlink across filesystems
 */
export function moveFile(source: string, dest: string): void {
  try {
    renameSync(source, dest);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
    copyFileSync(source, dest);
    unlinkSync(source);
  }
}

export function installServiceUnit(
  unit: ServiceUnit,
  options: ServiceInstallOptions,
  runner: CommandRunner
): InstalledUnit {
  if (!existsSync(unit.sourcePath) || !statSync(unit.sourcePath).isFile()) {
    throw new SourceMissingError(unit.sourcePath);
  }
  if (!existsSync(options.serviceDir)) {
    throw new DestinationParentMissingError(join(options.serviceDir, basename(unit.sourcePath)));
  }

  const unitName = unitNameOf(unit);
  const installedPath = join(options.serviceDir, unitName);

  moveFile(unit.sourcePath, installedPath);
  chmodSync(installedPath, UNIT_FILE_MODE);
  log.info(`Installed ${unitName}`, { path: installedPath });

  runner.run('systemctl', systemctlEnableArguments(unitName, options.targetRoot));
  log.info(`Enabled ${unitName}`);

  return { unitName, installedPath };
}
