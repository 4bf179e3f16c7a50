/**
 * Tests for the ProvisionRunner
 *
 * Runs complete plans against a temporary target root with a recording
 * command runner standing in for apt-get, pip3, systemctl and chown.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { ProvisionRunner, canTransition, type PhaseChange } from './provision-runner.js';
import { buildProvisioningPlan } from './plan.js';
import { installCleanupTrap } from './cleanup-trap.js';
import { runProvisioning } from './run-provisioning.js';
import { resolveProvisionConfig } from '../config/index.js';
import { CommandFailedError, InvalidTransitionError, SourceMissingError } from '../errors/index.js';
import { FileProvisionStateStore } from '../state/provision-state.js';
import { RecordingCommandRunner, createTempDir, removeTempDir, writeTree } from '../test-setup.js';
import type { ProvisionConfig } from '../types/provision-configuration.js';

describe('ProvisionRunner', () => {
  let workDir: string;
  let filesystemRoot: string;
  let targetRoot: string;
  let config: ProvisionConfig;
  let commands: RecordingCommandRunner;

  beforeEach(() => {
    workDir = createTempDir();
    filesystemRoot = join(workDir, 'filesystem');
    targetRoot = join(workDir, 'target');

    writeTree(filesystemRoot, {
      'home/pi/.bashrc': 'alias ll="ls -l"\n',
      'home/pi/NaturewatchCameraServer/requirements-pi.txt': 'imutils==0.5.4\n',
      'home/pi/NaturewatchCameraServer/helpers/python.naturewatch.service': '[Unit]\nDescription=camera\n',
      'home/pi/NaturewatchCameraServer/helpers/wifisetup.service': '[Unit]\nDescription=wifi\n',
      'home/root/.profile': 'umask 022\n',
      'boot/config.txt': 'camera_auto_detect=1\n',
      'root/etc/hostname': 'camera-trap\n'
    });
    mkdirSync(join(targetRoot, 'home'), { recursive: true });
    mkdirSync(join(targetRoot, 'etc', 'systemd', 'system'), { recursive: true });

    config = resolveProvisionConfig({
      filesystemRoot,
      targetRoot,
      packages: [{ kind: 'purge', packages: ['python3-opencv'] }, { kind: 'update' }, { kind: 'install', packages: ['ffmpeg'] }],
      python: { requirementsFile: 'requirements-pi.txt', breakSystemPackages: false },
      stateFile: '/var/lib/camera-provision/state.json'
    });
    commands = new RecordingCommandRunner();
  });

  afterEach(() => {
    removeTempDir(workDir);
  });

  function createRunner(cleanup = vi.fn()): ProvisionRunner {
    return new ProvisionRunner({
      commandRunner: commands,
      stateStore: new FileProvisionStateStore(join(targetRoot, 'var/lib/camera-provision/state.json')),
      cleanupTrap: installCleanupTrap(cleanup)
    });
  }

  describe('canTransition', () => {
    it('should only allow forward moves and failure', () => {
      expect(canTransition('INIT', 'UNPACK_HOME')).toBe(true);
      expect(canTransition('SERVICES', 'FINAL_UNPACK')).toBe(true);
      expect(canTransition('PACKAGES', 'FAILED')).toBe(true);
      expect(canTransition('INIT', 'PACKAGES')).toBe(false);
      expect(canTransition('PYTHON_DEPS', 'PACKAGES')).toBe(false);
      expect(canTransition('DONE', 'FAILED')).toBe(false);
      expect(canTransition('FAILED', 'INIT')).toBe(false);
    });
  });

  describe('successful run', () => {
    it('should walk every phase in order and finish in DONE', async () => {
      const runner = createRunner();
      const changes: PhaseChange[] = [];
      runner.on('phaseChanged', (change: PhaseChange) => changes.push(change));

      const result = await runner.run(buildProvisioningPlan(config));

      expect(result.status).toBe('succeeded');
      expect(result.exitCode).toBe(0);
      expect(result.phase).toBe('DONE');
      expect(runner.getPhase()).toBe('DONE');
      expect(changes.map(change => change.to)).toEqual([
        'UNPACK_HOME',
        'PACKAGES',
        'PYTHON_DEPS',
        'SERVICES',
        'FINAL_UNPACK',
        'DONE'
      ]);
      expect(result.completedSteps).toHaveLength(11);
      expect(result.skippedSteps).toEqual([]);
    });

    it('should run package, Python and owner commands inside the target root', async () => {
      await createRunner().run(buildProvisioningPlan(config));

      const chroot = `chroot ${targetRoot}`;
      expect(commands.commandLines()).toEqual([
        `${chroot} id -u pi`,
        `${chroot} getent group pi`,
        `${chroot} chown -R pi:pi /home/pi`,
        `${chroot} apt-get -y purge python3-opencv`,
        `${chroot} apt-get -y update`,
        `${chroot} apt-get -y install ffmpeg`,
        `${chroot} pip3 install -r /home/pi/NaturewatchCameraServer/requirements-pi.txt`,
        `systemctl --root=${targetRoot} enable python.naturewatch.service`,
        `systemctl --root=${targetRoot} enable wifisetup.service`,
        `${chroot} id -u pi`,
        `${chroot} getent group pi`,
        `${chroot} chown -R pi:pi /home/pi`
      ]);
    });

    it('should leave the overlays and enabled units on the target', async () => {
      await createRunner().run(buildProvisioningPlan(config));

      const unitPath = join(targetRoot, 'etc/systemd/system/python.naturewatch.service');
      expect(statSync(unitPath).mode & 0o777).toBe(0o644);
      expect(readFileSync(join(targetRoot, 'home/pi/.bashrc'), 'utf8')).toBe('alias ll="ls -l"\n');
      expect(readFileSync(join(targetRoot, 'root/.profile'), 'utf8')).toBe('umask 022\n');
      expect(readFileSync(join(targetRoot, 'boot/config.txt'), 'utf8')).toBe('camera_auto_detect=1\n');
      expect(readFileSync(join(targetRoot, 'etc/hostname'), 'utf8')).toBe('camera-trap\n');
      // restored by the second home unpack
      expect(existsSync(join(targetRoot, 'home/pi/NaturewatchCameraServer/helpers/wifisetup.service'))).toBe(true);
    });
  });

  describe('failures', () => {
    it('should stop at a failing package step and propagate its exit code', async () => {
      commands.respondWith((_command, args) => (args[1] === 'apt-get' && args[3] === 'update' ? { exitCode: 100 } : undefined));
      const cleanup = vi.fn();
      const runner = createRunner(cleanup);

      const result = await runner.run(buildProvisioningPlan(config));

      expect(result.status).toBe('failed');
      expect(result.phase).toBe('FAILED');
      expect(result.failedPhase).toBe('PACKAGES');
      expect(result.failedStep).toBe('packages/2-update');
      expect(result.exitCode).toBe(100);
      expect(result.error).toBeInstanceOf(CommandFailedError);
      expect(result.completedSteps).toEqual(['unpack/home/pi', 'packages/1-purge']);
      expect(commands.commandLines().at(-1)).toBe(`chroot ${targetRoot} apt-get -y update`);
      expect(commands.calls.some(call => call.args[1] === 'pip3')).toBe(false);

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(cleanup).toHaveBeenCalledWith({
        phase: 'PACKAGES',
        failedStep: 'packages/2-update',
        completedSteps: ['unpack/home/pi', 'packages/1-purge'],
        error: result.error
      });
    });

    it('should fail with exit code 1 when an overlay source is missing', async () => {
      removeTempDir(join(filesystemRoot, 'home'));
      const runner = createRunner();
      const failed = vi.fn();
      runner.on('stepFailed', failed);

      const result = await runner.run(buildProvisioningPlan(config));

      expect(result.exitCode).toBe(1);
      expect(result.failedPhase).toBe('UNPACK_HOME');
      expect(result.error).toBeInstanceOf(SourceMissingError);
      expect(result.completedSteps).toEqual([]);
      expect(commands.calls).toHaveLength(0);
      expect(failed).toHaveBeenCalledTimes(1);
    });

    it('should refuse to run twice', async () => {
      const runner = createRunner();
      await runner.run(buildProvisioningPlan(config));

      await expect(runner.run(buildProvisioningPlan(config))).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('re-runs', () => {
    it('should skip an already applied purge and repeat everything else', async () => {
      await createRunner().run(buildProvisioningPlan(config));
      commands.calls.length = 0;

      const second = createRunner();
      const skipped = vi.fn();
      second.on('stepSkipped', skipped);
      const result = await second.run(buildProvisioningPlan(config));

      expect(result.status).toBe('succeeded');
      expect(result.skippedSteps).toEqual(['packages/1-purge']);
      expect(skipped).toHaveBeenCalledTimes(1);
      expect(commands.commandLines()).not.toContain(`chroot ${targetRoot} apt-get -y purge python3-opencv`);
      expect(commands.commandLines()).toContain(`chroot ${targetRoot} apt-get -y install ffmpeg`);
    });
  });

  describe('runProvisioning', () => {
    it('should record completed steps in the state file under the target root', async () => {
      const cleanup = vi.fn();

      const result = await runProvisioning(config, { commandRunner: commands, cleanup });

      expect(result.exitCode).toBe(0);
      expect(cleanup).not.toHaveBeenCalled();
      const state: unknown = JSON.parse(
        readFileSync(join(targetRoot, 'var/lib/camera-provision/state.json'), 'utf8')
      );
      expect(state).toMatchObject({ completedSteps: result.completedSteps });
    });
  });
});
