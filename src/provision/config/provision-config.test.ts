/**
 * Unit Tests for provisioning configuration
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PACKAGE_OPERATIONS,
  DEFAULT_SERVICE_UNITS,
  createDefaultProvisionConfig,
  loadProvisionConfig,
  resolveProvisionConfig
} from './provision-config.js';
import { ConfigurationError, exitCodeFor } from '../errors/index.js';

function configError(run: () => unknown): ConfigurationError | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('Provision Configuration', () => {
  describe('loadProvisionConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
      const config = loadProvisionConfig({});

      expect(config).toEqual(createDefaultProvisionConfig());
      expect(config.baseUser).toBe('pi');
      expect(config.cameraServerDir).toBe('/home/pi/NaturewatchCameraServer');
      expect(config.packages).toEqual(DEFAULT_PACKAGE_OPERATIONS);
      expect(config.serviceUnits).toEqual(DEFAULT_SERVICE_UNITS);
    });

    it('should derive the camera server directory from BASE_USER', () => {
      const config = loadProvisionConfig({ BASE_USER: 'camera' });

      expect(config.baseUser).toBe('camera');
      expect(config.cameraServerDir).toBe('/home/camera/NaturewatchCameraServer');
    });

    it('should read NATUREWATCHCAMERA_VAR and the PROVISION_* variables', () => {
      const config = loadProvisionConfig({
        BASE_USER: 'pi',
        NATUREWATCHCAMERA_VAR: '/opt/camera',
        PROVISION_FILESYSTEM_ROOT: '/build/filesystem',
        PROVISION_TARGET_ROOT: '/mnt/image',
        PROVISION_STATE_FILE: '/var/lib/custom/state.json',
        PIP_BREAK_SYSTEM_PACKAGES: '0'
      });

      expect(config).toMatchObject({
        cameraServerDir: '/opt/camera',
        filesystemRoot: '/build/filesystem',
        targetRoot: '/mnt/image',
        stateFile: '/var/lib/custom/state.json',
        python: { requirementsFile: 'requirements-pi.txt', breakSystemPackages: false }
      });
    });

    it('should treat empty variables as unset', () => {
      expect(loadProvisionConfig({ BASE_USER: '', NATUREWATCHCAMERA_VAR: '  ' }).baseUser).toBe('pi');
    });

    it('should disable the state file with PROVISION_STATE_FILE=none', () => {
      expect(loadProvisionConfig({ PROVISION_STATE_FILE: 'none' }).stateFile).toBeNull();
    });

    it('should let explicit overrides win over the environment', () => {
      const config = loadProvisionConfig({ BASE_USER: 'camera' }, { baseUser: 'pi', trace: false });

      expect(config.baseUser).toBe('pi');
      expect(config.trace).toBe(false);
    });

    it('should reject invalid values with a ConfigurationError', () => {
      const error = configError(() =>
        loadProvisionConfig({ BASE_USER: 'Not A User', NATUREWATCHCAMERA_VAR: 'relative/path' })
      );

      expect(error).toBeDefined();
      expect(error?.issues).toEqual([
        'BASE_USER must be a valid POSIX user name',
        'NATUREWATCHCAMERA_VAR must be an absolute path'
      ]);
      expect(exitCodeFor(error)).toBe(2);
    });

    it('should reject an unknown flag value', () => {
      expect(configError(() => loadProvisionConfig({ PIP_BREAK_SYSTEM_PACKAGES: 'maybe' }))).toBeDefined();
    });
  });

  describe('resolveProvisionConfig', () => {
    it('should reject empty package lists', () => {
      const error = configError(() => resolveProvisionConfig({ packages: [{ kind: 'install', packages: [] }] }));

      expect(error?.issues[0]).toMatch(/^packages\.0\.packages /);
    });

    it('should reject unit paths that leave the camera server directory', () => {
      expect(configError(() => resolveProvisionConfig({ serviceUnits: ['../evil.service'] }))).toBeDefined();
    });

    it('should return trimmed values for overrides passed in code', () => {
      const config = resolveProvisionConfig({ baseUser: ' pi ', targetRoot: ' /mnt/image ' });

      expect(config.baseUser).toBe('pi');
      expect(config.targetRoot).toBe('/mnt/image');
      expect(config.cameraServerDir).toBe('/home/pi/NaturewatchCameraServer');
    });

    it('should merge python overrides with the defaults', () => {
      const config = resolveProvisionConfig({
        python: { requirementsFile: 'requirements.txt', breakSystemPackages: false }
      });

      expect(config.python).toEqual({ requirementsFile: 'requirements.txt', breakSystemPackages: false });
    });
  });
});
