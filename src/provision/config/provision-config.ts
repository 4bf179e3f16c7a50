/**
 * Provisioning Configuration
 *
 * Turns the process environment into an explicit ProvisionConfig. Values are
 * validated with zod; anything invalid is reported as a ConfigurationError.
 */

import { posix } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { PackageOperation } from '../types/provisioning-step.js';
import type { ProvisionConfig } from '../types/provision-configuration.js';

/**
 * apt operations applied to every image, in order
 */
export const DEFAULT_PACKAGE_OPERATIONS: readonly PackageOperation[] = [
  // pip's opencv wheels conflict with the distro build
  { kind: 'purge', packages: ['python3-opencv', 'libopencv-dev'] },
  { kind: 'update' },
  { kind: 'upgrade' },
  {
    kind: 'install',
    packages: [
      'python3-pip',
      'python3-picamera2',
      'python3-libcamera',
      'python3-kms++',
      'python3-rpi.gpio',
      'libcap-dev',
      'libatlas-base-dev',
      'ffmpeg',
      'gpac'
    ]
  }
];

export const DEFAULT_SERVICE_UNITS: readonly string[] = [
  'helpers/python.naturewatch.service',
  'helpers/wifisetup.service'
];

const DEFAULT_BASE_USER = 'pi';

export function defaultCameraServerDir(baseUser: string): string {
  return `/home/${baseUser}/NaturewatchCameraServer`;
}

export function createDefaultProvisionConfig(baseUser: string = DEFAULT_BASE_USER): ProvisionConfig {
  return {
    baseUser,
    cameraServerDir: defaultCameraServerDir(baseUser),
    filesystemRoot: '/filesystem',
    targetRoot: '/',
    serviceDir: '/etc/systemd/system',
    packages: DEFAULT_PACKAGE_OPERATIONS,
    python: {
      requirementsFile: 'requirements-pi.txt',
      breakSystemPackages: true
    },
    serviceUnits: DEFAULT_SERVICE_UNITS,
    stateFile: '/var/lib/camera-provision/state.json',
    trace: true
  };
}

const userNameSchema = z
  .string()
  .trim()
  .regex(/^[a-z_][a-z0-9_-]*\$?$/, 'must be a valid POSIX user name');

const absolutePathSchema = z
  .string()
  .trim()
  .refine(value => posix.isAbsolute(value), 'must be an absolute path');

const flagSchema = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes');

const packageNameSchema = z.string().regex(/^[a-z0-9][a-z0-9+.-]*$/, 'must be a Debian package name');

const packageOperationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('purge'), packages: z.array(packageNameSchema).min(1) }),
  z.object({ kind: z.literal('install'), packages: z.array(packageNameSchema).min(1) }),
  z.object({ kind: z.literal('update') }),
  z.object({ kind: z.literal('upgrade') })
]);

const relativePathSchema = z
  .string()
  .min(1)
  .refine(value => !posix.isAbsolute(value), 'must be relative')
  .refine(value => !value.split('/').includes('..'), 'must not leave its base directory');

const provisionConfigSchema = z.object({
  baseUser: userNameSchema,
  cameraServerDir: absolutePathSchema,
  filesystemRoot: absolutePathSchema,
  targetRoot: absolutePathSchema,
  serviceDir: absolutePathSchema,
  packages: z.array(packageOperationSchema),
  python: z.object({
    requirementsFile: relativePathSchema,
    breakSystemPackages: z.boolean()
  }),
  serviceUnits: z.array(relativePathSchema).min(1),
  stateFile: absolutePathSchema.nullable(),
  trace: z.boolean()
});

const environmentSchema = z.object({
  BASE_USER: userNameSchema.optional(),
  NATUREWATCHCAMERA_VAR: absolutePathSchema.optional(),
  PROVISION_FILESYSTEM_ROOT: absolutePathSchema.optional(),
  PROVISION_TARGET_ROOT: absolutePathSchema.optional(),
  PROVISION_STATE_FILE: z.string().trim().optional(),
  PIP_BREAK_SYSTEM_PACKAGES: flagSchema.optional()
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path} ${issue.message}` : issue.message;
  });
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return cleaned;
}

/**
 * Merges overrides onto the defaults and validates the result. The returned
 * config carries the parsed (trimmed) values.
 */
export function resolveProvisionConfig(overrides: Partial<ProvisionConfig> = {}): ProvisionConfig {
  const baseUser = (overrides.baseUser ?? DEFAULT_BASE_USER).trim();
  const defaults = createDefaultProvisionConfig(baseUser);

  const merged: ProvisionConfig = {
    ...defaults,
    ...overrides,
    python: {
      ...defaults.python,
      ...overrides.python
    }
  };

  const parsed = provisionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Reads BASE_USER, NATUREWATCHCAMERA_VAR and the PROVISION_* variables
 */
export function loadProvisionConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ProvisionConfig> = {}
): ProvisionConfig {
  const parsed = environmentSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  const vars = parsed.data;

  const fromEnv: Partial<ProvisionConfig> = {};
  if (vars.BASE_USER !== undefined) {
    fromEnv.baseUser = vars.BASE_USER;
  }
  if (vars.NATUREWATCHCAMERA_VAR !== undefined) {
    fromEnv.cameraServerDir = vars.NATUREWATCHCAMERA_VAR;
  }
  if (vars.PROVISION_FILESYSTEM_ROOT !== undefined) {
    fromEnv.filesystemRoot = vars.PROVISION_FILESYSTEM_ROOT;
  }
  if (vars.PROVISION_TARGET_ROOT !== undefined) {
    fromEnv.targetRoot = vars.PROVISION_TARGET_ROOT;
  }
  if (vars.PROVISION_STATE_FILE !== undefined) {
    // "none" turns the re-run guard off
    fromEnv.stateFile = vars.PROVISION_STATE_FILE === 'none' ? null : vars.PROVISION_STATE_FILE;
  }

  const python =
    vars.PIP_BREAK_SYSTEM_PACKAGES !== undefined
      ? {
          ...createDefaultProvisionConfig().python,
          breakSystemPackages: vars.PIP_BREAK_SYSTEM_PACKAGES,
          ...overrides.python
        }
      : overrides.python;

  return resolveProvisionConfig({
    ...fromEnv,
    ...overrides,
    ...(python ? { python } : {})
  });
}
