/**
 * Provisioning Step Types
 *
 * A provisioning plan is an ordered list of steps built once from the
 * configuration. Each step belongs to one runner phase.
 */

import type { Overlay } from './overlay.js';

export const PROVISION_PHASES = [
  'INIT',
  'UNPACK_HOME',
  'PACKAGES',
  'PYTHON_DEPS',
  'SERVICES',
  'FINAL_UNPACK',
  'DONE',
  'FAILED'
] as const;

export type ProvisionPhase = (typeof PROVISION_PHASES)[number];

/** Phases that carry steps */
export type WorkPhase = Exclude<ProvisionPhase, 'INIT' | 'DONE' | 'FAILED'>;

export const WORK_PHASES: readonly WorkPhase[] = [
  'UNPACK_HOME',
  'PACKAGES',
  'PYTHON_DEPS',
  'SERVICES',
  'FINAL_UNPACK'
];

export type PackageOperation =
  | { kind: 'purge' | 'install'; packages: readonly string[] }
  | { kind: 'update' | 'upgrade' };

export interface ServiceUnit {
  /** Unit file to move into the service directory */
  sourcePath: string;
  /** Unit name passed to the service manager; defaults to the file's basename */
  unitName?: string;
}

export interface PythonDependencies {
  /** requirements manifest on the provisioning host; pip3 gets the path inside the target */
  manifestPath: string;
  breakSystemPackages: boolean;
}

/** Every action carries the root of the filesystem it acts on */
export type StepAction =
  | { kind: 'unpack-overlay'; overlay: Overlay; targetRoot: string }
  | { kind: 'package'; operation: PackageOperation; targetRoot: string }
  | { kind: 'python-deps'; dependencies: PythonDependencies; targetRoot: string }
  | { kind: 'install-service'; unit: ServiceUnit; serviceDir: string; targetRoot: string };

export interface ProvisioningStep {
  readonly name: string;
  readonly phase: WorkPhase;
  readonly action: StepAction;
  /** Whether running the step again on a provisioned image is harmless */
  readonly idempotent: boolean;
}

export type ProvisioningPlan = readonly ProvisioningStep[];
