/**
 * ProvisionConfig Interface
 *
 * Explicit configuration handed to the runner in place of process-wide
 * environment variables.
 */

import type { PackageOperation } from './provisioning-step.js';

export interface ProvisionConfig {
  /** Account whose home directory receives the home overlay */
  baseUser: string;
  /** Camera server checkout holding the requirements manifest and unit files */
  cameraServerDir: string;

  /** Directory holding the overlay sources (home/pi, home/root, boot, root) */
  filesystemRoot: string;
  /** Root of the filesystem being provisioned; '/' inside the image */
  targetRoot: string;
  /** Service directory, relative to targetRoot */
  serviceDir: string;

  packages: readonly PackageOperation[];

  python: {
    /** Manifest path relative to cameraServerDir */
    requirementsFile: string;
    breakSystemPackages: boolean;
  };

  /** Unit files relative to cameraServerDir */
  serviceUnits: readonly string[];

  /** Re-run state file; null disables the re-run guard */
  stateFile: string | null;

  /** Log every executed command */
  trace: boolean;
}
