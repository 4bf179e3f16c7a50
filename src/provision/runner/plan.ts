/**
 * Provisioning Plan
 *
 * Builds the ordered, frozen list of steps for one run from a
 * ProvisionConfig. Destination paths are resolved under the target root.
 */

import { join } from 'node:path';
import { aptArguments, isIdempotentOperation } from '../package-stage/package-stage.js';
import { pipArguments } from '../python-deps/python-deps.js';
import { systemctlEnableArguments, unitNameOf } from '../service-installer/service-installer.js';
import { targetCommandLine } from '../system/target-root.js';
import type { Overlay } from '../types/overlay.js';
import type { ProvisionConfig } from '../types/provision-configuration.js';
import type { ProvisioningPlan, ProvisioningStep, StepAction, WorkPhase } from '../types/provisioning-step.js';

/** Overlay directories under the filesystem root and where they land */
export const HOME_OVERLAY = 'home/pi';
export const FINAL_OVERLAYS: readonly { source: string; dest: string }[] = [
  { source: 'home/root', dest: '/root' },
  { source: 'boot', dest: '/boot' },
  { source: 'root', dest: '/' }
];

export function inTarget(targetRoot: string, path: string): string {
  return join(targetRoot, path);
}

function step(name: string, phase: WorkPhase, action: StepAction, idempotent = true): ProvisioningStep {
  return Object.freeze({ name, phase, action: Object.freeze(action), idempotent });
}

function homeOverlay(config: ProvisionConfig): Overlay {
  return {
    sourcePath: join(config.filesystemRoot, HOME_OVERLAY),
    destPath: inTarget(config.targetRoot, `/home/${config.baseUser}`),
    owner: { user: config.baseUser }
  };
}

export function buildProvisioningPlan(config: ProvisionConfig): ProvisioningPlan {
  const steps: ProvisioningStep[] = [];
  const cameraServerDir = inTarget(config.targetRoot, config.cameraServerDir);

  steps.push(
    step(`unpack/${HOME_OVERLAY}`, 'UNPACK_HOME', {
      kind: 'unpack-overlay',
      overlay: homeOverlay(config),
      targetRoot: config.targetRoot
    })
  );

  config.packages.forEach((operation, index) => {
    steps.push(
      step(
        `packages/${index + 1}-${operation.kind}`,
        'PACKAGES',
        { kind: 'package', operation, targetRoot: config.targetRoot },
        isIdempotentOperation(operation)
      )
    );
  });

  steps.push(
    step('python/requirements', 'PYTHON_DEPS', {
      kind: 'python-deps',
      dependencies: {
        manifestPath: join(cameraServerDir, config.python.requirementsFile),
        breakSystemPackages: config.python.breakSystemPackages
      },
      targetRoot: config.targetRoot
    })
  );

  const serviceDir = inTarget(config.targetRoot, config.serviceDir);
  for (const unitFile of config.serviceUnits) {
    const unit = { sourcePath: join(cameraServerDir, unitFile) };
    steps.push(
      step(`services/${unitNameOf(unit)}`, 'SERVICES', {
        kind: 'install-service',
        unit,
        serviceDir,
        targetRoot: config.targetRoot
      })
    );
  }

  // The home overlay is applied again so it wins over anything the package
  // and service stages wrote into the home directory
  steps.push(
    step(`final-unpack/${HOME_OVERLAY}`, 'FINAL_UNPACK', {
      kind: 'unpack-overlay',
      overlay: homeOverlay(config),
      targetRoot: config.targetRoot
    })
  );
  for (const overlay of FINAL_OVERLAYS) {
    steps.push(
      step(`final-unpack/${overlay.source}`, 'FINAL_UNPACK', {
        kind: 'unpack-overlay',
        overlay: {
          sourcePath: join(config.filesystemRoot, overlay.source),
          destPath: inTarget(config.targetRoot, overlay.dest)
        },
        targetRoot: config.targetRoot
      })
    );
  }

  return Object.freeze(steps);
}

export function describeStep(provisioningStep: ProvisioningStep): string {
  const { action } = provisioningStep;
  switch (action.kind) {
    case 'unpack-overlay': {
      const { overlay } = action;
      const owner = overlay.owner ? ` (owner ${overlay.owner.user}:${overlay.owner.group ?? overlay.owner.user})` : '';
      return `copy ${overlay.sourcePath} -> ${overlay.destPath}${owner}`;
    }
    case 'package':
      return targetCommandLine(action.targetRoot, 'apt-get', aptArguments(action.operation)).join(' ');
    case 'python-deps':
      return targetCommandLine(action.targetRoot, 'pip3', pipArguments(action.dependencies, action.targetRoot)).join(' ');
    case 'install-service': {
      const unitName = unitNameOf(action.unit);
      const enable = ['systemctl', ...systemctlEnableArguments(unitName, action.targetRoot)].join(' ');
      return `install ${action.unit.sourcePath} -> ${join(action.serviceDir, unitName)}, ${enable}`;
    }
  }
}

export function describePlan(plan: ProvisioningPlan): string {
  return plan
    .map((planStep, index) => {
      const marker = planStep.idempotent ? '' : ' (not idempotent)';
      return `${index + 1}. [${planStep.phase}] ${planStep.name}: ${describeStep(planStep)}${marker}`;
    })
    .join('\n');
}
