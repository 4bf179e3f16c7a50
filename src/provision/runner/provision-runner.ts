/**
 * Provision Runner
 *
 * Executes a provisioning plan phase by phase:
 *
 *   INIT -> UNPACK_HOME -> PACKAGES -> PYTHON_DEPS -> SERVICES -> FINAL_UNPACK -> DONE
 *
 * Any failing step moves the runner to FAILED, fires the cleanup trap and
 * ends the run. Nothing after the failing step executes.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { InvalidTransitionError, describeError, exitCodeFor } from '../errors/index.js';
import { unpackOverlay } from '../overlay-unpacker/overlay-unpacker.js';
import { runPackageOperation } from '../package-stage/package-stage.js';
import { installPythonDependencies } from '../python-deps/python-deps.js';
import { installServiceUnit } from '../service-installer/service-installer.js';
import { MemoryProvisionStateStore, type ProvisionStateStore } from '../state/provision-state.js';
import type { CommandRunner } from '../system/command-runner.js';
import {
  WORK_PHASES,
  type ProvisionPhase,
  type ProvisioningPlan,
  type ProvisioningStep
} from '../types/provisioning-step.js';
import { installCleanupTrap, type CleanupTrap } from './cleanup-trap.js';

const TRANSITIONS: Record<ProvisionPhase, readonly ProvisionPhase[]> = {
  INIT: ['UNPACK_HOME', 'FAILED'],
  UNPACK_HOME: ['PACKAGES', 'FAILED'],
  PACKAGES: ['PYTHON_DEPS', 'FAILED'],
  PYTHON_DEPS: ['SERVICES', 'FAILED'],
  SERVICES: ['FINAL_UNPACK', 'FAILED'],
  FINAL_UNPACK: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: []
};

export function canTransition(from: ProvisionPhase, to: ProvisionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface ProvisionRunnerOptions {
  commandRunner: CommandRunner;
  /** Defaults to an in-memory store, which disables the re-run guard */
  stateStore?: ProvisionStateStore;
  /** Defaults to a trap with the logging cleanup handler */
  cleanupTrap?: CleanupTrap;
}

export interface ProvisionResult {
  status: 'succeeded' | 'failed';
  /** DONE or FAILED */
  phase: ProvisionPhase;
  /** Phase that was executing when the run failed */
  failedPhase?: ProvisionPhase;
  completedSteps: string[];
  skippedSteps: string[];
  failedStep?: string;
  error?: unknown;
  exitCode: number;
  durationMs: number;
}

export interface PhaseChange {
  from: ProvisionPhase;
  to: ProvisionPhase;
}

export class ProvisionRunner extends EventEmitter {
  private readonly commandRunner: CommandRunner;
  private readonly stateStore: ProvisionStateStore;
  private readonly cleanupTrap: CleanupTrap;
  private readonly logger = createSubsystemLogger('provision/runner');

  private phase: ProvisionPhase = 'INIT';
  private completedSteps: string[] = [];
  private skippedSteps: string[] = [];

  constructor(options: ProvisionRunnerOptions) {
    super();
    this.commandRunner = options.commandRunner;
    this.stateStore = options.stateStore ?? new MemoryProvisionStateStore();
    this.cleanupTrap = options.cleanupTrap ?? installCleanupTrap();
  }

  getPhase(): ProvisionPhase {
    return this.phase;
  }

  private transition(to: ProvisionPhase): void {
    if (!canTransition(this.phase, to)) {
      throw new InvalidTransitionError(this.phase, to);
    }
    const change: PhaseChange = { from: this.phase, to };
    this.phase = to;
    this.logger.info(`Phase ${change.from} -> ${change.to}`);
    this.emit('phaseChanged', change);
  }

  /**
   * Runs the plan. Resolves with the outcome; only an illegal phase
   * transition (running twice) rejects.
   */
  async run(plan: ProvisioningPlan): Promise<ProvisionResult> {
    const startedAt = Date.now();
    const state = this.stateStore.load();
    let currentStep: ProvisioningStep | undefined;

    this.transition('UNPACK_HOME');
    this.logger.info('Provisioning started', { steps: plan.length });

    try {
      for (const [index, phase] of WORK_PHASES.entries()) {
        if (index > 0) {
          this.transition(phase);
        }
        for (const step of plan.filter(candidate => candidate.phase === phase)) {
          currentStep = step;
          if (!step.idempotent && state.completedSteps.includes(step.name)) {
            this.skippedSteps.push(step.name);
            this.logger.info(`Skipping ${step.name}: already applied and not repeatable`);
            this.emit('stepSkipped', { step, reason: 'already-applied' });
            continue;
          }
          this.runStep(step);
          this.stateStore.markCompleted(step.name);
        }
        currentStep = undefined;
      }
    } catch (error) {
      return this.fail(error, currentStep, this.phase, startedAt);
    }

    this.transition('DONE');
    const durationMs = Date.now() - startedAt;
    this.logger.info('Provisioning completed', {
      completed: this.completedSteps.length,
      skipped: this.skippedSteps.length,
      durationMs
    });

    return {
      status: 'succeeded',
      phase: this.phase,
      completedSteps: [...this.completedSteps],
      skippedSteps: [...this.skippedSteps],
      exitCode: 0,
      durationMs
    };
  }

  private runStep(step: ProvisioningStep): void {
    const stepStart = Date.now();
    this.emit('stepStarted', step);
    this.logger.info(`Running ${step.name}`);

    try {
      this.executeAction(step);
    } catch (error) {
      this.emit('stepFailed', { step, error });
      throw error;
    }

    this.completedSteps.push(step.name);
    const durationMs = Date.now() - stepStart;
    this.emit('stepCompleted', { step, durationMs });
    this.logger.debug(`Finished ${step.name}`, { durationMs });
  }

  private executeAction(step: ProvisioningStep): void {
    const { action } = step;
    switch (action.kind) {
      case 'unpack-overlay':
        unpackOverlay(action.overlay, this.commandRunner, action.targetRoot);
        return;
      case 'package':
        runPackageOperation(action.operation, this.commandRunner, action.targetRoot);
        return;
      case 'python-deps':
        installPythonDependencies(action.dependencies, this.commandRunner, action.targetRoot);
        return;
      case 'install-service':
        installServiceUnit(
          action.unit,
          { serviceDir: action.serviceDir, targetRoot: action.targetRoot },
          this.commandRunner
        );
        return;
    }
  }

  private async fail(
    error: unknown,
    step: ProvisioningStep | undefined,
    failedPhase: ProvisionPhase,
    startedAt: number
  ): Promise<ProvisionResult> {
    this.transition('FAILED');
    this.logger.fatal(`Provisioning aborted${step ? ` at ${step.name}` : ''}`, {
      error: describeError(error)
    });

    await this.cleanupTrap.fire({
      phase: failedPhase,
      failedStep: step?.name,
      completedSteps: [...this.completedSteps],
      error
    });

    return {
      status: 'failed',
      phase: this.phase,
      failedPhase,
      completedSteps: [...this.completedSteps],
      skippedSteps: [...this.skippedSteps],
      failedStep: step?.name,
      error,
      exitCode: exitCodeFor(error),
      durationMs: Date.now() - startedAt
    };
  }
}
