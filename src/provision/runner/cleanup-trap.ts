/**
 * Cleanup Trap
 *
 * A single failure handler registered once per run. The runner fires it when
 * it enters FAILED; it runs at most once.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { CleanupAlreadyInstalledError, describeError } from '../errors/index.js';
import type { ProvisionPhase } from '../types/provisioning-step.js';

const log = createSubsystemLogger('provision/cleanup');

export interface CleanupContext {
  /** Phase the runner was in when the failure happened */
  phase: ProvisionPhase;
  failedStep?: string;
  completedSteps: readonly string[];
  error: unknown;
}

export type CleanupHandler = (context: CleanupContext) => void | Promise<void>;

/**
 * Default handler: report how far provisioning got
 */
export const logFailureCleanup: CleanupHandler = context => {
  log.error(`Provisioning failed during ${context.phase}`, {
    step: context.failedStep,
    error: describeError(context.error)
  });
  log.warn('Target filesystem is partially provisioned', {
    completed: context.completedSteps.length ? context.completedSteps.join(', ') : 'none'
  });
};

export class CleanupTrap {
  private handler?: CleanupHandler;
  private fired = false;

  install(handler: CleanupHandler): void {
    if (this.handler) {
      throw new CleanupAlreadyInstalledError();
    }
    this.handler = handler;
  }

  get isInstalled(): boolean {
    return this.handler !== undefined;
  }

  get hasFired(): boolean {
    return this.fired;
  }

  /**
   * Runs the handler; returns false when nothing ran. Handler errors are
   * logged so they never replace the failure that triggered cleanup.
   */
  async fire(context: CleanupContext): Promise<boolean> {
    if (this.fired || !this.handler) {
      return false;
    }
    this.fired = true;
    try {
      await this.handler(context);
    } catch (error) {
      log.error('Cleanup handler failed', { error: describeError(error) });
    }
    return true;
  }
}

export function installCleanupTrap(handler: CleanupHandler = logFailureCleanup): CleanupTrap {
  const trap = new CleanupTrap();
  trap.install(handler);
  return trap;
}
