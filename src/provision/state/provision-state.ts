/**
 * Provision State
 *
 * Records which steps completed on a target so that steps which cannot be
 * repeated safely are skipped when provisioning runs again.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const log = createSubsystemLogger('provision/state');

const provisionStateSchema = z.object({
  completedSteps: z.array(z.string()),
  updatedAt: z.string()
});

export type ProvisionState = z.infer<typeof provisionStateSchema>;

export interface ProvisionStateStore {
  load(): ProvisionState;
  markCompleted(stepName: string): void;
}

export function emptyProvisionState(): ProvisionState {
  return { completedSteps: [], updatedAt: new Date(0).toISOString() };
}

/**
 * JSON state file; written through a temp file and rename
 */
export class FileProvisionStateStore implements ProvisionStateStore {
  private readonly path: string;
  private state?: ProvisionState;

  constructor(path: string) {
    this.path = path;
  }

  load(): ProvisionState {
    if (this.state) {
      return this.state;
    }
    if (!existsSync(this.path)) {
      this.state = emptyProvisionState();
      return this.state;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf8'));
    } catch (error) {
      log.warn(`Ignoring unreadable state file ${this.path}`, { error });
      this.state = emptyProvisionState();
      return this.state;
    }

    const parsed = provisionStateSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Ignoring malformed state file ${this.path}`, {
        issues: parsed.error.issues.map(issue => issue.message)
      });
      this.state = emptyProvisionState();
      return this.state;
    }

    this.state = parsed.data;
    return this.state;
  }

  markCompleted(stepName: string): void {
    const current = this.load();
    if (current.completedSteps.includes(stepName)) {
      return;
    }
    this.state = {
      completedSteps: [...current.completedSteps, stepName],
      updatedAt: new Date().toISOString()
    };

    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(this.state, null, 2) + '\n', 'utf8');
    renameSync(tmpPath, this.path);
  }
}

/** Used when the re-run guard is disabled */
export class MemoryProvisionStateStore implements ProvisionStateStore {
  private state: ProvisionState;

  constructor(initial: ProvisionState = emptyProvisionState()) {
    this.state = initial;
  }

  load(): ProvisionState {
    return this.state;
  }

  markCompleted(stepName: string): void {
    if (this.state.completedSteps.includes(stepName)) {
      return;
    }
    this.state = {
      completedSteps: [...this.state.completedSteps, stepName],
      updatedAt: new Date().toISOString()
    };
  }
}
