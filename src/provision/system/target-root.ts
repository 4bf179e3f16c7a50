/**
 * Target Root
 *
 * When the image is mounted somewhere other than '/', package managers and
 * user lookups must run inside it with chroot, and paths handed to those
 * commands must be the paths the image sees.
 */

import { isAbsolute, relative, resolve } from 'node:path';
import { PathOutsideTargetError } from '../errors/index.js';
import type { CommandOptions, CommandResult, CommandRunner } from './command-runner.js';

export function isHostRoot(targetRoot: string): boolean {
  return resolve(targetRoot) === '/';
}

/** Command line that runs `command` inside the target root */
export function targetCommandLine(targetRoot: string, command: string, args: readonly string[]): string[] {
  return isHostRoot(targetRoot) ? [command, ...args] : ['chroot', targetRoot, command, ...args];
}

export class ChrootCommandRunner implements CommandRunner {
  readonly root: string;
  private readonly inner: CommandRunner;

  constructor(inner: CommandRunner, root: string) {
    this.inner = inner;
    this.root = root;
  }

  run(command: string, args: readonly string[], options?: CommandOptions): CommandResult {
    return this.inner.run('chroot', [this.root, command, ...args], options);
  }
}

/**
 * Returns a runner whose commands act on the target root
 */
export function commandRunnerFor(runner: CommandRunner, targetRoot: string): CommandRunner {
  return isHostRoot(targetRoot) ? runner : new ChrootCommandRunner(runner, targetRoot);
}

/**
 * Maps a path under the target root to the path seen from inside the image
 */
export function pathInTarget(targetRoot: string, hostPath: string): string {
  const relativePath = relative(resolve(targetRoot), resolve(hostPath));
  if (relativePath === '..' || relativePath.startsWith('../') || isAbsolute(relativePath)) {
    throw new PathOutsideTargetError(hostPath, targetRoot);
  }
  return `/${relativePath}`;
}
