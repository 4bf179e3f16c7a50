/**
 * Overlay Unpacker
 *
 * Copies an overlay directory tree onto its destination and optionally hands
 * the result to a user. Existing destination files and links are replaced,
 * so the last unpack of an overlay wins.
 */

import {
  accessSync,
  constants,
  copyFileSync,
  existsSync,
  lstatSync,
  lutimesSync,
  mkdirSync,
  readdirSync,
  readlinkSync,
  statSync,
  symlinkSync,
  unlinkSync,
  utimesSync,
  type Stats
} from 'node:fs';
import { dirname, join, relative, resolve } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import {
  DestinationParentMissingError,
  OverlayConflictError,
  SourceMissingError,
  UnknownOwnerError
} from '../errors/index.js';
import type { CommandRunner } from '../system/command-runner.js';
import { commandRunnerFor, pathInTarget } from '../system/target-root.js';
import type { Overlay, OverlayOwner, UnpackResult } from '../types/overlay.js';

const log = createSubsystemLogger('provision/overlay');

/**
 * Lists every file and symlink under root, as sorted paths relative to root
 */
export function listOverlayFiles(root: string): string[] {
  const files: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else {
        files.push(relative(root, fullPath));
      }
    }
  };
  walk(root);
  return files.sort();
}

function assertReadableDirectory(path: string): void {
  try {
    accessSync(path, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new SourceMissingError(path, { cause: error });
  }
  if (!statSync(path).isDirectory()) {
    throw new SourceMissingError(path);
  }
}

function lstatIfExists(path: string): Stats | undefined {
  return lstatSync(path, { throwIfNoEntry: false });
}

/** A directory, or a link to one such as /lib -> usr/lib */
function isDirectoryLike(path: string, stats: Stats): boolean {
  return stats.isDirectory() || (stats.isSymbolicLink() && existsSync(path) && statSync(path).isDirectory());
}

/**
 * Copies one overlay entry. Links are recreated as they are, never followed,
 * and an existing link at a file's destination is replaced rather than
 * written through.
 */
function copyEntry(sourcePath: string, destPath: string): void {
  const source = lstatSync(sourcePath);
  const existing = lstatIfExists(destPath);

  if (source.isDirectory()) {
    if (existing && !isDirectoryLike(destPath, existing)) {
      throw new OverlayConflictError(destPath, 'directory');
    }
    if (!existing) {
      mkdirSync(destPath, { mode: source.mode & 0o7777 });
    }
    for (const name of readdirSync(sourcePath)) {
      copyEntry(join(sourcePath, name), join(destPath, name));
    }
    if (!existing?.isSymbolicLink()) {
      utimesSync(destPath, source.atime, source.mtime);
    }
    return;
  }

  if (existing?.isDirectory()) {
    throw new OverlayConflictError(destPath, 'file');
  }

  if (source.isSymbolicLink()) {
    if (existing) {
      unlinkSync(destPath);
    }
    symlinkSync(readlinkSync(sourcePath), destPath);
    lutimesSync(destPath, source.atime, source.mtime);
    return;
  }

  if (existing?.isSymbolicLink()) {
    unlinkSync(destPath);
  }
  copyFileSync(sourcePath, destPath);
  utimesSync(destPath, source.atime, source.mtime);
}

/**
 * Checks that the owner's user and group exist on the system the runner acts on
 */
export function resolveOwner(owner: OverlayOwner, runner: CommandRunner): { user: string; group: string } {
  const group = owner.group ?? owner.user;

  const user = runner.run('id', ['-u', owner.user], { capture: true, allowFailure: true });
  if (user.exitCode !== 0) {
    throw new UnknownOwnerError('user', owner.user);
  }

  const groupEntry = runner.run('getent', ['group', group], { capture: true, allowFailure: true });
  if (groupEntry.exitCode !== 0) {
    throw new UnknownOwnerError('group', group);
  }

  return { user: owner.user, group };
}

/**
 * Unpacks an overlay. With a target root other than '/', the owner is looked
 * up and applied inside the target with chroot.
 */
export function unpackOverlay(overlay: Overlay, runner: CommandRunner, targetRoot = '/'): UnpackResult {
  const sourcePath = resolve(overlay.sourcePath);
  const destPath = resolve(overlay.destPath);

  assertReadableDirectory(sourcePath);

  if (!existsSync(dirname(destPath))) {
    throw new DestinationParentMissingError(destPath);
  }

  // Resolve ownership before touching the destination
  const targetRunner = commandRunnerFor(runner, targetRoot);
  const owner = overlay.owner ? resolveOwner(overlay.owner, targetRunner) : undefined;

  const files = listOverlayFiles(sourcePath);
  copyEntry(sourcePath, destPath);

  if (owner) {
    targetRunner.run('chown', ['-R', `${owner.user}:${owner.group}`, pathInTarget(targetRoot, destPath)]);
  }

  log.info(`Unpacked ${sourcePath} -> ${destPath}`, {
    files: files.length,
    owner: owner ? `${owner.user}:${owner.group}` : undefined
  });

  return { sourcePath, destPath, filesCopied: files.length };
}
