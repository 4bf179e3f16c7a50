/**
 * Shared test utilities for provisioning tests
 *
 * A recording CommandRunner that never spawns anything, temporary directory
 * helpers, and fast-check generators for overlay trees of files and symlinks.
 */

import * as fc from 'fast-check';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { CommandFailedError } from './errors/index.js';
import type { CommandOptions, CommandResult, CommandRunner } from './system/command-runner.js';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

export type CommandResponder = (command: string, args: readonly string[]) => Partial<CommandResult> | undefined;

/**
 * In-process CommandRunner: records every call and answers with the
 * responder's result (exit 0 by default). Non-zero exits throw unless the
 * caller allowed failure, like ShellCommandRunner.
 */
export class RecordingCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private responder: CommandResponder;

  constructor(responder: CommandResponder = () => undefined) {
    this.responder = responder;
  }

  respondWith(responder: CommandResponder): void {
    this.responder = responder;
  }

  run(command: string, args: readonly string[], options: CommandOptions = {}): CommandResult {
    this.calls.push({ command, args: [...args], options });
    const result: CommandResult = { exitCode: 0, stdout: '', stderr: '', ...this.responder(command, args) };
    if (result.exitCode !== 0 && !options.allowFailure) {
      throw new CommandFailedError(command, args, result.exitCode, result.stderr);
    }
    return result;
  }

  commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }
}

export function createTempDir(prefix = 'provision-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/** Writes files given as relative path -> content */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

export type OverlayEntry = { kind: 'file'; content: string } | { kind: 'symlink'; target: string };

/** Overlay tree as relative path -> entry */
export type OverlayTree = Record<string, OverlayEntry>;

/** Writes files and symlinks; an entry already on disk is replaced */
export function writeOverlayTree(root: string, tree: OverlayTree): void {
  for (const [relativePath, entry] of Object.entries(tree)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    if (entry.kind === 'file') {
      writeFileSync(fullPath, entry.content);
    } else {
      rmSync(fullPath, { force: true });
      symlinkSync(entry.target, fullPath);
    }
  }
}

const pathSegmentArbitrary = fc.stringMatching(/^[a-z0-9_]{1,8}$/);

const overlayEntryArbitrary: fc.Arbitrary<OverlayEntry> = fc.oneof(
  fc.record({ kind: fc.constant('file' as const), content: fc.string({ maxLength: 64 }) }),
  fc.record({
    kind: fc.constant('symlink' as const),
    target: fc.oneof(
      // absolute, like etc/localtime
      pathSegmentArbitrary.map(name => `/usr/share/zoneinfo/${name}`),
      pathSegmentArbitrary.map(name => `f_${name}.txt`),
      pathSegmentArbitrary.map(name => `../d_${name}/f_${name}.txt`)
    )
  })
);

/**
 * Overlay trees of files and symlinks: up to three directory levels, with
 * directories prefixed d_, files f_ and links l_, so a path never changes
 * kind between two trees
 */
export const overlayTreeArbitrary: fc.Arbitrary<OverlayTree> = fc
  .uniqueArray(
    fc
      .tuple(fc.array(pathSegmentArbitrary, { maxLength: 2 }), pathSegmentArbitrary, overlayEntryArbitrary)
      .map(([dirs, name, entry]): [string, OverlayEntry] => {
        const leaf = entry.kind === 'file' ? `f_${name}.txt` : `l_${name}`;
        return [[...dirs.map(dir => `d_${dir}`), leaf].join('/'), entry];
      }),
    { selector: ([path]) => path, minLength: 1, maxLength: 12 }
  )
  .map(entries => Object.fromEntries(entries));

export const packageNameArbitrary = fc.stringMatching(/^[a-z0-9][a-z0-9+.-]{0,15}$/);

export const propertyTestConfig = {
  numRuns: 20,
  timeout: 5000,
  verbose: false
};
