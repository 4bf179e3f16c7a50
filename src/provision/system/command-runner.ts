/**
 * Command Runner
 *
 * Executes external commands synchronously. Every provisioning stage goes
 * through a CommandRunner so that a non-zero exit surfaces as a
 * CommandFailedError carrying the command's exit code.
 */

import { spawnSync } from 'node:child_process';
import { constants } from 'node:os';
import { createSubsystemLogger, type SubsystemLogger } from '../../logging/subsystem.js';
import { CommandFailedError } from '../errors/index.js';

export interface CommandOptions {
  /** Extra environment merged over process.env */
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of passing them through to the terminal */
  capture?: boolean;
  /** Return the result instead of throwing on a non-zero exit */
  allowFailure?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): CommandResult;
}

export interface ShellCommandRunnerOptions {
  /** Log each command before running it, like `set -x` */
  trace: boolean;
}

/** Exit status a POSIX shell reports for a command it cannot find */
const COMMAND_NOT_FOUND = 127;

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

function signalExitCode(signal: NodeJS.Signals): number {
  const signalNumber = constants.signals[signal];
  return 128 + (signalNumber ?? 0);
}

export class ShellCommandRunner implements CommandRunner {
  private readonly options: ShellCommandRunnerOptions;
  private readonly logger: SubsystemLogger;

  constructor(options: Partial<ShellCommandRunnerOptions> = {}) {
    this.options = {
      trace: true,
      ...options
    };
    this.logger = createSubsystemLogger('provision/shell');
  }

  run(command: string, args: readonly string[], options: CommandOptions = {}): CommandResult {
    const line = `+ ${formatCommand(command, args)}`;
    if (this.options.trace) {
      this.logger.info(line);
    } else {
      this.logger.debug(line);
    }

    const capture = options.capture ?? false;
    const result = spawnSync(command, [...args], {
      env: { ...process.env, ...options.env },
      encoding: 'utf8',
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : ['ignore', 'inherit', 'inherit']
    });

    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    if (result.error) {
      this.logger.error(`Failed to start ${command}`, { error: result.error.message });
      throw new CommandFailedError(command, args, COMMAND_NOT_FOUND, result.error.message, {
        cause: result.error
      });
    }

    let exitCode: number;
    if (result.status !== null) {
      exitCode = result.status;
    } else if (result.signal !== null) {
      exitCode = signalExitCode(result.signal);
    } else {
      exitCode = 1;
    }

    if (exitCode !== 0 && !options.allowFailure) {
      this.logger.error(`Command failed: ${formatCommand(command, args)}`, { exitCode });
      throw new CommandFailedError(command, args, exitCode, stderr);
    }

    return { exitCode, stdout, stderr };
  }
}
