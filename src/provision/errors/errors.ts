/**
 * Provisioning Errors
 *
 * Every failure raised while provisioning is a ProvisionError. All of them
 * are fatal to the run; exitCodeFor() maps one to the process exit code.
 */

export type ProvisionErrorCode =
  | 'COMMAND_FAILED'
  | 'SOURCE_MISSING'
  | 'DESTINATION_PARENT_MISSING'
  | 'UNKNOWN_OWNER'
  | 'CONFIGURATION_INVALID'
  | 'INVALID_TRANSITION'
  | 'CLEANUP_ALREADY_INSTALLED'
  | 'OVERLAY_CONFLICT'
  | 'PATH_OUTSIDE_TARGET';

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;

  constructor(code: ProvisionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CommandFailedError extends ProvisionError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(
    command: string,
    args: readonly string[],
    exitCode: number,
    stderr = '',
    options?: { cause?: unknown }
  ) {
    super('COMMAND_FAILED', `${[command, ...args].join(' ')} exited with code ${exitCode}`, options);
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** Missing or unreadable source file or directory */
export class SourceMissingError extends ProvisionError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('SOURCE_MISSING', `Source ${path} does not exist or is not readable`, options);
    this.path = path;
  }
}

export class DestinationParentMissingError extends ProvisionError {
  readonly path: string;

  constructor(path: string) {
    super('DESTINATION_PARENT_MISSING', `Parent directory of ${path} does not exist`);
    this.path = path;
  }
}

/** The owner requested for an overlay is not known to the system */
export class UnknownOwnerError extends ProvisionError {
  readonly kind: 'user' | 'group';
  readonly owner: string;

  constructor(kind: 'user' | 'group', owner: string) {
    super('UNKNOWN_OWNER', `Cannot change ownership: ${kind} '${owner}' does not exist`);
    this.kind = kind;
    this.owner = owner;
  }
}

/** The overlay and the destination disagree on whether a path is a directory */
export class OverlayConflictError extends ProvisionError {
  readonly path: string;
  readonly overlayKind: 'directory' | 'file';

  constructor(path: string, overlayKind: 'directory' | 'file') {
    const destinationKind = overlayKind === 'directory' ? 'file' : 'directory';
    super('OVERLAY_CONFLICT', `Cannot unpack a ${overlayKind} over the existing ${destinationKind} ${path}`);
    this.path = path;
    this.overlayKind = overlayKind;
  }
}

export class PathOutsideTargetError extends ProvisionError {
  readonly path: string;
  readonly targetRoot: string;

  constructor(path: string, targetRoot: string) {
    super('PATH_OUTSIDE_TARGET', `${path} is outside the target root ${targetRoot}`);
    this.path = path;
    this.targetRoot = targetRoot;
  }
}

export class ConfigurationError extends ProvisionError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIGURATION_INVALID', `Invalid provisioning configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InvalidTransitionError extends ProvisionError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Illegal phase transition ${from} -> ${to}`);
  }
}

export class CleanupAlreadyInstalledError extends ProvisionError {
  constructor() {
    super('CLEANUP_ALREADY_INSTALLED', 'A cleanup trap is already installed for this run');
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommandFailedError) {
    return error.exitCode === 0 ? 1 : error.exitCode;
  }
  if (error instanceof ConfigurationError) {
    return 2;
  }
  return 1;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
