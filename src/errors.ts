/**
 * Error kinds surfaced by reconciliation, session and prompt operations.
 *
 * Every error carries a literal `kind` so that the CLI, the HTTP layer and the
 * per-target sync results can report it without string matching.
 */

export type ForgeErrorKind =
  | 'Unreachable'
  | 'LockTimeout'
  | 'WorktreeConflict'
  | 'WorktreeMissing'
  | 'SessionNotFound'
  | 'ValidationError'
  | 'RemoteCommandFailed'
  | 'Cancelled';

export abstract class ForgeError extends Error {
  abstract readonly kind: ForgeErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  /** Transient kinds may succeed when the same operation is simply re-run. */
  get transient(): boolean {
    return this.kind === 'Unreachable' || this.kind === 'LockTimeout';
  }
}

export class UnreachableError extends ForgeError {
  readonly kind = 'Unreachable' as const;

  constructor(readonly host: string, reason: string) {
    super(`Host '${host}' is unreachable: ${reason}`, { host });
  }
}

export class LockTimeoutError extends ForgeError {
  readonly kind = 'LockTimeout' as const;

  constructor(readonly scope: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock '${scope}'`, { scope, timeoutMs });
  }
}

export class WorktreeConflictError extends ForgeError {
  readonly kind = 'WorktreeConflict' as const;

  constructor(
    readonly host: string,
    readonly path: string,
    readonly expectedBranch: string,
    readonly found: string
  ) {
    super(`Worktree ${path} on '${host}' is on ${found}, expected ${expectedBranch}`, {
      host,
      path,
      expectedBranch,
      found,
    });
  }
}

export class WorktreeMissingError extends ForgeError {
  readonly kind = 'WorktreeMissing' as const;

  constructor(readonly host: string, readonly path: string) {
    super(`Worktree ${path} does not exist on '${host}'; run sync first`, { host, path });
  }
}

export class SessionNotFoundError extends ForgeError {
  readonly kind = 'SessionNotFound' as const;

  constructor(readonly session: string, readonly host: string) {
    super(`Session '${session}' is not running on '${host}'`, { session, host });
  }
}

export class ValidationError extends ForgeError {
  readonly kind = 'ValidationError' as const;
}

export class RemoteCommandFailedError extends ForgeError {
  readonly kind = 'RemoteCommandFailed' as const;

  constructor(
    readonly host: string,
    readonly command: string,
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string
  ) {
    const output = (stderr.trim() || stdout.trim()).split('\n').slice(-5).join('\n');
    super(`Command failed on '${host}' (exit ${exitCode}): ${output || command}`, {
      host,
      exitCode,
    });
  }
}

export class CancelledError extends ForgeError {
  readonly kind = 'Cancelled' as const;

  constructor(what: string) {
    super(`Cancelled before ${what}`);
  }
}

export interface ErrorDescription {
  kind: ForgeErrorKind | 'Internal';
  message: string;
  transient: boolean;
}

export function isForgeError(err: unknown): err is ForgeError {
  return err instanceof ForgeError;
}

export function describeError(err: unknown): ErrorDescription {
  if (isForgeError(err)) {
    return { kind: err.kind, message: err.message, transient: err.transient };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'Internal', message, transient: false };
}

/**
 * Operator-facing message, with the follow-up the error kind calls for.
 */
export function humanMessage(err: unknown): string {
  const { kind, message, transient } = describeError(err);
  if (transient) {
    return `${kind}: ${message} (likely transient, retry the command)`;
  }
  if (kind === 'WorktreeConflict') {
    return `${kind}: ${message} (inspect the worktree manually; nothing was changed)`;
  }
  return `${kind}: ${message}`;
}

const HTTP_STATUS: Record<ErrorDescription['kind'], number> = {
  ValidationError: 400,
  SessionNotFound: 404,
  WorktreeMissing: 409,
  WorktreeConflict: 409,
  Cancelled: 409,
  LockTimeout: 423,
  Unreachable: 424,
  RemoteCommandFailed: 424,
  Internal: 500,
};

export function httpStatusFor(err: unknown): number {
  return HTTP_STATUS[describeError(err).kind];
}
